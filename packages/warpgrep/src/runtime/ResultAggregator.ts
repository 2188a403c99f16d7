import type { FinishFile } from "../protocol/ToolCallTypes.js";
import { executeToolCall } from "../tools/ToolExecutor.js";
import type { ToolContext } from "../tools/ToolTypes.js";
import type { SearchContextEntry, WarpGrepResult } from "./SearchTypes.js";

export const summarize = (sections: number, turns: number): string =>
  `Found ${sections} relevant code section(s) in ${turns} turn(s)`;

/** Reads every finish entry in request order; duplicates and overlaps are kept. */
export const aggregateResults = async (
  files: FinishFile[],
  context: ToolContext,
  turns: number,
): Promise<WarpGrepResult> => {
  const contexts = await Promise.all(
    files.map(async (file): Promise<SearchContextEntry> => {
      const result = await executeToolCall(
        { tool: "read", args: { path: file.path, lines: file.lines } },
        context,
      );
      return file.lines
        ? { file: file.path, content: result.output, lines: file.lines }
        : { file: file.path, content: result.output };
    }),
  );

  return {
    success: true,
    contexts,
    summary: summarize(contexts.length, turns),
    turns,
  };
};
