import { DEFAULT_TOOLS, type ToolsConfig } from "../config/Config.js";
import type { ExecutableToolCall } from "../protocol/ToolCallTypes.js";
import { listDirectoryTool, readTool } from "./filesystem/FileTools.js";
import { grepTool } from "./search/GrepTool.js";
import type { ToolContext, ToolExecutionResult, ToolHandlerResult } from "./ToolTypes.js";

const dispatch = (call: ExecutableToolCall, context: ToolContext): Promise<ToolHandlerResult> => {
  switch (call.tool) {
    case "grep":
      return grepTool(call.args, context);
    case "read":
      return readTool(call.args, context);
    case "list_directory":
      return listDirectoryTool(call.args, context);
  }
};

/** Runs one call; a thrown failure becomes an `Error: ...` output instead of propagating. */
export const executeToolCall = async (
  call: ExecutableToolCall,
  context: ToolContext,
): Promise<ToolExecutionResult> => {
  try {
    const result = await dispatch(call, context);
    return { call, ok: true, output: result.output };
  } catch (error) {
    return {
      call,
      ok: false,
      output: `Error: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
};

/** Dispatches all calls at once; results keep the order of `calls`. */
export const executeToolCalls = (
  calls: ExecutableToolCall[],
  context: ToolContext,
): Promise<ToolExecutionResult[]> => Promise.all(calls.map((call) => executeToolCall(call, context)));

const escapeAttribute = (value: string): string =>
  value.replace(/&/g, "&amp;").replace(/"/g, "&quot;").replace(/</g, "&lt;");

const attributes = (pairs: Array<[string, string | undefined]>): string =>
  pairs
    .filter((pair): pair is [string, string] => pair[1] !== undefined)
    .map(([key, value]) => ` ${key}="${escapeAttribute(value)}"`)
    .join("");

export const formatToolResult = (result: ToolExecutionResult): string => {
  const { call, output } = result;
  switch (call.tool) {
    case "grep":
      return `<grep_result${attributes([
        ["pattern", call.args.pattern],
        ["sub_dir", call.args.subDir],
        ["glob", call.args.glob],
      ])}>\n${output}\n</grep_result>`;
    case "read":
      return `<read_result${attributes([
        ["path", call.args.path],
        ["lines", call.args.lines],
      ])}>\n${output}\n</read_result>`;
    case "list_directory":
      return `<list_directory_result${attributes([
        ["path", call.args.path],
        ["pattern", call.args.pattern],
      ])}>\n${output}\n</list_directory_result>`;
  }
};

export const formatToolResults = (results: ToolExecutionResult[]): string =>
  results.map(formatToolResult).join("\n\n");

export const createToolContext = (repoRoot: string, tools: Partial<ToolsConfig> = {}): ToolContext => ({
  repoRoot,
  grepTimeoutMs: tools.grepTimeoutMs ?? DEFAULT_TOOLS.grepTimeoutMs,
  grepMaxLines: tools.grepMaxLines ?? DEFAULT_TOOLS.grepMaxLines,
  grepContextLines: tools.grepContextLines ?? DEFAULT_TOOLS.grepContextLines,
});

export const grep = async (
  repoRoot: string,
  pattern: string,
  subDir?: string,
  glob?: string,
): Promise<string> =>
  (await executeToolCall({ tool: "grep", args: { pattern, subDir, glob } }, createToolContext(repoRoot)))
    .output;

export const read = async (repoRoot: string, filePath: string, lines?: string): Promise<string> =>
  (await executeToolCall({ tool: "read", args: { path: filePath, lines } }, createToolContext(repoRoot)))
    .output;

export const listDirectory = async (
  repoRoot: string,
  dirPath: string,
  pattern?: string,
): Promise<string> =>
  (
    await executeToolCall(
      { tool: "list_directory", args: { path: dirPath, pattern } },
      createToolContext(repoRoot),
    )
  ).output;
