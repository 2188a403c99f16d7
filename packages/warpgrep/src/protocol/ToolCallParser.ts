import type {
  ExecutableToolCall,
  FinishCall,
  FinishFile,
  ParseIssue,
  ParsedTurn,
  ToolCall,
} from "./ToolCallTypes.js";

export const DEFAULT_MAX_PARALLEL_CALLS = 8;

export interface ParseOptions {
  maxParallelCalls?: number;
}

interface TagBlock {
  index: number;
  tag: string;
  inner: string;
  raw: string;
}

const GREP_BLOCK = /<(grep)>([\s\S]*?)<\/grep>/gi;
const READ_BLOCK = /<(read(?:-parallel)?)>([\s\S]*?)<\/read(?:-parallel)?>/gi;
const LIST_DIRECTORY_BLOCK = /<(list_directory)>([\s\S]*?)<\/list_directory>/gi;
const FINISH_BLOCK = /<(finish)>([\s\S]*?)<\/finish>/gi;
const FILE_BLOCK = /<(file)>([\s\S]*?)<\/file>/gi;

const SNIPPET_LIMIT = 120;

const snippetOf = (raw: string): string => {
  const flat = raw.replace(/\s+/g, " ").trim();
  return flat.length > SNIPPET_LIMIT ? `${flat.slice(0, SNIPPET_LIMIT)}...` : flat;
};

const collectBlocks = (content: string, pattern: RegExp): TagBlock[] => {
  const blocks: TagBlock[] = [];
  for (const match of content.matchAll(pattern)) {
    blocks.push({
      index: match.index ?? 0,
      tag: (match[1] ?? "").toLowerCase(),
      inner: match[2] ?? "",
      raw: match[0],
    });
  }
  return blocks;
};

const readField = (inner: string, name: string): string | undefined => {
  const match = inner.match(new RegExp(`<${name}>([\\s\\S]*?)</${name}>`, "i"));
  const value = match?.[1]?.trim();
  return value ? value : undefined;
};

const toExecutableCall = (
  block: TagBlock,
  issues: ParseIssue[],
): ExecutableToolCall | undefined => {
  if (block.tag === "grep") {
    const pattern = readField(block.inner, "pattern");
    if (!pattern) {
      issues.push({ tag: block.tag, reason: "missing_pattern", snippet: snippetOf(block.raw) });
      return undefined;
    }
    return {
      tool: "grep",
      args: {
        pattern,
        subDir: readField(block.inner, "sub_dir"),
        glob: readField(block.inner, "glob"),
      },
    };
  }

  const path = readField(block.inner, "path");
  if (!path) {
    issues.push({ tag: block.tag, reason: "missing_path", snippet: snippetOf(block.raw) });
    return undefined;
  }
  if (block.tag === "list_directory") {
    return { tool: "list_directory", args: { path, pattern: readField(block.inner, "pattern") } };
  }
  return { tool: "read", args: { path, lines: readField(block.inner, "lines") } };
};

const toFinishCall = (block: TagBlock, issues: ParseIssue[]): FinishCall => {
  const files: FinishFile[] = [];
  for (const fileBlock of collectBlocks(block.inner, FILE_BLOCK)) {
    const path = readField(fileBlock.inner, "path");
    if (!path) {
      issues.push({
        tag: "file",
        reason: "finish_file_missing_path",
        snippet: snippetOf(fileBlock.raw),
      });
      continue;
    }
    files.push({ path, lines: readField(fileBlock.inner, "lines") });
  }
  return { tool: "finish", args: { files } };
};

/**
 * Extracts the tool calls from one model turn. Malformed or unclosed tags are
 * skipped; the parser never throws.
 */
export const parseTurn = (content: string, options: ParseOptions = {}): ParsedTurn => {
  const maxParallelCalls = options.maxParallelCalls ?? DEFAULT_MAX_PARALLEL_CALLS;
  const issues: ParseIssue[] = [];

  const blocks = [
    ...collectBlocks(content, GREP_BLOCK),
    ...collectBlocks(content, READ_BLOCK),
    ...collectBlocks(content, LIST_DIRECTORY_BLOCK),
  ].sort((a, b) => a.index - b.index);

  const calls: ExecutableToolCall[] = [];
  for (const block of blocks) {
    const call = toExecutableCall(block, issues);
    if (!call) continue;
    if (calls.length >= maxParallelCalls) {
      issues.push({ tag: block.tag, reason: "over_parallel_limit", snippet: snippetOf(block.raw) });
      continue;
    }
    calls.push(call);
  }

  const [firstFinish, ...extraFinishes] = collectBlocks(content, FINISH_BLOCK);
  for (const extra of extraFinishes) {
    issues.push({ tag: extra.tag, reason: "extra_finish", snippet: snippetOf(extra.raw) });
  }
  const finish = firstFinish ? toFinishCall(firstFinish, issues) : undefined;

  return { calls, finish, issues };
};

export const parseToolCalls = (content: string, options: ParseOptions = {}): ToolCall[] => {
  const { calls, finish } = parseTurn(content, options);
  return finish ? [...calls, finish] : calls;
};
