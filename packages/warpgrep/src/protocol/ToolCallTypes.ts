export interface GrepArgs {
  pattern: string;
  subDir?: string;
  glob?: string;
}

export interface ReadArgs {
  path: string;
  lines?: string;
}

export interface ListDirectoryArgs {
  path: string;
  pattern?: string;
}

export interface FinishFile {
  path: string;
  lines?: string;
}

export interface FinishArgs {
  files: FinishFile[];
}

export type GrepCall = { tool: "grep"; args: GrepArgs };
export type ReadCall = { tool: "read"; args: ReadArgs };
export type ListDirectoryCall = { tool: "list_directory"; args: ListDirectoryArgs };
export type FinishCall = { tool: "finish"; args: FinishArgs };

export type ExecutableToolCall = GrepCall | ReadCall | ListDirectoryCall;
export type ToolCall = ExecutableToolCall | FinishCall;
export type ToolName = ToolCall["tool"];

export type ParseIssueReason =
  | "missing_pattern"
  | "missing_path"
  | "finish_file_missing_path"
  | "extra_finish"
  | "over_parallel_limit";

export interface ParseIssue {
  tag: string;
  reason: ParseIssueReason;
  snippet: string;
}

export interface ParsedTurn {
  /** Non-finish calls in the order their tags appear, capped at the parallel limit. */
  calls: ExecutableToolCall[];
  finish?: FinishCall;
  issues: ParseIssue[];
}
