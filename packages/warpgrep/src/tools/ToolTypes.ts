import type { ExecutableToolCall } from "../protocol/ToolCallTypes.js";

export interface ToolContext {
  repoRoot: string;
  grepTimeoutMs: number;
  grepMaxLines: number;
  grepContextLines: number;
}

export interface ToolHandlerResult {
  output: string;
}

export interface ToolExecutionResult extends ToolHandlerResult {
  call: ExecutableToolCall;
  ok: boolean;
}

export type ToolHandler<TArgs> = (args: TArgs, context: ToolContext) => Promise<ToolHandlerResult>;
