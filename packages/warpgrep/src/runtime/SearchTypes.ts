import type { ParseIssue, ToolName } from "../protocol/ToolCallTypes.js";
import type { ProviderUsage } from "../providers/ProviderTypes.js";
import type { WarpGrepErrorCode } from "./SearchErrors.js";

export interface SearchContextEntry {
  file: string;
  content: string;
  lines?: string;
}

export interface WarpGrepResult {
  success: boolean;
  contexts?: SearchContextEntry[];
  summary?: string;
  error?: string;
  errorKind?: WarpGrepErrorCode;
  turns: number;
}

export type NudgeReason = "no_tool_calls" | "empty_finish";

export type SearchEvent =
  | { type: "session_start"; sessionId: string; repoRoot: string; query: string; maxTurns: number }
  | { type: "turn_start"; turn: number; maxTurns: number }
  | { type: "model_response"; turn: number; content: string; usage?: ProviderUsage }
  | {
      type: "tool_calls_parsed";
      turn: number;
      tools: ToolName[];
      issues: ParseIssue[];
    }
  | {
      type: "tool_results";
      turn: number;
      results: Array<{ tool: ToolName; ok: boolean; lines: number }>;
      content: string;
    }
  | { type: "nudge"; turn: number; reason: NudgeReason }
  | { type: "finished"; turn: number; contexts: number }
  | { type: "failed"; turn: number; errorKind: WarpGrepErrorCode; error: string }
  | { type: "log_failed"; error: string };

export type SearchEventListener = (event: SearchEvent) => void;
