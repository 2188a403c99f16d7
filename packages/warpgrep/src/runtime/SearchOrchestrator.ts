import { randomUUID } from "node:crypto";
import {
  DEFAULT_BEHAVIOR,
  DEFAULT_LIMITS,
  DEFAULT_TOOLS,
  type BehaviorConfig,
  type LimitsConfig,
  type ToolsConfig,
} from "../config/Config.js";
import {
  EMPTY_FINISH_NUDGE,
  NO_TOOL_CALLS_NUDGE,
  buildInitialMessage,
  buildSystemPrompt,
} from "../prompts/SearchPrompts.js";
import { parseTurn } from "../protocol/ToolCallParser.js";
import type { Provider, ProviderResponse } from "../providers/ProviderTypes.js";
import { scanRepoStructure } from "../tools/filesystem/RepoStructure.js";
import { createToolContext, executeToolCalls, formatToolResults } from "../tools/ToolExecutor.js";
import type { ToolContext } from "../tools/ToolTypes.js";
import { aggregateResults } from "./ResultAggregator.js";
import type { RunLogger } from "./RunLogger.js";
import { createBudgetExhaustedError, type WarpGrepErrorCode } from "./SearchErrors.js";
import { SearchSession } from "./SearchSession.js";
import type { NudgeReason, SearchEvent, SearchEventListener, WarpGrepResult } from "./SearchTypes.js";

export interface SearchOrchestratorOptions {
  provider: Provider;
  /** Absolute path; the caller checks that it exists. */
  repoRoot: string;
  limits?: Partial<LimitsConfig>;
  tools?: Partial<ToolsConfig>;
  behavior?: Partial<BehaviorConfig>;
  logger?: RunLogger;
  onEvent?: SearchEventListener;
  sessionId?: string;
}

const countLines = (output: string): number => (output ? output.split("\n").length : 0);

export class SearchOrchestrator {
  private provider: Provider;
  private repoRoot: string;
  private limits: LimitsConfig;
  private tools: ToolsConfig;
  private behavior: BehaviorConfig;
  private toolContext: ToolContext;
  private logger?: RunLogger;
  private onEvent?: SearchEventListener;
  readonly sessionId: string;

  constructor(options: SearchOrchestratorOptions) {
    this.provider = options.provider;
    this.repoRoot = options.repoRoot;
    this.limits = { ...DEFAULT_LIMITS, ...options.limits };
    this.tools = { ...DEFAULT_TOOLS, ...options.tools };
    this.behavior = { ...DEFAULT_BEHAVIOR, ...options.behavior };
    this.toolContext = createToolContext(this.repoRoot, this.tools);
    this.logger = options.logger;
    this.onEvent = options.onEvent;
    this.sessionId = options.sessionId ?? options.logger?.sessionId ?? randomUUID();
  }

  async search(query: string): Promise<WarpGrepResult> {
    const session = new SearchSession(this.sessionId, this.repoRoot);
    const { maxTurns, maxParallelCalls } = this.limits;

    const structure = await scanRepoStructure(this.repoRoot, {
      maxDepth: this.tools.structureMaxDepth,
      maxEntriesPerDir: this.tools.structureMaxEntries,
      maxLines: this.tools.structureMaxLines,
    });
    session.append({ role: "system", content: buildSystemPrompt({ maxTurns, maxParallelCalls }) });
    session.append({ role: "user", content: buildInitialMessage(structure, query) });
    await this.emit({
      type: "session_start",
      sessionId: session.sessionId,
      repoRoot: this.repoRoot,
      query,
      maxTurns,
    });

    while (session.turn < maxTurns) {
      const turn = session.beginTurn();
      await this.emit({ type: "turn_start", turn, maxTurns });

      let response: ProviderResponse;
      try {
        response = await this.provider.generate({
          messages: session.snapshot(),
          maxTokens: this.limits.maxTokens,
          temperature: this.limits.temperature,
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return this.fail(session, "transport", message, turn);
      }

      const content = response.message.content ?? "";
      session.append({ role: "assistant", content });
      await this.emit({ type: "model_response", turn, content, usage: response.usage });

      const parsed = parseTurn(content, { maxParallelCalls });
      await this.emit({
        type: "tool_calls_parsed",
        turn,
        tools: [...parsed.calls, ...(parsed.finish ? [parsed.finish] : [])].map((call) => call.tool),
        issues: parsed.issues,
      });

      if (parsed.finish) {
        const { files } = parsed.finish.args;
        if (files.length > 0 || this.behavior.emptyFinish === "accept") {
          const result = await aggregateResults(files, this.toolContext, turn);
          await this.emit({ type: "finished", turn, contexts: files.length });
          await this.writeTranscript(session);
          return result;
        }
        await this.nudge(session, turn, "empty_finish");
        continue;
      }

      if (parsed.calls.length === 0) {
        await this.nudge(session, turn, "no_tool_calls");
        continue;
      }

      const results = await executeToolCalls(parsed.calls, this.toolContext);
      const feedback = formatToolResults(results);
      session.append({ role: "user", content: feedback });
      await this.emit({
        type: "tool_results",
        turn,
        results: results.map((result) => ({
          tool: result.call.tool,
          ok: result.ok,
          lines: countLines(result.output),
        })),
        content: feedback,
      });
    }

    const exhausted = createBudgetExhaustedError(maxTurns);
    return this.fail(session, exhausted.code, exhausted.message, maxTurns);
  }

  private async nudge(session: SearchSession, turn: number, reason: NudgeReason): Promise<void> {
    session.append({
      role: "user",
      content: reason === "empty_finish" ? EMPTY_FINISH_NUDGE : NO_TOOL_CALLS_NUDGE,
    });
    await this.emit({ type: "nudge", turn, reason });
  }

  private async fail(
    session: SearchSession,
    errorKind: WarpGrepErrorCode,
    error: string,
    turns: number,
  ): Promise<WarpGrepResult> {
    await this.emit({ type: "failed", turn: turns, errorKind, error });
    await this.writeTranscript(session);
    return { success: false, error, errorKind, turns };
  }

  private async emit(event: SearchEvent): Promise<void> {
    this.onEvent?.(event);
    await this.withLogger((logger) => logger.record(event));
  }

  private async writeTranscript(session: SearchSession): Promise<void> {
    await this.withLogger((logger) => logger.writeTranscript(session.messages));
  }

  /** A log write failure drops the logger for the rest of the session and is reported once. */
  private async withLogger(write: (logger: RunLogger) => Promise<unknown>): Promise<void> {
    const logger = this.logger;
    if (!logger) return;
    try {
      await write(logger);
    } catch (error) {
      this.logger = undefined;
      this.onEvent?.({ type: "log_failed", error: error instanceof Error ? error.message : String(error) });
    }
  }
}
