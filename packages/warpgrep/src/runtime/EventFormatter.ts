import type { SearchEvent, SearchEventListener } from "./SearchTypes.js";

export interface EventFormatterOptions {
  color?: boolean;
  /** Maximum characters of model and tool content echoed per event. */
  previewChars?: number;
}

const DEFAULT_PREVIEW_CHARS = 500;

const preview = (content: string, limit: number): string =>
  content.length > limit ? `${content.slice(0, limit)}...` : content;

export const formatSearchEvent = (event: SearchEvent, options: EventFormatterOptions = {}): string[] => {
  const colorize = (code: string, text: string) =>
    options.color ? `\u001b[${code}m${text}\u001b[0m` : text;
  const limit = options.previewChars ?? DEFAULT_PREVIEW_CHARS;
  const indent = "  ";

  switch (event.type) {
    case "session_start":
      return [colorize("36", `[session] ${event.sessionId} ${event.repoRoot}`)];
    case "turn_start":
      return [colorize("36", `[turn ${event.turn}/${event.maxTurns}]`)];
    case "model_response":
      return [`${indent}${colorize("35", "[model]")}`, preview(event.content, limit)];
    case "tool_calls_parsed": {
      const lines = [
        `${indent}${colorize("34", "[parsed]")} ${event.tools.length} call(s): ${event.tools.join(", ") || "none"}`,
      ];
      for (const issue of event.issues) {
        lines.push(`${indent}${colorize("33", "[issue]")} <${issue.tag}> ${issue.reason}`);
      }
      return lines;
    }
    case "tool_results": {
      const lines = event.results.map((result) => {
        const outcome = result.ok ? colorize("32", "ok") : colorize("31", "error");
        return `${indent}${colorize("34", `[tool:${result.tool}]`)} ${outcome} (${result.lines} lines)`;
      });
      lines.push(preview(event.content, limit));
      return lines;
    }
    case "nudge":
      return [`${indent}${colorize("33", "[nudge]")} ${event.reason}`];
    case "finished":
      return [colorize("32", `[finished] ${event.contexts} context(s) at turn ${event.turn}`)];
    case "failed":
      return [colorize("31", `[failed] ${event.errorKind}: ${event.error}`)];
    case "log_failed":
      return [colorize("33", `[log] disabled: ${event.error}`)];
  }
};

export const createEventPrinter = (
  write: (line: string) => void,
  options: EventFormatterOptions = {},
): SearchEventListener => {
  return (event) => {
    for (const line of formatSearchEvent(event, options)) {
      write(line);
    }
  };
};
