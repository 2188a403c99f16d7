import path from "node:path";
import process from "node:process";
import type { ConfigSource } from "../config/ConfigLoader.js";
import { createEventPrinter } from "../runtime/EventFormatter.js";
import type { SearchContextEntry, WarpGrepResult } from "../runtime/SearchTypes.js";
import { search } from "../WarpGrep.js";

export const CONTEXT_PREVIEW_LINES = 30;

export interface SearchArgs {
  query?: string;
  repo: string;
  debug: boolean;
  json: boolean;
  apiKey?: string;
  model?: string;
  baseUrl?: string;
  maxTurns?: number;
  configPath?: string;
}

const parseNumberArg = (flag: string, value?: string): number => {
  const parsed = Number(value);
  if (!value || !Number.isFinite(parsed)) {
    throw new Error(`${flag} expects a number`);
  }
  return parsed;
};

export const parseSearchArgs = (argv: string[]): SearchArgs => {
  const parsed: SearchArgs = { repo: ".", debug: false, json: false };
  const positionals: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg === "--debug" || arg === "-d") {
      parsed.debug = true;
      continue;
    }
    if (arg === "--json") {
      parsed.json = true;
      continue;
    }
    if (arg === "--api-key" && next) {
      parsed.apiKey = next;
      i += 1;
      continue;
    }
    if (arg === "--model" && next) {
      parsed.model = next;
      i += 1;
      continue;
    }
    if (arg === "--base-url" && next) {
      parsed.baseUrl = next;
      i += 1;
      continue;
    }
    if (arg === "--max-turns") {
      parsed.maxTurns = parseNumberArg(arg, next);
      i += 1;
      continue;
    }
    if (arg === "--config" && next) {
      parsed.configPath = next;
      i += 1;
      continue;
    }
    if (arg.startsWith("--")) {
      throw new Error(`Unknown option: ${arg}`);
    }
    positionals.push(arg);
  }
  if (positionals[0]) parsed.query = positionals[0];
  if (positionals[1]) parsed.repo = positionals[1];
  return parsed;
};

export const buildConfigOverrides = (args: {
  model?: string;
  baseUrl?: string;
  maxTurns?: number;
}): ConfigSource => {
  const overrides: ConfigSource = {};
  if (args.model || args.baseUrl) {
    overrides.provider = { model: args.model, baseUrl: args.baseUrl };
  }
  if (args.maxTurns !== undefined) {
    overrides.limits = { maxTurns: args.maxTurns };
  }
  return overrides;
};

export const formatElapsed = (elapsedMs: number): string => `${(elapsedMs / 1000).toFixed(1)}s`;

export const formatContext = (context: SearchContextEntry, maxLines = CONTEXT_PREVIEW_LINES): string => {
  const header = context.lines ? `${context.file} (lines ${context.lines})` : context.file;
  const lines = context.content.split("\n");
  const body = [header, "-".repeat(60), ...lines.slice(0, maxLines)];
  if (lines.length > maxLines) {
    body.push("... (truncated)");
  }
  return body.join("\n");
};

export const formatSearchReport = (result: WarpGrepResult, elapsedMs: number): string => {
  if (!result.success) {
    const lines = [`Search failed: ${result.error ?? "unknown error"}`];
    if (result.turns > 0) {
      lines.push(`Completed ${result.turns} turn(s) before failing`);
    }
    return lines.join("\n");
  }
  const contexts = result.contexts ?? [];
  const sections = [
    `Search completed in ${result.turns} turn(s) (${formatElapsed(elapsedMs)})`,
    `Found ${contexts.length} relevant code section(s):`,
    ...contexts.map((context) => formatContext(context)),
  ];
  if (result.summary) sections.push(result.summary);
  return sections.join("\n\n");
};

export const SEARCH_USAGE = "Usage: warpgrep search \"<query>\" [repo] [--debug|-d] [--json] [--api-key <key>] [--model <model>] [--base-url <url>] [--max-turns <n>] [--config <path>]";

export class SearchCommand {
  static async run(argv: string[]): Promise<void> {
    const args = parseSearchArgs(argv);
    if (!args.query) {
      throw new Error(SEARCH_USAGE);
    }

    if (!args.json) {
      process.stdout.write(
        `WarpGrep search\n  Query: "${args.query}"\n  Repo:  ${path.resolve(args.repo)}\n\n`,
      );
    }

    const startedAt = Date.now();
    const result = await search(args.query, args.repo, {
      debug: args.debug,
      apiKey: args.apiKey,
      configPath: args.configPath,
      config: buildConfigOverrides(args),
      onEvent: args.debug
        ? createEventPrinter(
            (line) => {
              process.stderr.write(`${line}\n`);
            },
            { color: !!process.stderr.isTTY && !process.env.NO_COLOR },
          )
        : undefined,
    });
    const elapsedMs = Date.now() - startedAt;

    if (args.json) {
      process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
    } else if (result.success) {
      process.stdout.write(`${formatSearchReport(result, elapsedMs)}\n`);
    } else {
      process.stderr.write(`${formatSearchReport(result, elapsedMs)}\n`);
    }

    if (!result.success) {
      process.exitCode = 1;
    }
  }
}
