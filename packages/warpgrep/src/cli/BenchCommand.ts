import path from "node:path";
import process from "node:process";
import type { WarpGrepResult } from "../runtime/SearchTypes.js";
import { search, type SearchOptions } from "../WarpGrep.js";
import { buildConfigOverrides, formatElapsed } from "./SearchCommand.js";

export const DEFAULT_BENCH_QUERIES = [
  "Find the main entry point",
  "Find authentication logic",
  "Find where configuration is handled",
  "Find error handling patterns",
];

export interface BenchArgs {
  repo: string;
  queries: string[];
  apiKey?: string;
  model?: string;
  baseUrl?: string;
  configPath?: string;
}

export interface BenchOutcome {
  query: string;
  elapsedMs: number;
  /** Undefined when the search threw instead of returning a result. */
  result?: WarpGrepResult;
}

export const parseBenchArgs = (argv: string[]): BenchArgs => {
  const parsed: BenchArgs = { repo: ".", queries: [] };
  const positionals: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg === "--query" && next) {
      parsed.queries.push(next);
      i += 1;
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
  if (positionals[0]) parsed.repo = positionals[0];
  if (parsed.queries.length === 0) parsed.queries = [...DEFAULT_BENCH_QUERIES];
  return parsed;
};

export const BENCH_TABLE_HEADER = [
  "| Query                              | Result | Time   | Files |",
  "|------------------------------------|--------|--------|-------|",
];

export const formatBenchRow = (outcome: BenchOutcome): string => {
  const status = outcome.result?.success ? "pass" : "fail";
  const files = outcome.result ? String(outcome.result.contexts?.length ?? 0) : "ERR";
  return `| ${outcome.query.padEnd(34)} | ${status.padEnd(6)} | ${formatElapsed(outcome.elapsedMs).padEnd(6)} | ${files.padEnd(5)} |`;
};

export const runBench = async (
  args: BenchArgs,
  options: Pick<SearchOptions, "provider" | "env" | "cwd"> = {},
  onOutcome?: (outcome: BenchOutcome) => void,
): Promise<BenchOutcome[]> => {
  const outcomes: BenchOutcome[] = [];
  for (const query of args.queries) {
    const startedAt = Date.now();
    let result: WarpGrepResult | undefined;
    try {
      result = await search(query, args.repo, {
        ...options,
        apiKey: args.apiKey,
        configPath: args.configPath,
        config: buildConfigOverrides(args),
      });
    } catch (error) {
      process.stderr.write(
        `${query}: ${error instanceof Error ? error.message : String(error)}\n`,
      );
    }
    const outcome: BenchOutcome = { query, elapsedMs: Date.now() - startedAt, result };
    outcomes.push(outcome);
    onOutcome?.(outcome);
  }
  return outcomes;
};

export class BenchCommand {
  static async run(argv: string[]): Promise<void> {
    const args = parseBenchArgs(argv);
    const rule = "=".repeat(70);
    const write = (line: string) => {
      process.stdout.write(`${line}\n`);
    };

    write(rule);
    write("WARPGREP BENCH");
    write(rule);
    write(`Repo: ${path.resolve(args.repo)}`);
    write(`${rule}\n`);
    BENCH_TABLE_HEADER.forEach(write);

    const outcomes = await runBench(args, {}, (outcome) => write(formatBenchRow(outcome)));
    const passed = outcomes.filter((outcome) => outcome.result?.success).length;
    const failed = outcomes.length - passed;

    write(`\n${rule}`);
    write(`Results: ${passed} passed, ${failed} failed`);
    write(rule);

    if (failed > 0) {
      process.exitCode = 1;
    }
  }
}
