#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { BenchCommand } from "./cli/BenchCommand.js";
import { SearchCommand } from "./cli/SearchCommand.js";

export const HELP_TEXT =
  "Usage: warpgrep search \"<query>\" [repo] [options]\n" +
  "   or: warpgrep bench [repo] [--query <q>]...\n" +
  "\n" +
  "Commands:\n" +
  "  search   Run one agentic code search and print the relevant code sections.\n" +
  "  bench    Run a query set against a repository and print a result table.\n" +
  "\n" +
  "Options:\n" +
  "  --debug, -d        Print turn-by-turn diagnostics to stderr\n" +
  "  --json             Print the raw result as JSON\n" +
  "  --api-key <key>    Model API key (default: MORPH_API_KEY)\n" +
  "  --model <model>    Model name\n" +
  "  --base-url <url>   OpenAI-compatible endpoint\n" +
  "  --max-turns <n>    Turn budget\n" +
  "  --config <path>    Config file (default: warpgrep.config.* in the cwd)\n" +
  "  --help, -h         Show help\n" +
  "  --version, -v      Show version\n";

const resolveReal = (value: string): string => {
  try {
    return fs.realpathSync(value);
  } catch {
    return path.resolve(value);
  }
};

export const readVersion = (): string => {
  const pkgJson = path.resolve(fileURLToPath(import.meta.url), "..", "..", "package.json");
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(pkgJson, "utf8"));
    if (typeof parsed === "object" && parsed !== null && "version" in parsed) {
      return typeof parsed.version === "string" ? parsed.version : "dev";
    }
    return "dev";
  } catch {
    return "dev";
  }
};

export const runCli = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  if (argv.includes("--help") || argv.includes("-h") || argv.length === 0) {
    // eslint-disable-next-line no-console
    console.log(HELP_TEXT);
    return;
  }

  const [command, ...rest] = argv;
  if (command === "--version" || command === "-v" || command === "version") {
    // eslint-disable-next-line no-console
    console.log(readVersion());
    return;
  }

  if (command === "search") {
    await SearchCommand.run(rest);
    return;
  }

  if (command === "bench") {
    await BenchCommand.run(rest);
    return;
  }

  throw new Error(HELP_TEXT);
};

const isMain = (() => {
  const scriptPath = process.argv[1];
  if (!scriptPath) return false;
  const current = fileURLToPath(import.meta.url);
  return resolveReal(scriptPath) === resolveReal(current);
})();

if (isMain) {
  runCli().catch((error) => {
    // eslint-disable-next-line no-console
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
}
