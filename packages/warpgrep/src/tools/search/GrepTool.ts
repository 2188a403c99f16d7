import { spawn } from "node:child_process";
import path from "node:path";
import type { GrepArgs } from "../../protocol/ToolCallTypes.js";
import { resolveRepoPath } from "../filesystem/FileTools.js";
import type { ToolHandler } from "../ToolTypes.js";

export const NO_MATCHES = "No matches found";

export type SearchProcessStatus = "ok" | "no_matches" | "unavailable" | "timeout" | "failed";

export interface SearchProcessOutcome {
  status: SearchProcessStatus;
  lines: string[];
  error?: string;
}

export interface SearchProcessOptions {
  timeoutMs: number;
  maxLines: number;
}

/**
 * Runs a search command and collects at most `maxLines` lines of stdout. The child
 * is killed once the cap or the timeout is reached. Exit code 1 means no matches,
 * as for both rg and grep.
 */
export const runSearchProcess = (
  command: string,
  args: string[],
  cwd: string,
  options: SearchProcessOptions,
): Promise<SearchProcessOutcome> =>
  new Promise((resolve) => {
    const child = spawn(command, args, { cwd, stdio: ["ignore", "pipe", "pipe"] });
    const lines: string[] = [];
    let pending = "";
    let stderr = "";
    let truncated = false;
    let timedOut = false;
    let settled = false;

    const settle = (outcome: SearchProcessOutcome): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(outcome);
    };

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, options.timeoutMs);

    child.stdout.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      if (truncated) return;
      pending += chunk;
      const parts = pending.split("\n");
      pending = parts.pop() ?? "";
      for (const part of parts) {
        lines.push(part);
        if (lines.length >= options.maxLines) {
          truncated = true;
          child.kill();
          return;
        }
      }
    });
    child.stderr.setEncoding("utf8");
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.on("error", (error: NodeJS.ErrnoException) => {
      settle({
        status: error.code === "ENOENT" ? "unavailable" : "failed",
        lines: [],
        error: error.message,
      });
    });

    child.on("close", (code) => {
      if (!truncated && pending) lines.push(pending);
      if (timedOut) {
        settle({ status: "timeout", lines });
        return;
      }
      if (truncated || code === 0) {
        settle({ status: lines.length ? "ok" : "no_matches", lines });
        return;
      }
      if (code === 1) {
        settle({ status: "no_matches", lines: [] });
        return;
      }
      // rg exits 2 on unreadable files even when it found matches.
      if (lines.length) {
        settle({ status: "ok", lines });
        return;
      }
      settle({ status: "failed", lines, error: stderr.trim() || `exited with code ${String(code)}` });
    });
  });

const ripgrepArgs = (args: GrepArgs, target: string, contextLines: number): string[] => {
  const argv = [
    "--line-number",
    "--with-filename",
    "--no-heading",
    "--color",
    "never",
    "-C",
    String(contextLines),
  ];
  if (args.glob) {
    argv.push("--glob", args.glob);
  }
  argv.push("-e", args.pattern, "--", target);
  return argv;
};

/** Hidden files and directories are skipped, as rg does; `.?*` leaves the `.` target itself searchable. */
export const grepFallbackArgs = (args: GrepArgs, target: string, contextLines: number): string[] => {
  const argv = [
    "-rnHE",
    "-C",
    String(contextLines),
    "--binary-files=without-match",
    "--exclude=.?*",
    "--exclude-dir=.?*",
    "--exclude-dir=node_modules",
  ];
  if (args.glob) {
    argv.push(`--include=${args.glob}`);
  }
  argv.push("-e", args.pattern, "--", target);
  return argv;
};

const stripDotSlash = (line: string): string => (line.startsWith("./") ? line.slice(2) : line);

export const grepTool: ToolHandler<GrepArgs> = async (args, context) => {
  const target = args.subDir
    ? path.relative(context.repoRoot, resolveRepoPath(context, args.subDir)) || "."
    : ".";
  const options = { timeoutMs: context.grepTimeoutMs, maxLines: context.grepMaxLines };

  let outcome = await runSearchProcess(
    "rg",
    ripgrepArgs(args, target, context.grepContextLines),
    context.repoRoot,
    options,
  );
  if (outcome.status === "unavailable") {
    outcome = await runSearchProcess(
      "grep",
      grepFallbackArgs(args, target, context.grepContextLines),
      context.repoRoot,
      options,
    );
  }

  switch (outcome.status) {
    case "ok":
      return { output: outcome.lines.map(stripDotSlash).join("\n") };
    case "no_matches":
      return { output: NO_MATCHES };
    case "timeout":
      throw new Error(`grep timed out after ${context.grepTimeoutMs}ms`);
    case "unavailable":
      throw new Error("No search engine available (install ripgrep or grep)");
    case "failed":
      throw new Error(`grep failed: ${outcome.error ?? "unknown error"}`);
  }
};
