import { promises as fs, type Dirent } from "node:fs";
import path from "node:path";
import type { ListDirectoryArgs, ReadArgs } from "../../protocol/ToolCallTypes.js";
import type { ToolContext, ToolHandler } from "../ToolTypes.js";
import { renderLineSelection } from "./LineRanges.js";

const errorCode = (error: unknown): string | undefined => {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
};

const isInsideRoot = (root: string, candidate: string): boolean => {
  const relative = path.relative(root, candidate);
  return !(relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative));
};

/** Absolute paths under the root are kept; any other path is taken relative to the root, so `/src` means `<root>/src`. */
export const resolveRepoPath = (context: ToolContext, targetPath: string): string => {
  const absolute = path.resolve(targetPath);
  const resolved =
    path.isAbsolute(targetPath) && isInsideRoot(context.repoRoot, absolute)
      ? absolute
      : path.join(context.repoRoot, targetPath);
  if (!isInsideRoot(context.repoRoot, resolved)) {
    throw new Error(`Path is outside the repository root: ${targetPath}`);
  }
  return resolved;
};

export const readTool: ToolHandler<ReadArgs> = async (args, context) => {
  const resolved = resolveRepoPath(context, args.path);
  let content: string;
  try {
    const stats = await fs.stat(resolved);
    if (!stats.isFile()) {
      throw new Error(`Not a file: ${args.path}`);
    }
    content = await fs.readFile(resolved, "utf8");
  } catch (error) {
    const code = errorCode(error);
    if (code === "ENOENT" || code === "ENOTDIR") {
      throw new Error(`File not found: ${args.path}`);
    }
    throw error;
  }
  return { output: renderLineSelection(content, args.lines) };
};

const compilePattern = (pattern?: string): RegExp | undefined => {
  if (!pattern) return undefined;
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new Error(`Invalid pattern: ${error instanceof Error ? error.message : String(error)}`);
  }
};

export const listDirectoryTool: ToolHandler<ListDirectoryArgs> = async (args, context) => {
  const resolved = resolveRepoPath(context, args.path);
  const matcher = compilePattern(args.pattern);
  let entries: Dirent[];
  try {
    entries = await fs.readdir(resolved, { withFileTypes: true });
  } catch (error) {
    const code = errorCode(error);
    if (code === "ENOENT") throw new Error(`Directory not found: ${args.path}`);
    if (code === "ENOTDIR") throw new Error(`Not a directory: ${args.path}`);
    throw error;
  }

  const visible = entries.filter((entry) => !entry.name.startsWith("."));
  const names = visible
    .filter((entry) => !matcher || matcher.test(entry.name))
    .map((entry) => entry.name + (entry.isDirectory() ? "/" : ""))
    .sort();

  if (!names.length) {
    return { output: visible.length ? "(no entries match pattern)" : "(empty directory)" };
  }
  return { output: names.join("\n") };
};
