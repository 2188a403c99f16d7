import { promises as fs, type Dirent } from "node:fs";
import path from "node:path";

export const IGNORED_DIRECTORIES = ["node_modules", "__pycache__", "dist", "build", ".git"];

export interface RepoStructureOptions {
  maxDepth?: number;
  maxEntriesPerDir?: number;
  maxLines?: number;
}

interface StructureEntry {
  name: string;
  fullPath: string;
  isDirectory: boolean;
}

const toStructureEntry = async (dir: string, entry: Dirent): Promise<StructureEntry> => {
  const fullPath = path.join(dir, entry.name);
  if (!entry.isSymbolicLink()) {
    return { name: entry.name, fullPath, isDirectory: entry.isDirectory() };
  }
  try {
    const stats = await fs.stat(fullPath);
    return { name: entry.name, fullPath, isDirectory: stats.isDirectory() };
  } catch {
    // dangling link
    return { name: entry.name, fullPath, isDirectory: false };
  }
};

const compareEntries = (a: StructureEntry, b: StructureEntry): number => {
  if (a.isDirectory !== b.isDirectory) return a.isDirectory ? -1 : 1;
  return a.name.localeCompare(b.name);
};

const readEntries = async (dir: string): Promise<StructureEntry[]> => {
  let dirents: Dirent[];
  try {
    dirents = await fs.readdir(dir, { withFileTypes: true });
  } catch {
    return [];
  }
  const visible = dirents.filter(
    (entry) => !entry.name.startsWith(".") && !IGNORED_DIRECTORIES.includes(entry.name),
  );
  const entries = await Promise.all(visible.map((entry) => toStructureEntry(dir, entry)));
  return entries.sort(compareEntries);
};

const realPathOf = async (dir: string): Promise<string> => {
  try {
    return await fs.realpath(dir);
  } catch {
    return path.resolve(dir);
  }
};

/**
 * Indented tree of the repository, directories first. Bounded by depth, by entries
 * per directory and by total lines; each real directory is visited at most once.
 */
export const scanRepoStructure = async (
  repoRoot: string,
  options: RepoStructureOptions = {},
): Promise<string> => {
  const maxDepth = options.maxDepth ?? 3;
  const maxEntriesPerDir = options.maxEntriesPerDir ?? 20;
  const maxLines = options.maxLines ?? 100;
  const lines: string[] = [`${path.basename(repoRoot)}/`];
  const visited = new Set<string>();

  const walk = async (dir: string, depth: number, indent: string): Promise<void> => {
    if (depth > maxDepth || lines.length >= maxLines) return;
    const realDir = await realPathOf(dir);
    if (visited.has(realDir)) return;
    visited.add(realDir);

    const entries = await readEntries(dir);
    for (const entry of entries.slice(0, maxEntriesPerDir)) {
      if (lines.length >= maxLines) return;
      lines.push(`${indent}${entry.name}${entry.isDirectory ? "/" : ""}`);
      if (entry.isDirectory) {
        await walk(entry.fullPath, depth + 1, `${indent}  `);
      }
    }
  };

  await walk(repoRoot, 1, "  ");
  return lines.slice(0, maxLines).join("\n");
};
