export interface LineRange {
  start: number;
  end: number;
}

export type LineSelection = { kind: "all" } | { kind: "ranges"; ranges: LineRange[] };

const RANGE_TOKEN = /^(\d+)\s*(?:-\s*(\d*))?$/;

/**
 * Parses a selection such as "1-50,75-80". Missing or "*" selects the whole file;
 * a bare number selects one line; tokens that are not ranges are ignored.
 */
export const parseLineRanges = (selector?: string): LineSelection => {
  const trimmed = selector?.trim();
  if (!trimmed || trimmed === "*") return { kind: "all" };
  const ranges: LineRange[] = [];
  for (const token of trimmed.split(",")) {
    const match = token.trim().match(RANGE_TOKEN);
    if (!match) continue;
    const first = Number(match[1]);
    const second = match[2] ? Number(match[2]) : first;
    ranges.push({ start: Math.min(first, second), end: Math.max(first, second) });
  }
  return { kind: "ranges", ranges };
};

export const clampRange = (range: LineRange, totalLines: number): LineRange | undefined => {
  const start = Math.max(1, range.start);
  const end = Math.min(totalLines, range.end);
  return start <= end ? { start, end } : undefined;
};

export const splitLines = (content: string): string[] => {
  if (content === "") return [];
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
};

const numbered = (lines: string[], index: number): string => `${index + 1}|${lines[index]}`;

export const renderLineSelection = (content: string, selector?: string): string => {
  const lines = splitLines(content);
  const selection = parseLineRanges(selector);
  if (selection.kind === "all") {
    if (!lines.length) return "(empty file)";
    return lines.map((_, index) => numbered(lines, index)).join("\n");
  }

  const output: string[] = [];
  for (const range of selection.ranges) {
    const clamped = clampRange(range, lines.length);
    if (!clamped) continue;
    for (let index = clamped.start - 1; index < clamped.end; index += 1) {
      output.push(numbered(lines, index));
    }
  }
  if (!output.length) {
    return `(no lines in range ${selector?.trim() ?? ""}; file has ${lines.length} lines)`;
  }
  return output.join("\n");
};
