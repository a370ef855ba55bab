import { structuredPatch } from "diff";
import { DiffLine } from "../change.js";

export const MAX_DIFF_SIZE = 250;
const SAMPLE_SIZE = 10;
const FILE_HEADERS = new Set(["---", "+++"]);

/** `start,count`, shortened to `start` for a single line. */
function formatRange(start: number, count: number): string {
  if (count === 1) {
    return String(start);
  }
  return `${count === 0 ? start - 1 : start},${count}`;
}

/**
 * Raw unified diff lines (3 lines of context) with the file headers reduced
 * to bare `---` / `+++` markers.
 */
export function unifiedDiffLines(from: string, to: string): string[] {
  const patch = structuredPatch("", "", from, to, "", "", { context: 3 });
  const lines = ["---", "+++"];
  for (const hunk of patch.hunks) {
    const oldRange = formatRange(hunk.oldStart, hunk.oldLines);
    const newRange = formatRange(hunk.newStart, hunk.newLines);
    lines.push(`@@ -${oldRange} +${newRange} @@`);
    lines.push(...hunk.lines);
  }
  return lines;
}

function formatLines(raw: readonly string[]): DiffLine[] {
  const formatted: DiffLine[] = [];
  for (const line of raw) {
    if (FILE_HEADERS.has(line)) {
      continue;
    }
    if (line.startsWith("@@")) {
      formatted.push(DiffLine.header(line));
    } else if (line.startsWith("-")) {
      formatted.push(DiffLine.remove(line.slice(1)));
    } else if (line.startsWith("+")) {
      formatted.push(DiffLine.add(line.slice(1)));
    } else if (line.startsWith(" ")) {
      formatted.push(DiffLine.neutral(line.slice(1)));
    } else if (line.startsWith("\\")) {
      formatted.push(DiffLine.detail(line));
    }
  }
  return formatted;
}

function countPrefixed(raw: readonly string[], prefix: string): number {
  return raw.filter((line) => !FILE_HEADERS.has(line) && line.startsWith(prefix)).length;
}

/**
 * The diff lines shown for a text content change. Diffs over
 * MAX_DIFF_SIZE raw lines are replaced by a summary with a sample of the
 * first and last lines.
 */
export function contentDiff(from: string, to: string): DiffLine[] {
  const raw = unifiedDiffLines(from, to);

  let lines: DiffLine[];
  if (raw.length > MAX_DIFF_SIZE) {
    lines = [
      DiffLine.neutral("Diff too long to be shown. Summary:"),
      DiffLine.add(`${countPrefixed(raw, "+")} lines`),
      DiffLine.remove(`${countPrefixed(raw, "-")} lines`),
      DiffLine.neutral("Sample:"),
      ...formatLines(raw.slice(0, SAMPLE_SIZE)),
      DiffLine.detail("8< -------------------------------"),
      ...formatLines(raw.slice(-SAMPLE_SIZE))
    ];
  } else {
    lines = formatLines(raw);
  }

  if (lines.length === 0) {
    lines.push(DiffLine.detail("<only whitespace changes>"));
  }
  return lines;
}

export function byteDelta(delta: number): string {
  return delta > 0 ? `+${delta}` : String(delta);
}
