import { readFile, stat } from "node:fs/promises";

export type LineEnding = "lf" | "crlf" | "mixed" | "none";

export interface DiffOp {
  type: "equal" | "remove" | "add";
  line: string;
}

// Above this many DP cells the diff falls back to a multiset comparison.
const MAX_LCS_CELLS = 25_000_000;

export async function fileExists(path: string | undefined): Promise<boolean> {
  if (!path) return false;
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

export async function readText(path: string): Promise<string> {
  return readFile(path, "utf-8");
}

/** Lines without terminators; a trailing newline does not open a new line. */
export function splitLines(text: string): string[] {
  if (text === "") return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

export function countLines(text: string): number {
  return splitLines(text).length;
}

export function lineEnding(text: string): LineEnding {
  const crlf = (text.match(/\r\n/g) ?? []).length;
  const lf = (text.match(/\n/g) ?? []).length - crlf;
  if (crlf === 0 && lf === 0) return "none";
  if (crlf > 0 && lf > 0) return "mixed";
  return crlf > 0 ? "crlf" : "lf";
}

export function countOccurrences(text: string, needle: string): number {
  if (needle === "") return 0;
  let count = 0;
  let from = 0;
  for (;;) {
    const at = text.indexOf(needle, from);
    if (at === -1) return count;
    count++;
    from = at + needle.length;
  }
}

/** Line diff based on the longest common subsequence. */
export function diffLines(oldLines: string[], newLines: string[]): DiffOp[] {
  let start = 0;
  while (start < oldLines.length && start < newLines.length && oldLines[start] === newLines[start]) {
    start++;
  }
  let oldEnd = oldLines.length;
  let newEnd = newLines.length;
  while (oldEnd > start && newEnd > start && oldLines[oldEnd - 1] === newLines[newEnd - 1]) {
    oldEnd--;
    newEnd--;
  }

  const head: DiffOp[] = oldLines.slice(0, start).map((line) => ({ type: "equal", line }));
  const tail: DiffOp[] = oldLines.slice(oldEnd).map((line) => ({ type: "equal", line }));
  const a = oldLines.slice(start, oldEnd);
  const b = newLines.slice(start, newEnd);

  const middle =
    (a.length + 1) * (b.length + 1) > MAX_LCS_CELLS ? coarseDiff(a, b) : lcsDiff(a, b);
  return [...head, ...middle, ...tail];
}

export function countChangedLines(ops: DiffOp[]): number {
  return ops.filter((op) => op.type !== "equal").length;
}

function lcsDiff(a: string[], b: string[]): DiffOp[] {
  const cols = b.length + 1;
  const table = new Uint32Array((a.length + 1) * cols);
  for (let i = a.length - 1; i >= 0; i--) {
    for (let j = b.length - 1; j >= 0; j--) {
      table[i * cols + j] =
        a[i] === b[j]
          ? table[(i + 1) * cols + j + 1] + 1
          : Math.max(table[(i + 1) * cols + j], table[i * cols + j + 1]);
    }
  }

  const ops: DiffOp[] = [];
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    if (a[i] === b[j]) {
      ops.push({ type: "equal", line: a[i] });
      i++;
      j++;
    } else if (table[(i + 1) * cols + j] >= table[i * cols + j + 1]) {
      ops.push({ type: "remove", line: a[i] });
      i++;
    } else {
      ops.push({ type: "add", line: b[j] });
      j++;
    }
  }
  for (; i < a.length; i++) ops.push({ type: "remove", line: a[i] });
  for (; j < b.length; j++) ops.push({ type: "add", line: b[j] });
  return ops;
}

function coarseDiff(a: string[], b: string[]): DiffOp[] {
  const pool = new Map<string, number>();
  for (const line of b) pool.set(line, (pool.get(line) ?? 0) + 1);

  const ops: DiffOp[] = [];
  for (const line of a) {
    const left = pool.get(line) ?? 0;
    if (left > 0) {
      pool.set(line, left - 1);
      ops.push({ type: "equal", line });
    } else {
      ops.push({ type: "remove", line });
    }
  }
  for (const [line, left] of pool) {
    for (let k = 0; k < left; k++) ops.push({ type: "add", line });
  }
  return ops;
}

export function renderDiff(ops: DiffOp[], oldLabel: string, newLabel: string): string {
  const body = ops.map((op) => {
    if (op.type === "remove") return `-${op.line}`;
    if (op.type === "add") return `+${op.line}`;
    return ` ${op.line}`;
  });
  return [`--- ${oldLabel}`, `+++ ${newLabel}`, ...body].join("\n") + "\n";
}
