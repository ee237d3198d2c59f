export type Extraction =
  | { found: true; value: number | string; raw: string }
  | { found: false };

export class PatternError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PatternError";
  }
}

const NUMERIC = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

export function countCaptureGroups(source: string): number {
  const match = new RegExp(`(?:${source})|`).exec("");
  return (match?.length ?? 1) - 1;
}

/** Compiles a pattern that must carry exactly one capturing group. */
export function compilePattern(source: string): RegExp {
  let regex: RegExp;
  try {
    regex = new RegExp(source);
  } catch (e) {
    throw new PatternError(
      `Invalid regular expression /${source}/: ${e instanceof Error ? e.message : String(e)}`
    );
  }
  const groups = countCaptureGroups(source);
  if (groups !== 1) {
    throw new PatternError(`Pattern /${source}/ must have exactly one capturing group, found ${groups}`);
  }
  return regex;
}

const INTEGER = /^[+-]?\d+$/;

/** Integers beyond 2^53 stay strings: as numbers distinct values would collapse. */
export function toScalar(raw: string): number | string {
  const trimmed = raw.trim();
  if (!NUMERIC.test(trimmed)) return raw;
  const value = Number(trimmed);
  if (INTEGER.test(trimmed) && !Number.isSafeInteger(value)) return raw;
  return value;
}

/**
 * Evaluates the pattern against the text and returns the first capture.
 * A match with an empty capture is still `found`.
 */
export function extractPattern(pattern: string | RegExp, text: string): Extraction {
  const regex = typeof pattern === "string" ? compilePattern(pattern) : pattern;
  regex.lastIndex = 0;
  const match = regex.exec(text);
  if (!match) return { found: false };
  const raw = match[1] ?? "";
  return { found: true, value: toScalar(raw), raw };
}
