import type { ItemStatus } from "../items/types.js";

export interface ComparisonOutcome {
  status: ItemStatus;
  /** Explicit item name; when absent the aggregator takes it from a template. */
  itemName?: string;
  /** Comparison method that produced the outcome, e.g. "line_count". */
  check?: string;
  detail?: string;
  metric?: string;
  evidencePath?: string;
  logDiffPath?: string;
  /** Longer output such as diff text, e.g. the third element of a legacy tuple. */
  content?: string;
}

/** `[ok, message, detail?]` as returned by older comparator modules. */
export type LegacyResult = readonly [boolean, string, string?];

export type RawOutcome = boolean | LegacyResult | ComparisonOutcome | ComparisonOutcome[];

export interface Comparator {
  compareArtifacts(oldFile: string, newFile: string): Promise<RawOutcome> | RawOutcome;
  compareLogs(oldLog: string, newLog: string): Promise<RawOutcome> | RawOutcome;
}

export interface ComparatorContext {
  toolName: string;
  oldVersion: string;
  newVersion: string;
  /** Directory comparators may write diff files into. */
  evidenceDir?: string;
}

const STATUSES: readonly ItemStatus[] = ["Success", "Failed", "Error", "NotApplicable"];

export function isComparisonOutcome(value: unknown): value is ComparisonOutcome {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const status = (value as { status?: unknown }).status;
  return typeof status === "string" && (STATUSES as readonly string[]).includes(status);
}

function isLegacyResult(value: unknown): value is LegacyResult {
  return (
    Array.isArray(value) &&
    (value.length === 2 || value.length === 3) &&
    typeof value[0] === "boolean" &&
    typeof value[1] === "string" &&
    (value[2] === undefined || typeof value[2] === "string")
  );
}

/**
 * Normalizes whatever a comparator returned into outcomes. Booleans map to
 * Success/Failed; Error and NotApplicable pass through untouched.
 */
export function liftOutcome(raw: unknown): ComparisonOutcome[] {
  if (typeof raw === "boolean") {
    return [{ status: raw ? "Success" : "Failed" }];
  }
  if (isLegacyResult(raw)) {
    const [ok, message, content] = raw;
    return [{ status: ok ? "Success" : "Failed", detail: message || undefined, content: content || undefined }];
  }
  if (isComparisonOutcome(raw)) {
    return [{ ...raw }];
  }
  if (Array.isArray(raw) && raw.every(isComparisonOutcome)) {
    return raw.map((o) => ({ ...o }));
  }
  return [
    {
      status: "Error",
      detail: `Comparator returned an unsupported value: ${describe(raw)}`,
    },
  ];
}

function describe(value: unknown): string {
  if (value === undefined || typeof value === "function" || typeof value === "symbol") {
    return typeof value;
  }
  try {
    const json = JSON.stringify(value);
    return json.length > 80 ? json.slice(0, 79) + "…" : json;
  } catch {
    return String(value);
  }
}
