export type Phase = "Execution" | "Artifact" | "Log" | "Summary";

export const PHASE_ORDER: readonly Phase[] = ["Execution", "Artifact", "Log", "Summary"];

export type ItemStatus = "Success" | "Failed" | "Error" | "NotApplicable";

export interface VerificationItem {
  readonly phase: Phase;
  readonly itemName: string;
  readonly status: ItemStatus;
  readonly memo: string;
  /** Criterion actually applied, e.g. "tolerance: 1%". Absent when no quantitative check ran. */
  readonly metric?: string;
  readonly evidenceLink?: string;
  /** Extended comparator output kept alongside the memo. */
  readonly content?: string;
  /** ISO-8601 creation time, non-decreasing across one tool run. */
  readonly timestamp: string;
}

export type LinkType = "log" | "new_artifact" | "compare_artifacts" | "diff" | "report";

export interface ItemTemplate {
  phase: Phase;
  item: string;
  successMemo: string;
  failureMemo: string;
  linkType: LinkType;
}

export interface ToolReport {
  tool: string;
  oldVersion: string;
  newVersion: string;
  items: VerificationItem[];
}

export function phaseRank(phase: Phase): number {
  return PHASE_ORDER.indexOf(phase);
}
