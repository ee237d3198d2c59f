import type { ItemStatus, ToolReport, VerificationItem } from "../items/types.js";

export type StatusCounts = Record<ItemStatus, number>;

export function countStatuses(items: readonly VerificationItem[]): StatusCounts {
  const counts: StatusCounts = { Success: 0, Failed: 0, Error: 0, NotApplicable: 0 };
  for (const item of items) counts[item.status]++;
  return counts;
}

/** The status of the report's Summary item, or Error when it has none. */
export function overallStatus(report: ToolReport): ItemStatus {
  return report.items.find((i) => i.phase === "Summary")?.status ?? "Error";
}

export function hasBlockingResult(reports: readonly ToolReport[]): boolean {
  return reports.some((r) => {
    const status = overallStatus(r);
    return status === "Failed" || status === "Error";
  });
}
