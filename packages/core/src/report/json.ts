import type { ItemStatus, ToolReport } from "../items/types.js";
import { countStatuses, overallStatus, type StatusCounts } from "./summary.js";

export interface JsonReport {
  createdAt: string;
  summary: {
    tools: number;
    passed: number;
    blocked: number;
    items: StatusCounts;
  };
  results: (ToolReport & { status: ItemStatus })[];
}

export function generateJsonReport(
  reports: readonly ToolReport[],
  options?: { createdAt?: Date }
): string {
  const statuses = reports.map(overallStatus);
  const report: JsonReport = {
    createdAt: (options?.createdAt ?? new Date()).toISOString(),
    summary: {
      tools: reports.length,
      passed: statuses.filter((s) => s === "Success" || s === "NotApplicable").length,
      blocked: statuses.filter((s) => s === "Failed" || s === "Error").length,
      items: countStatuses(reports.flatMap((r) => r.items)),
    },
    results: reports.map((r, i) => ({ ...r, status: statuses[i] })),
  };

  return JSON.stringify(report, null, 2);
}
