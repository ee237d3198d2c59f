import type { ToolReport } from "../items/types.js";

export const CSV_HEADER = [
  "Timestamp",
  "Tool",
  "Version_old",
  "Version_new",
  "Phase",
  "Status",
  "Memo",
  "Item",
  "Metric",
  "Link",
] as const;

/** One row per item, in item order, with RFC 4180 quoting and CRLF line breaks. */
export function generateCsvReport(reports: readonly ToolReport[]): string {
  const rows: string[][] = [[...CSV_HEADER]];
  for (const report of reports) {
    for (const item of report.items) {
      rows.push([
        item.timestamp,
        report.tool,
        report.oldVersion,
        report.newVersion,
        item.phase,
        item.status,
        item.memo,
        item.itemName,
        item.metric ?? "",
        item.evidenceLink ?? "",
      ]);
    }
  }
  return rows.map((row) => row.map(csvField).join(",")).join("\r\n") + "\r\n";
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}
