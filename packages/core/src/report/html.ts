import type { ItemStatus, ToolReport, VerificationItem } from "../items/types.js";
import { countStatuses, overallStatus } from "./summary.js";

const STATUS_CLASS: Record<ItemStatus, string> = {
  Success: "pass",
  Failed: "fail",
  Error: "error",
  NotApplicable: "na",
};

export function generateHtmlReport(
  reports: readonly ToolReport[],
  options?: { title?: string; createdAt?: Date }
): string {
  const title = options?.title ?? "Version Upgrade Verification";
  const counts = countStatuses(reports.flatMap((r) => r.items));
  const statuses = reports.map(overallStatus);
  const safe = statuses.filter((s) => s === "Success" || s === "NotApplicable").length;

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${esc(title)}</title>
<style>
*{box-sizing:border-box;margin:0;padding:0}
body{font-family:-apple-system,BlinkMacSystemFont,"Segoe UI",sans-serif;background:#f8f9fa;color:#212529;padding:2rem;max-width:1200px;margin:0 auto}
.header{margin-bottom:2rem}
.header h1{font-size:1.5rem;font-weight:600}
.header .meta{color:#6c757d;font-size:.875rem;margin-top:.25rem}
.summary{display:flex;gap:1rem;margin-bottom:2rem;flex-wrap:wrap}
.stat{background:#fff;border-radius:8px;padding:1rem 1.5rem;border:1px solid #dee2e6;min-width:120px}
.stat .value{font-size:1.5rem;font-weight:700}
.stat .label{color:#6c757d;font-size:.75rem;text-transform:uppercase;letter-spacing:.05em}
.pass{color:#198754}
.fail{color:#dc3545}
.error{color:#b02a37;font-weight:600}
.na{color:#6c757d}
h2{margin:1.5rem 0 1rem;font-size:1.2rem}
table{width:100%;background:#fff;border-radius:8px;border-collapse:collapse;border:1px solid #dee2e6;margin-bottom:2rem}
th{text-align:left;padding:.75rem 1rem;border-bottom:2px solid #dee2e6;font-size:.875rem;color:#6c757d}
td{padding:.75rem 1rem;border-bottom:1px solid #dee2e6;font-size:.875rem;word-break:break-word}
tr:last-child td{border-bottom:none}
tr:hover{background:#f8f9fa}
tr.summary-row td{font-weight:600}
</style>
</head>
<body>
<div class="header">
  <h1>${esc(title)}</h1>
  <div class="meta">Generated ${(options?.createdAt ?? new Date()).toISOString()} | ${reports.length} tool${reports.length === 1 ? "" : "s"}</div>
</div>
<div class="summary">
  <div class="stat"><div class="value pass">${safe}</div><div class="label">Safe tools</div></div>
  <div class="stat"><div class="value fail">${reports.length - safe}</div><div class="label">Action required</div></div>
  <div class="stat"><div class="value pass">${counts.Success}</div><div class="label">Success</div></div>
  <div class="stat"><div class="value fail">${counts.Failed}</div><div class="label">Failed</div></div>
  <div class="stat"><div class="value error">${counts.Error}</div><div class="label">Error</div></div>
  <div class="stat"><div class="value na">${counts.NotApplicable}</div><div class="label">N/A</div></div>
</div>
${reports.map((r, i) => renderTool(r, statuses[i])).join("\n")}
</body>
</html>`;
}

function renderTool(report: ToolReport, status: ItemStatus): string {
  return `<h2>${esc(report.tool)} ${esc(report.oldVersion)} &rarr; ${esc(report.newVersion)} <span class="${STATUS_CLASS[status]}">${status}</span></h2>
<table>
  <thead><tr><th>Phase</th><th>Item</th><th>Status</th><th>Memo</th><th>Metric</th><th>Link</th><th>Timestamp</th></tr></thead>
  <tbody>
${report.items.map(renderRow).join("\n")}
  </tbody>
</table>`;
}

function renderRow(item: VerificationItem): string {
  return `    <tr${item.phase === "Summary" ? ' class="summary-row"' : ""}>
      <td>${item.phase}</td>
      <td>${esc(item.itemName)}</td>
      <td class="${STATUS_CLASS[item.status]}">${item.status}</td>
      <td>${esc(item.memo)}</td>
      <td>${esc(item.metric ?? "")}</td>
      <td>${esc(item.evidenceLink ?? "")}</td>
      <td>${item.timestamp}</td>
    </tr>`;
}

export function esc(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}
