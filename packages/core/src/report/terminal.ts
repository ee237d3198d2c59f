import chalk from "chalk";
import Table from "cli-table3";
import type { ItemStatus, ToolReport } from "../items/types.js";
import { overallStatus } from "./summary.js";

const STATUS_LABEL: Record<ItemStatus, string> = {
  Success: chalk.green("OK"),
  Failed: chalk.red("FAIL"),
  Error: chalk.red.bold("ERROR"),
  NotApplicable: chalk.dim("N/A"),
};

export function printTerminalReport(reports: readonly ToolReport[]): void {
  console.log();
  console.log(chalk.bold("  Verification Results"));
  console.log(chalk.dim("  " + "─".repeat(50)));

  for (const report of reports) {
    console.log();
    console.log(chalk.bold(`  ${report.tool} ${report.oldVersion} → ${report.newVersion}`));

    const table = new Table({
      head: [chalk.bold("Phase"), chalk.bold("Item"), chalk.bold("Status"), chalk.bold("Memo"), chalk.bold("Metric")],
      style: { head: [], border: [] },
      colWidths: [11, 24, 8, 40, 28],
      wordWrap: true,
    });

    for (const item of report.items) {
      table.push([item.phase, truncate(item.itemName, 22), STATUS_LABEL[item.status], item.memo, item.metric ?? ""]);
    }
    console.log(table.toString());
  }

  console.log();
  const statuses = reports.map(overallStatus);
  const safe = statuses.filter((s) => s === "Success" || s === "NotApplicable").length;
  const blocked = reports.length - safe;

  const summary = [
    chalk.bold(`  ${reports.length} tool${reports.length === 1 ? "" : "s"}`),
    chalk.green(`${safe} safe`),
    blocked > 0 ? chalk.red(`${blocked} action required`) : null,
  ]
    .filter(Boolean)
    .join(chalk.dim(" · "));

  console.log(summary);
  console.log();
}

function truncate(str: string, max: number): string {
  if (str.length <= max) return str;
  return str.slice(0, max - 1) + "…";
}
