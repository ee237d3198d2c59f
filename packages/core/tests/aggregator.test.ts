import { describe, it, expect } from "vitest";
import type { ComparisonOutcome } from "../src/compare/types.js";
import {
  arrange,
  buildReportItems,
  createStamper,
  fatalItem,
  type PhaseOutcomes,
} from "../src/items/aggregator.js";
import { DEFAULT_ITEM_TEMPLATES, ItemTemplateCatalog } from "../src/items/templates.js";
import { phaseRank } from "../src/items/types.js";
import { steppingClock } from "./helpers.js";

const links = {
  oldArtifact: "artifacts/old.txt",
  newArtifact: "artifacts/new.txt",
  oldLog: "logs/old.log",
  newLog: "logs/new.log",
  report: "reports/verification.csv",
};

const ok = { status: "Success", exitCode: 0 } as const;

function build(phaseOutcomes: PhaseOutcomes, templates = new ItemTemplateCatalog()) {
  return buildReportItems({
    tool: "sample_tool",
    oldVersion: "1.0",
    newVersion: "2.0",
    phaseOutcomes,
    templates,
    links,
    clock: steppingClock(),
  });
}

describe("buildReportItems", () => {
  it("orders items by phase and ends with one summary", () => {
    const items = build({
      execution: { old: ok, new: ok },
      artifacts: [
        { status: "Failed", check: "format_check", metric: "allowed changes: false", detail: "size 12 -> 18 bytes" },
        { status: "Failed", check: "line_count", metric: "exact match required", detail: "line count 2 -> 3" },
        { status: "Failed", check: "content_diff", metric: "exact match required", detail: "1 differing line" },
      ],
      logs: [{ status: "Success", check: "error_scan", detail: "warning/error lines 0 -> 0" }],
    });

    expect(items).toEqual([
      {
        phase: "Execution",
        itemName: "launch (1.0)",
        status: "Success",
        memo: "exited normally",
        metric: "exit code: 0",
        evidenceLink: "logs/old.log",
        timestamp: "2024-01-01T00:00:00.000Z",
      },
      {
        phase: "Execution",
        itemName: "launch (2.0)",
        status: "Success",
        memo: "exited normally",
        metric: "exit code: 0",
        evidenceLink: "logs/new.log",
        timestamp: "2024-01-01T00:00:01.000Z",
      },
      {
        phase: "Artifact",
        itemName: "format_check",
        status: "Failed",
        memo: "size 12 -> 18 bytes",
        metric: "allowed changes: false",
        evidenceLink: "artifacts/new.txt",
        timestamp: "2024-01-01T00:00:02.000Z",
      },
      {
        phase: "Artifact",
        itemName: "line_count",
        status: "Failed",
        memo: "line count 2 -> 3",
        metric: "exact match required",
        evidenceLink: "artifacts/new.txt",
        timestamp: "2024-01-01T00:00:03.000Z",
      },
      {
        phase: "Artifact",
        itemName: "content_diff",
        status: "Failed",
        memo: "1 differing line",
        metric: "exact match required",
        evidenceLink: "artifacts/old.txt -> artifacts/new.txt",
        timestamp: "2024-01-01T00:00:04.000Z",
      },
      {
        phase: "Log",
        itemName: "error_scan",
        status: "Success",
        memo: "warning/error lines 0 -> 0",
        evidenceLink: "logs/new.log",
        timestamp: "2024-01-01T00:00:05.000Z",
      },
      {
        phase: "Summary",
        itemName: "compatibility",
        status: "Failed",
        memo: "action required (3 failed)",
        metric: "all checks combined",
        evidenceLink: "reports/verification.csv",
        timestamp: "2024-01-01T00:00:06.000Z",
      },
    ]);

    const ranks = items.map((i) => phaseRank(i.phase));
    expect(ranks).toEqual([...ranks].sort((a, b) => a - b));
    expect(items.filter((i) => i.phase === "Summary")).toHaveLength(1);
  });

  it("lets an Error outrank failures in the summary", () => {
    const items = build({
      execution: { old: ok, new: { status: "Error", detail: "exited with code 2", exitCode: 2 } },
      artifacts: [{ status: "Failed", check: "line_count" }],
      logs: [],
    });

    expect(items[1]).toMatchObject({ status: "Error", memo: "exited with code 2", metric: "exit code: 2" });
    expect(items[2].memo).toBe("line count changed");
    expect(items.at(-1)).toMatchObject({ status: "Error", memo: "action required (1 error, 1 failed)" });
  });

  it("summarizes as NotApplicable when nothing could be compared", () => {
    const items = build({
      execution: { old: ok, new: ok },
      artifacts: [{ status: "NotApplicable", check: "line_count", metric: "exact match required" }],
      logs: [{ status: "NotApplicable", check: "error_scan" }],
    });

    expect(items[2]).not.toHaveProperty("metric");
    expect(items[2].memo).toBe("not applicable");
    expect(items.at(-1)).toMatchObject({ status: "NotApplicable", memo: "no artifacts or logs to compare" });
  });

  it("ignores NotApplicable items next to successes", () => {
    const items = build({
      execution: { old: ok, new: ok },
      artifacts: [
        { status: "Success", check: "line_count" },
        { status: "NotApplicable", itemName: "memory", check: "custom_patterns" },
      ],
      logs: [],
    });
    expect(items.at(-1)).toMatchObject({ status: "Success", memo: "safe to migrate" });
  });

  it("returns frozen items", () => {
    const items = build({ execution: { old: ok, new: ok }, artifacts: [], logs: [] });
    expect(items.every((i) => Object.isFrozen(i))).toBe(true);
    expect(items.at(-1)?.status).toBe("Success");
  });

  it("uses the templates configured for the tool", () => {
    const catalog = new ItemTemplateCatalog({
      Sample_Tool: [
        { phase: "Execution", item: "run", successMemo: "ran", failureMemo: "crashed", linkType: "log" },
        { phase: "Artifact", item: "report_matches", successMemo: "same report", failureMemo: "report changed", linkType: "new_artifact" },
        { phase: "Summary", item: "verdict", successMemo: "go", failureMemo: "no go", linkType: "report" },
      ],
    });
    const items = build({ execution: { old: ok, new: ok }, artifacts: [{ status: "Failed" }], logs: [] }, catalog);

    expect(items.map((i) => [i.itemName, i.memo])).toEqual([
      ["run (1.0)", "ran"],
      ["run (2.0)", "ran"],
      ["report_matches", "report changed"],
      ["verdict", "no go (1 failed)"],
    ]);
  });

  it("prefers an outcome's own evidence path", () => {
    const items = build({
      execution: { old: ok, new: ok },
      artifacts: [{ status: "Failed", check: "content_diff", evidencePath: "evidence/sample_tool.diff" }],
      logs: [{ status: "Failed", check: "content_diff", logDiffPath: "evidence/log.diff" }],
    });
    expect(items[2].evidenceLink).toBe("evidence/sample_tool.diff");
    expect(items[3]).toMatchObject({ phase: "Log", itemName: "content_diff", memo: "log differs" });
    expect(items[3].evidenceLink).toBe("evidence/log.diff");
  });

  it("carries extended comparator output onto the item", () => {
    const items = build({
      execution: { old: ok, new: ok },
      artifacts: [{ status: "Failed", check: "content_diff", detail: "differs", content: "--- a\n+++ b" }],
      logs: [{ status: "Success", check: "error_scan" }],
    });
    expect(items[2]).toMatchObject({ phase: "Artifact", memo: "differs", content: "--- a\n+++ b" });
    expect(items[3]).not.toHaveProperty("content");
  });
});

describe("arrange", () => {
  const artifactTemplates = DEFAULT_ITEM_TEMPLATES.filter((t) => t.phase === "Artifact");

  it("places named outcomes by template and unnamed ones in free slots", () => {
    const outcomes: ComparisonOutcome[] = [
      { status: "Failed", check: "content_diff" },
      { status: "Success" },
      { status: "Success", itemName: "accuracy", check: "custom_patterns" },
      { status: "Error", itemName: "extra", check: "unknown" },
    ];

    const placed = arrange(outcomes, artifactTemplates);

    expect(placed.map((p) => [p.template?.item, p.outcome.itemName ?? null, p.outcome.status])).toEqual([
      ["format_check", null, "Success"],
      ["content_diff", null, "Failed"],
      ["custom_patterns", "accuracy", "Success"],
      [undefined, "extra", "Error"],
    ]);
  });

  it("keeps unnamed outcomes beyond the templates, in order", () => {
    const placed = arrange([{ status: "Success" }, { status: "Failed" }], artifactTemplates.slice(0, 1));
    expect(placed.map((p) => [p.template?.item, p.outcome.status])).toEqual([
      ["format_check", "Success"],
      [undefined, "Failed"],
    ]);
  });

  it("names untemplated unnamed outcomes by phase and position", () => {
    const items = buildReportItems({
      tool: "bare",
      oldVersion: "1",
      newVersion: "2",
      phaseOutcomes: {
        execution: { old: ok, new: ok },
        artifacts: [{ status: "Success" }, { status: "Success" }],
        logs: [],
      },
      templates: new ItemTemplateCatalog({
        bare: DEFAULT_ITEM_TEMPLATES.filter((t) => t.phase !== "Artifact"),
      }),
      clock: steppingClock(),
    });
    expect(items.slice(2, 4).map((i) => i.itemName)).toEqual(["artifact_check_1", "artifact_check_2"]);
  });
});

describe("createStamper", () => {
  it("never goes backwards", () => {
    const times = ["2024-01-01T00:00:10.000Z", "2024-01-01T00:00:05.000Z", "2024-01-01T00:00:12.000Z"];
    let call = 0;
    const stamp = createStamper(() => new Date(times[call++]));
    expect([stamp(), stamp(), stamp()]).toEqual([
      "2024-01-01T00:00:10.000Z",
      "2024-01-01T00:00:10.000Z",
      "2024-01-01T00:00:12.000Z",
    ]);
  });
});

describe("fatalItem", () => {
  it("is a single Summary Error item", () => {
    expect(fatalItem("verification aborted: disk full", steppingClock())).toEqual({
      phase: "Summary",
      itemName: "compatibility",
      status: "Error",
      memo: "verification aborted: disk full",
      timestamp: "2024-01-01T00:00:00.000Z",
    });
  });
});
