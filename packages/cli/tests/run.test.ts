import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, it, expect } from "vitest";
import type { ToolReport } from "@verup/core";
import { parseFormats, planTargets, writeReports } from "../src/commands/run.js";

const tmpDirs: string[] = [];

afterEach(() => {
  for (const dir of tmpDirs) fs.rmSync(dir, { recursive: true, force: true });
  tmpDirs.length = 0;
});

const discovered = [
  { tool: "alpha", versions: ["1.0", "1.1", "2.0"] },
  { tool: "beta", versions: ["0.9"] },
];

describe("planTargets", () => {
  it("takes the two newest versions of every tool that has them", () => {
    expect(planTargets(discovered, {})).toEqual([{ tool: "alpha", oldVersion: "1.1", newVersion: "2.0" }]);
  });

  it("honors explicit versions for a named tool", () => {
    expect(planTargets(discovered, { tool: "ALPHA", old: "1.0" })).toEqual([
      { tool: "alpha", oldVersion: "1.0", newVersion: "2.0" },
    ]);
  });

  it("accepts a tool that was not discovered when both versions are given", () => {
    expect(planTargets(discovered, { tool: "gamma", old: "1", new: "2" })).toEqual([
      { tool: "gamma", oldVersion: "1", newVersion: "2" },
    ]);
  });

  it("fails for a named tool without two versions", () => {
    expect(() => planTargets(discovered, { tool: "beta" })).toThrow('Tool "beta" needs two versions');
  });
});

describe("parseFormats", () => {
  it("normalizes and deduplicates the list", () => {
    expect(parseFormats("CSV, html,csv")).toEqual(["csv", "html"]);
  });

  it("rejects unknown formats", () => {
    expect(() => parseFormats("csv,pdf")).toThrow('Unknown report format "pdf"');
  });
});

describe("writeReports", () => {
  it("writes one file per format", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "verup-reports-"));
    tmpDirs.push(dir);
    const reports: ToolReport[] = [
      {
        tool: "alpha",
        oldVersion: "1.1",
        newVersion: "2.0",
        items: [
          {
            phase: "Summary",
            itemName: "compatibility",
            status: "Success",
            memo: "safe to migrate",
            timestamp: "2024-01-01T00:00:00.000Z",
          },
        ],
      },
    ];
    const csv = path.join(dir, "out", "report.csv");
    const json = path.join(dir, "out", "report.json");

    await writeReports(reports, ["csv", "json"], [csv, json]);

    expect(fs.readFileSync(csv, "utf-8").split("\r\n")[1]).toBe(
      "2024-01-01T00:00:00.000Z,alpha,1.1,2.0,Summary,Success,safe to migrate,compatibility,,"
    );
    expect(JSON.parse(fs.readFileSync(json, "utf-8")).summary.tools).toBe(1);
  });
});
