import path from "node:path";
import { describe, it, expect } from "vitest";
import { ComparatorResolver } from "../src/compare/resolver.js";
import { ItemTemplateCatalog } from "../src/items/templates.js";
import { VerificationPipeline } from "../src/pipeline.js";
import type { CommandExecutor, ExecResult } from "../src/runner/executor.js";
import { ToolRunner } from "../src/runner/tool-runner.js";
import { createTmpDir, steppingClock, writeFile } from "./helpers.js";

const OUTPUTS: Record<string, string> = {
  "1.0": "line1\nline2\n",
  "2.0": "line1\nline2\nline3\n",
};

/** Stands in for the tool: writes the artifact for the version named last on the command line. */
class ScriptedExecutor implements CommandExecutor {
  readonly commands: string[] = [];
  private readonly artifactsDir: string;

  constructor(artifactsDir: string) {
    this.artifactsDir = artifactsDir;
  }

  async exec(command: string): Promise<ExecResult> {
    this.commands.push(command);
    const version = command.split(" ").at(-1) ?? "";
    writeFile(path.join(this.artifactsDir, `sample_tool_${version}.txt`), OUTPUTS[version] ?? "");
    return { exitCode: 0, stdout: "done\n", stderr: "" };
  }
}

function setup() {
  const root = createTmpDir();
  const settings = {
    toolsDir: path.join(root, "tools"),
    artifactsDir: path.join(root, "artifacts"),
    inputsDir: path.join(root, "inputs"),
    logsDir: path.join(root, "logs"),
  };
  const configDir = path.join(root, "configs");
  for (const version of ["1.0", "2.0"]) {
    writeFile(path.join(settings.toolsDir, "sample_tool", version, "run.sh"), "");
  }
  writeFile(
    path.join(configDir, "sample_tool.yaml"),
    [
      'execute_command: "{exec} {version}"',
      "comparison_methods:",
      "  format_check: true",
      "  line_count: true",
      "  content_diff: true",
      "",
    ].join("\n")
  );

  const executor = new ScriptedExecutor(settings.artifactsDir);
  const pipeline = new VerificationPipeline(
    new ToolRunner(settings, executor),
    new ComparatorResolver({ comparatorsDir: path.join(root, "comparators"), configDirs: [configDir] }),
    new ItemTemplateCatalog(),
    { reportPath: path.join(root, "reports", "verification.csv"), clock: steppingClock() }
  );
  return { root, executor, pipeline };
}

describe("VerificationPipeline", () => {
  it("runs both versions and reports the differences", async () => {
    const { executor, pipeline, root } = setup();

    const report = await pipeline.verify({ tool: "sample_tool", oldVersion: "1.0", newVersion: "2.0" });

    expect(executor.commands).toEqual([
      `sh ${path.join(root, "tools", "sample_tool", "1.0", "run.sh")} 1.0`,
      `sh ${path.join(root, "tools", "sample_tool", "2.0", "run.sh")} 2.0`,
    ]);
    expect(report.tool).toBe("sample_tool");
    expect(report.items.map((i) => [i.itemName, i.status])).toEqual([
      ["launch (1.0)", "Success"],
      ["launch (2.0)", "Success"],
      ["format_check", "Failed"],
      ["line_count", "Failed"],
      ["content_diff", "Failed"],
      ["error_scan", "Success"],
      ["compatibility", "Failed"],
    ]);
    expect(report.items[3].memo).toBe("line count 2 -> 3");
    expect(report.items[6].evidenceLink).toBe(path.join(root, "reports", "verification.csv"));
  });

  it("keeps going after a tool that cannot run", async () => {
    const { pipeline } = setup();

    const reports = await pipeline.verifyAll([
      { tool: "ghost", oldVersion: "1", newVersion: "2" },
      { tool: "sample_tool", oldVersion: "1.0", newVersion: "1.0" },
    ]);

    expect(reports).toHaveLength(2);
    expect(reports[0].items.map((i) => [i.itemName, i.status])).toEqual([
      ["launch (1)", "Error"],
      ["launch (2)", "Error"],
      ["format_check", "NotApplicable"],
      ["line_count", "NotApplicable"],
      ["content_diff", "NotApplicable"],
      ["error_scan", "NotApplicable"],
      ["compatibility", "Error"],
    ]);
    expect(reports[0].items[6].memo).toBe("action required (2 errors, 0 failed)");
    expect(reports[1].items.at(-1)?.status).toBe("Success");
  });
});
