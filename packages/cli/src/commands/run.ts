import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import chalk from "chalk";
import {
  ComparatorResolver,
  ItemTemplateCatalog,
  ToolRunner,
  VerificationPipeline,
  createConsoleLogger,
  discoverTools,
  generateCsvReport,
  generateHtmlReport,
  generateJsonReport,
  hasBlockingResult,
  printTerminalReport,
  silentLogger,
  type Logger,
  type ToolReport,
  type ToolVersions,
  type VerificationTarget,
} from "@verup/core";
import { REPORT_FORMATS, loadConfig, type ReportFormat } from "../config.js";

export interface RunOptions {
  tool?: string;
  old?: string;
  new?: string;
  format?: string;
  outputDir?: string;
  report?: boolean;
  debug?: boolean;
  silent?: boolean;
}

/** Returns the process exit code: 1 when any tool needs action. */
export async function runRun(options: RunOptions): Promise<number> {
  const logger: Logger = options.silent ? silentLogger : createConsoleLogger({ debug: options.debug });
  if (!options.silent) {
    console.log();
    console.log(chalk.bold("  Version upgrade verification"));
    console.log(chalk.dim("  " + "─".repeat(40)));
    console.log();
  }

  const { config, filepath } = await loadConfig();
  logger.debug(filepath ? `Loaded ${filepath}` : "No config file found, using defaults");

  const formats = options.format ? parseFormats(options.format) : config.report.formats;
  const targets = planTargets(await discoverTools(config.toolsDir), options);
  if (targets.length === 0) {
    logger.warn(`No tool with two versions found under ${config.toolsDir}`);
    return 0;
  }
  logger.info(`Verifying ${targets.map((t) => `${t.tool} ${t.oldVersion} -> ${t.newVersion}`).join(", ")}`);

  const outputDir = resolve(options.outputDir ?? config.report.outputDir);
  const stamp = new Date().toISOString().replace(/[:.]/g, "-");
  const reportPaths = formats.map((format) => join(outputDir, `verification_${stamp}.${format}`));

  const resolver = new ComparatorResolver({
    comparatorsDir: config.comparatorsDir,
    configDirs: config.configDirs,
    logger,
  });
  const runner = new ToolRunner(
    {
      toolsDir: config.toolsDir,
      artifactsDir: config.artifactsDir,
      inputsDir: config.inputsDir,
      logsDir: config.logsDir,
      timeout: config.timeout,
    },
    undefined,
    logger
  );
  const pipeline = new VerificationPipeline(runner, resolver, new ItemTemplateCatalog(config.items), {
    evidenceDir: config.evidenceDir,
    reportPath: options.report === false ? undefined : reportPaths[0],
    logger,
  });

  const reports = await pipeline.verifyAll(targets);
  if (!options.silent) printTerminalReport(reports);

  if (options.report !== false) {
    await writeReports(reports, formats, reportPaths);
    if (!options.silent) {
      for (const path of reportPaths) console.log(chalk.dim(`  Report → ${path}`));
      console.log();
    }
  }

  return hasBlockingResult(reports) ? 1 : 0;
}

export function parseFormats(value: string): ReportFormat[] {
  const formats: ReportFormat[] = [];
  for (const raw of value.split(",")) {
    const name = raw.trim().toLowerCase();
    if (!name) continue;
    const format = REPORT_FORMATS.find((f) => f === name);
    if (!format) {
      throw new Error(`Unknown report format "${name}". Use ${REPORT_FORMATS.join(", ")}.`);
    }
    if (!formats.includes(format)) formats.push(format);
  }
  return formats;
}

/**
 * Picks what to verify. A named tool uses the given versions, or its two
 * newest; without a name every discovered tool with two versions is taken.
 */
export function planTargets(
  discovered: readonly ToolVersions[],
  options: Pick<RunOptions, "tool" | "old" | "new">
): VerificationTarget[] {
  const candidates = options.tool
    ? [
        discovered.find((d) => d.tool.toLowerCase() === options.tool?.toLowerCase()) ?? {
          tool: options.tool,
          versions: [],
        },
      ]
    : discovered;

  const targets: VerificationTarget[] = [];
  for (const { tool, versions } of candidates) {
    const newVersion = options.new ?? versions.at(-1);
    const oldVersion = options.old ?? versions.filter((v) => v !== newVersion).at(-1);
    if (oldVersion === undefined || newVersion === undefined) {
      if (options.tool) {
        throw new Error(`Tool "${tool}" needs two versions; pass --old and --new or add version directories`);
      }
      continue;
    }
    targets.push({ tool, oldVersion, newVersion });
  }
  return targets;
}

export async function writeReports(
  reports: readonly ToolReport[],
  formats: readonly ReportFormat[],
  paths: readonly string[]
): Promise<void> {
  for (const [index, format] of formats.entries()) {
    const path = paths[index];
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, render(reports, format), "utf-8");
  }
}

function render(reports: readonly ToolReport[], format: ReportFormat): string {
  switch (format) {
    case "csv":
      return generateCsvReport(reports);
    case "html":
      return generateHtmlReport(reports);
    case "json":
      return generateJsonReport(reports);
  }
}
