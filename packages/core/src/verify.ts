import type { ComparatorResolver } from "./compare/resolver.js";
import { errorMessage } from "./errors.js";
import { buildReportItems, fatalItem, type ExecutionOutcome } from "./items/aggregator.js";
import type { ItemTemplateCatalog } from "./items/templates.js";
import type { VerificationItem } from "./items/types.js";
import { silentLogger, type Logger } from "./logger.js";

/** What the tool runner hands over for one version of one tool. */
export interface VersionRun {
  version: string;
  execution: ExecutionOutcome;
  artifactPath?: string;
  logPath?: string;
}

export interface VerifyToolInput {
  tool: string;
  oldRun: VersionRun;
  newRun: VersionRun;
  resolver: ComparatorResolver;
  templates: ItemTemplateCatalog;
  evidenceDir?: string;
  reportPath?: string;
  clock?: () => Date;
  logger?: Logger;
}

/**
 * Runs the whole comparison for one tool. Either the full ordered item list
 * comes back, or a single Summary Error item describing what went wrong.
 */
export async function verifyTool(input: VerifyToolInput): Promise<VerificationItem[]> {
  const { tool, oldRun, newRun } = input;
  const logger = input.logger ?? silentLogger;
  try {
    const comparator = await input.resolver.comparatorFor({
      toolName: tool,
      oldVersion: oldRun.version,
      newVersion: newRun.version,
      evidenceDir: input.evidenceDir,
    });
    logger.debug(`${tool}: comparing with ${comparator.resolution.kind} comparator`);

    const artifacts = await comparator.compareArtifacts(oldRun.artifactPath, newRun.artifactPath);
    const logs = await comparator.compareLogs(oldRun.logPath, newRun.logPath);

    return buildReportItems({
      tool,
      oldVersion: oldRun.version,
      newVersion: newRun.version,
      phaseOutcomes: {
        execution: { old: oldRun.execution, new: newRun.execution },
        artifacts,
        logs,
      },
      templates: input.templates,
      links: {
        oldArtifact: oldRun.artifactPath,
        newArtifact: newRun.artifactPath,
        oldLog: oldRun.logPath,
        newLog: newRun.logPath,
        report: input.reportPath,
      },
      clock: input.clock,
    });
  } catch (e) {
    logger.error(`${tool}: verification aborted: ${errorMessage(e)}`);
    return [fatalItem(`verification aborted: ${errorMessage(e)}`, input.clock)];
  }
}
