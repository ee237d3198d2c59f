import type { ComparatorResolver } from "./compare/resolver.js";
import {
  DEFAULT_COMPARISON_CONFIG,
  findComparisonConfig,
  loadComparisonConfig,
  type ComparisonConfig,
} from "./config/comparison.js";
import { errorMessage } from "./errors.js";
import { fatalItem } from "./items/aggregator.js";
import type { ItemTemplateCatalog } from "./items/templates.js";
import type { ToolReport } from "./items/types.js";
import { silentLogger, type Logger } from "./logger.js";
import type { ToolRunner } from "./runner/tool-runner.js";
import { verifyTool } from "./verify.js";

export interface VerificationTarget {
  tool: string;
  oldVersion: string;
  newVersion: string;
}

export interface PipelineOptions {
  evidenceDir?: string;
  reportPath?: string;
  clock?: () => Date;
  logger?: Logger;
}

/**
 * Runs both versions of each tool and turns the results into one report per
 * tool. Tools are processed one after another; a failure in one never stops
 * the next.
 */
export class VerificationPipeline {
  private readonly runner: ToolRunner;
  private readonly resolver: ComparatorResolver;
  private readonly templates: ItemTemplateCatalog;
  private readonly options: PipelineOptions;
  private readonly logger: Logger;

  constructor(
    runner: ToolRunner,
    resolver: ComparatorResolver,
    templates: ItemTemplateCatalog,
    options?: PipelineOptions
  ) {
    this.runner = runner;
    this.resolver = resolver;
    this.templates = templates;
    this.options = options ?? {};
    this.logger = this.options.logger ?? silentLogger;
  }

  async verify(target: VerificationTarget): Promise<ToolReport> {
    const { tool, oldVersion, newVersion } = target;
    try {
      const config = await this.executionConfig(tool);
      this.logger.info(`${tool}: running ${oldVersion}`);
      const oldRun = await this.runner.runVersion(tool, oldVersion, "old", config);
      this.logger.info(`${tool}: running ${newVersion}`);
      const newRun = await this.runner.runVersion(tool, newVersion, "new", config);

      const items = await verifyTool({
        tool,
        oldRun,
        newRun,
        resolver: this.resolver,
        templates: this.templates,
        evidenceDir: this.options.evidenceDir,
        reportPath: this.options.reportPath,
        clock: this.options.clock,
        logger: this.logger,
      });
      return { tool, oldVersion, newVersion, items };
    } catch (e) {
      this.logger.error(`${tool}: ${errorMessage(e)}`);
      return { tool, oldVersion, newVersion, items: [fatalItem(errorMessage(e), this.options.clock)] };
    }
  }

  async verifyAll(targets: readonly VerificationTarget[]): Promise<ToolReport[]> {
    const reports: ToolReport[] = [];
    for (const target of targets) {
      reports.push(await this.verify(target));
    }
    return reports;
  }

  /**
   * Execution settings come from the tool's config file even when a class
   * module does the comparing.
   */
  private async executionConfig(tool: string): Promise<ComparisonConfig> {
    const resolution = await this.resolver.resolve(tool);
    if (resolution.kind === "config") return resolution.config;

    const path = await findComparisonConfig(tool, this.resolver.configDirs);
    if (!path) return DEFAULT_COMPARISON_CONFIG;
    try {
      return await loadComparisonConfig(path);
    } catch (e) {
      this.logger.warn(`${errorMessage(e)}; running with default settings`);
      return DEFAULT_COMPARISON_CONFIG;
    }
  }
}
