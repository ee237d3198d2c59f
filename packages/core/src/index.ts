// Items
export type {
  Phase,
  ItemStatus,
  VerificationItem,
  LinkType,
  ItemTemplate,
  ToolReport,
} from "./items/types.js";
export { PHASE_ORDER, phaseRank } from "./items/types.js";
export { DEFAULT_ITEM_TEMPLATES, ItemTemplateCatalog } from "./items/templates.js";
export { buildReportItems, fatalItem, summarizeStatus, arrange, createStamper } from "./items/aggregator.js";
export type {
  ExecutionOutcome,
  PhaseOutcomes,
  EvidenceLinks,
  BuildReportInput,
  Placed,
} from "./items/aggregator.js";

// Comparison
export type {
  ComparisonOutcome,
  LegacyResult,
  RawOutcome,
  Comparator,
  ComparatorContext,
} from "./compare/types.js";
export { liftOutcome, isComparisonOutcome } from "./compare/types.js";
export { extractPattern, compilePattern, countCaptureGroups, toScalar, PatternError } from "./compare/pattern.js";
export type { Extraction } from "./compare/pattern.js";
export { evaluateTolerance, evaluateAllowedChanges, formatPercent } from "./compare/tolerance.js";
export type { ToleranceResult } from "./compare/tolerance.js";
export { diffLines, renderDiff, countLines, countChangedLines, lineEnding } from "./compare/text.js";
export type { DiffOp, LineEnding } from "./compare/text.js";
export { ConfigBasedComparator, compareWithConfig, createDefaultComparator } from "./compare/config-comparator.js";
export {
  ComparatorResolver,
  GuardedComparator,
  instantiate,
  isComparator,
  loadComparatorModule,
  MODULE_EXTENSIONS,
} from "./compare/resolver.js";
export type { Resolution, ResolverOptions, ComparatorFactory } from "./compare/resolver.js";

// Comparison configs
export {
  parseComparisonConfig,
  loadComparisonConfig,
  findComparisonConfig,
  DEFAULT_COMPARISON_CONFIG,
  CONFIG_EXTENSIONS,
} from "./config/comparison.js";
export type { ComparisonConfig, ComparisonMethods, CustomPattern, Criterion } from "./config/comparison.js";

// Runner
export { ToolRunner, discoverTools, compareVersions, buildCommand, quote } from "./runner/tool-runner.js";
export type { RunnerSettings, ToolVersions, RunSide } from "./runner/tool-runner.js";
export { LocalExecutor } from "./runner/executor.js";
export type { CommandExecutor, ExecOpts, ExecResult } from "./runner/executor.js";
export { verifyTool } from "./verify.js";
export type { VersionRun, VerifyToolInput } from "./verify.js";
export { VerificationPipeline } from "./pipeline.js";
export type { VerificationTarget, PipelineOptions } from "./pipeline.js";

// Reporter
export { printTerminalReport } from "./report/terminal.js";
export { generateJsonReport } from "./report/json.js";
export type { JsonReport } from "./report/json.js";
export { generateHtmlReport } from "./report/html.js";
export { generateCsvReport, CSV_HEADER } from "./report/csv.js";
export { countStatuses, overallStatus, hasBlockingResult } from "./report/summary.js";
export type { StatusCounts } from "./report/summary.js";

// Logging and errors
export { createConsoleLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { ConfigLoadError, ComparatorLoadError, errorMessage } from "./errors.js";
