import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { pathToFileURL } from "node:url";
import { findComparisonConfig, loadComparisonConfig, type ComparisonConfig } from "../config/comparison.js";
import { ComparatorLoadError, errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { ConfigBasedComparator, createDefaultComparator, evidenceFileName } from "./config-comparator.js";
import { fileExists } from "./text.js";
import { liftOutcome, type Comparator, type ComparatorContext, type ComparisonOutcome } from "./types.js";

export type ComparatorFactory = (context: ComparatorContext) => Comparator;

export type Resolution =
  | { kind: "class"; tool: string; modulePath: string; create: ComparatorFactory }
  | { kind: "config"; tool: string; configPath: string; config: ComparisonConfig }
  | { kind: "default"; tool: string };

export interface ResolverOptions {
  comparatorsDir?: string;
  configDirs?: string[];
  logger?: Logger;
}

type ComparatorClass = new (context: ComparatorContext) => Comparator;

/** Compiled modules come first: plain Node imports them, but not `.ts`. */
export const MODULE_EXTENSIONS = [".js", ".mjs", ".ts", ".mts"] as const;

const TS_HINT = "TypeScript comparators load only under a TypeScript-aware runtime; compile it to .js or .mjs";

/**
 * Picks one comparator per tool: a class module, then a config file, then the
 * built-in default. A tier that fails to load is logged and skipped. Results
 * are memoized per lowercased tool name for the lifetime of the instance.
 */
export class ComparatorResolver {
  private readonly cache = new Map<string, Resolution>();
  readonly comparatorsDir: string;
  readonly configDirs: readonly string[];
  private readonly logger: Logger;

  constructor(options: ResolverOptions = {}) {
    this.comparatorsDir = options.comparatorsDir ?? "comparators";
    this.configDirs = options.configDirs ?? [join("comparators", "configs"), "configs"];
    this.logger = options.logger ?? silentLogger;
  }

  async resolve(tool: string): Promise<Resolution> {
    const key = tool.toLowerCase();
    const cached = this.cache.get(key);
    if (cached) return cached;

    const resolution = await this.resolveUncached(key);
    this.cache.set(key, resolution);
    return resolution;
  }

  /** Resolves the tool and wraps its comparator so that it never throws. */
  async comparatorFor(context: ComparatorContext): Promise<GuardedComparator> {
    return new GuardedComparator(await this.resolve(context.toolName), context);
  }

  clear(): void {
    this.cache.clear();
  }

  private async resolveUncached(tool: string): Promise<Resolution> {
    const modulePath = await findComparatorModule(tool, this.comparatorsDir);
    if (modulePath) {
      try {
        const create = await loadComparatorModule(modulePath);
        this.logger.info(`Using comparator module ${modulePath}`);
        return { kind: "class", tool, modulePath, create };
      } catch (e) {
        this.logger.warn(`${errorMessage(e)}; trying config file`);
      }
    }

    const configPath = await findComparisonConfig(tool, this.configDirs);
    if (configPath) {
      try {
        const config = await loadComparisonConfig(configPath);
        this.logger.info(`Using comparison config ${configPath}`);
        return { kind: "config", tool, configPath, config };
      } catch (e) {
        this.logger.warn(`${errorMessage(e)}; using default comparator`);
      }
    }

    this.logger.info(`No comparator module or config for "${tool}", using default comparator`);
    return { kind: "default", tool };
  }
}

export function instantiate(resolution: Resolution, context: ComparatorContext): Comparator {
  switch (resolution.kind) {
    case "class":
      return resolution.create(context);
    case "config":
      return new ConfigBasedComparator(resolution.config, context);
    case "default":
      return createDefaultComparator(context);
  }
}

/**
 * Boundary around a resolved comparator: exceptions and rejections become a
 * single Error outcome, and class modules only run when both files exist.
 */
export class GuardedComparator {
  readonly resolution: Resolution;
  private readonly context: ComparatorContext;
  private comparator: Comparator | undefined;

  constructor(resolution: Resolution, context: ComparatorContext) {
    this.resolution = resolution;
    this.context = context;
  }

  compareArtifacts(oldFile?: string, newFile?: string): Promise<ComparisonOutcome[]> {
    return this.run("artifact", oldFile, newFile, (c, a, b) => c.compareArtifacts(a, b));
  }

  compareLogs(oldLog?: string, newLog?: string): Promise<ComparisonOutcome[]> {
    return this.run("log", oldLog, newLog, (c, a, b) => c.compareLogs(a, b));
  }

  private async run(
    label: string,
    oldPath: string | undefined,
    newPath: string | undefined,
    call: (comparator: Comparator, oldPath: string, newPath: string) => unknown
  ): Promise<ComparisonOutcome[]> {
    if (this.resolution.kind === "class") {
      const missing = [
        (await fileExists(oldPath)) ? null : `old ${label}`,
        (await fileExists(newPath)) ? null : `new ${label}`,
      ].filter((m): m is string => m !== null);
      if (missing.length > 0) {
        return [{ status: "NotApplicable", detail: `${missing.join(" and ")} missing` }];
      }
    }

    let outcomes: ComparisonOutcome[];
    try {
      this.comparator ??= instantiate(this.resolution, this.context);
      outcomes = liftOutcome(await call(this.comparator, oldPath ?? "", newPath ?? ""));
    } catch (e) {
      return [{ status: "Error", detail: errorMessage(e) }];
    }
    return this.saveContent(label, outcomes);
  }

  /**
   * Writes extended output that carries no link of its own into the evidence
   * directory and links the outcome to it. The text stays on the outcome.
   */
  private async saveContent(label: string, outcomes: ComparisonOutcome[]): Promise<ComparisonOutcome[]> {
    const dir = this.context.evidenceDir;
    if (!dir) return outcomes;

    const saved: ComparisonOutcome[] = [];
    for (const [index, outcome] of outcomes.entries()) {
      if (!outcome.content || outcome.evidencePath || outcome.logDiffPath) {
        saved.push(outcome);
        continue;
      }
      const suffix = outcomes.length > 1 ? `${label}_detail_${index + 1}.txt` : `${label}_detail.txt`;
      const target = join(dir, evidenceFileName(this.context, suffix));
      try {
        await mkdir(dir, { recursive: true });
        await writeFile(target, outcome.content, "utf-8");
        saved.push(label === "log" ? { ...outcome, logDiffPath: target } : { ...outcome, evidencePath: target });
      } catch (e) {
        const note = `detail not saved: ${errorMessage(e)}`;
        saved.push({ ...outcome, detail: outcome.detail ? `${outcome.detail} (${note})` : note });
      }
    }
    return saved;
  }
}

async function findComparatorModule(tool: string, dir: string): Promise<string | undefined> {
  for (const ext of MODULE_EXTENSIONS) {
    const candidate = join(dir, `${tool}.comparator${ext}`);
    if (await fileExists(candidate)) return candidate;
  }
  return undefined;
}

export function isComparator(value: unknown): value is Comparator {
  return (
    typeof value === "object" &&
    value !== null &&
    typeof (value as Comparator).compareArtifacts === "function" &&
    typeof (value as Comparator).compareLogs === "function"
  );
}

function isComparatorClass(value: unknown): value is ComparatorClass {
  return typeof value === "function" && isComparator((value as { prototype?: unknown }).prototype);
}

/**
 * Accepts a module that exports `compareArtifacts`/`compareLogs` itself, or a
 * comparator object or class as its default or `comparator` export.
 */
export async function loadComparatorModule(path: string): Promise<ComparatorFactory> {
  let mod: unknown;
  try {
    mod = await import(pathToFileURL(path).href);
  } catch (e) {
    const typescript = path.endsWith(".ts") || path.endsWith(".mts");
    const message = typescript ? `${errorMessage(e)} (${TS_HINT})` : errorMessage(e);
    throw new ComparatorLoadError(path, message, { cause: e });
  }

  if (isComparator(mod)) {
    const comparator = mod;
    return () => comparator;
  }

  const named = typeof mod === "object" && mod !== null ? (mod as Record<string, unknown>) : {};
  for (const candidate of [named.default, named.comparator]) {
    if (isComparatorClass(candidate)) {
      return (context) => new candidate(context);
    }
    if (isComparator(candidate)) {
      return () => candidate;
    }
  }
  throw new ComparatorLoadError(
    path,
    "module must export compareArtifacts/compareLogs, or a comparator object or class"
  );
}
