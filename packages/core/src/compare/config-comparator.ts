import { mkdir, stat, writeFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import type { ComparisonConfig, ComparisonMethods, CustomPattern, Criterion } from "../config/comparison.js";
import { DEFAULT_COMPARISON_CONFIG } from "../config/comparison.js";
import { errorMessage } from "../errors.js";
import type { Comparator, ComparatorContext, ComparisonOutcome } from "./types.js";
import { compilePattern, extractPattern } from "./pattern.js";
import { evaluateAllowedChanges, evaluateTolerance } from "./tolerance.js";
import {
  countChangedLines,
  countLines,
  countOccurrences,
  diffLines,
  fileExists,
  lineEnding,
  readText,
  renderDiff,
  splitLines,
} from "./text.js";

interface LoadedFile {
  path: string;
  text: string;
  size: number;
}

type FilePair =
  | { kind: "missing"; which: string }
  | { kind: "unreadable"; message: string }
  | { kind: "ready"; old: LoadedFile; new: LoadedFile };

const ISSUE_LINE = /\b(error|warning)\b/i;

/**
 * Interprets a declarative comparison config. Each enabled method yields its
 * own outcome, in declaration order; a missing file turns every step into a
 * NotApplicable outcome instead of aborting the comparison.
 */
export class ConfigBasedComparator implements Comparator {
  readonly config: ComparisonConfig;
  private readonly context: Partial<ComparatorContext>;

  constructor(config: ComparisonConfig, context: Partial<ComparatorContext> = {}) {
    this.config = config;
    this.context = context;
  }

  async compareArtifacts(oldFile?: string, newFile?: string): Promise<ComparisonOutcome[]> {
    return this.compare(oldFile, newFile, this.config.comparisonMethods, "artifact");
  }

  async compareLogs(oldLog?: string, newLog?: string): Promise<ComparisonOutcome[]> {
    const pair = await loadPair(oldLog, newLog, "log");
    const outcomes = [scanIssues(pair)];
    if (this.config.logComparisonMethods) {
      outcomes.push(...(await this.runMethods(pair, this.config.logComparisonMethods, "log")));
    }
    return outcomes;
  }

  async compare(
    oldFile: string | undefined,
    newFile: string | undefined,
    methods: ComparisonMethods = this.config.comparisonMethods,
    label = "artifact"
  ): Promise<ComparisonOutcome[]> {
    const pair = await loadPair(oldFile, newFile, label);
    return this.runMethods(pair, methods, label);
  }

  private async runMethods(
    pair: FilePair,
    methods: ComparisonMethods,
    label: string
  ): Promise<ComparisonOutcome[]> {
    const outcomes: ComparisonOutcome[] = [];
    if (methods.formatCheck) outcomes.push(this.checkFormat(pair));
    if (methods.lineCount) outcomes.push(checkLineCount(pair));
    if (methods.contentDiff) outcomes.push(await this.checkContent(pair, label));
    if (methods.keywordCheck.length > 0) outcomes.push(checkKeywords(pair, methods.keywordCheck));
    for (const pattern of methods.customPatterns) {
      outcomes.push(this.checkPattern(pair, pattern));
    }
    return outcomes;
  }

  private criterion(name: string): Criterion | undefined {
    return this.config.verificationCriteria[name];
  }

  private checkFormat(pair: FilePair): ComparisonOutcome {
    const criterion = this.criterion("format");
    const allowed = criterion?.allowedChanges ?? false;
    const base = { check: "format_check", metric: `allowed changes: ${allowed}` };
    if (pair.kind !== "ready") return unavailable(pair, base);

    const oldExt = extname(pair.old.path);
    const newExt = extname(pair.new.path);
    if (oldExt !== newExt) {
      return { ...base, status: "Failed", detail: `file type changed: ${oldExt || "(none)"} -> ${newExt || "(none)"}` };
    }

    const oldEnding = lineEnding(pair.old.text);
    const newEnding = lineEnding(pair.new.text);
    if (!allowed && oldEnding !== newEnding) {
      return { ...base, status: "Failed", detail: `line endings changed: ${oldEnding} -> ${newEnding}` };
    }

    const size = allowed
      ? evaluateTolerance(pair.old.size, pair.new.size, criterion?.tolerancePercent ?? 50)
      : evaluateAllowedChanges(pair.old.size, pair.new.size, false);
    return size.status === "Success"
      ? { ...base, status: "Success" }
      : { ...base, status: size.status, detail: `size ${size.message} bytes` };
  }

  private async checkContent(pair: FilePair, label: string): Promise<ComparisonOutcome> {
    const base = { check: "content_diff", metric: "exact match required" };
    if (pair.kind !== "ready") return unavailable(pair, base);

    const ops = diffLines(splitLines(pair.old.text), splitLines(pair.new.text));
    const changed = countChangedLines(ops);
    if (changed === 0) return { ...base, status: "Success" };

    const detail = `${changed} differing line${changed === 1 ? "" : "s"}`;
    const dir = this.context.evidenceDir;
    if (!dir) return { ...base, status: "Failed", detail };

    const target = join(dir, evidenceFileName(this.context, `${label}_content.diff`));
    try {
      await mkdir(dir, { recursive: true });
      await writeFile(target, renderDiff(ops, pair.old.path, pair.new.path), "utf-8");
      return { ...base, status: "Failed", detail, evidencePath: target };
    } catch (e) {
      return { ...base, status: "Failed", detail: `${detail} (diff not saved: ${errorMessage(e)})` };
    }
  }

  private checkPattern(pair: FilePair, pattern: CustomPattern): ComparisonOutcome {
    const c = this.criterion(pattern.category ?? pattern.name) ?? this.criterion("custom_patterns");
    const useTolerance = c?.tolerancePercent !== undefined || c?.allowedChanges === undefined;
    const tolerance = c?.tolerancePercent ?? 0;
    const base = {
      itemName: pattern.name,
      check: "custom_patterns",
      metric: useTolerance ? `tolerance: ${tolerance}%` : `allowed changes: ${c?.allowedChanges}`,
    };
    if (pair.kind !== "ready") return unavailable(pair, base);

    let regex: RegExp;
    try {
      regex = compilePattern(pattern.pattern);
    } catch (e) {
      return { ...base, status: "Error", detail: errorMessage(e) };
    }

    const oldValue = extractPattern(regex, pair.old.text);
    const newValue = extractPattern(regex, pair.new.text);
    if (!oldValue.found && !newValue.found) {
      return { ...base, status: "NotApplicable", detail: `pattern "${pattern.name}" not found in either file` };
    }
    if (!oldValue.found || !newValue.found) {
      const side = oldValue.found ? "new" : "old";
      return { ...base, status: "Error", detail: `pattern "${pattern.name}" not found in ${side} file` };
    }

    const result =
      !useTolerance && c?.allowedChanges !== undefined
        ? evaluateAllowedChanges(oldValue.value, newValue.value, c.allowedChanges)
        : typeof oldValue.value === "number" && typeof newValue.value === "number"
          ? evaluateTolerance(oldValue.value, newValue.value, tolerance)
          : evaluateAllowedChanges(oldValue.raw, newValue.raw, false);
    return { ...base, status: result.status, detail: `${pattern.name}: ${result.message}` };
  }
}

export function compareWithConfig(
  oldFile: string | undefined,
  newFile: string | undefined,
  config: ComparisonConfig,
  context?: Partial<ComparatorContext>
): Promise<ComparisonOutcome[]> {
  return new ConfigBasedComparator(config, context).compare(oldFile, newFile);
}

/** Exact-match format, line-count and content checks with no tolerance. */
export function createDefaultComparator(context?: Partial<ComparatorContext>): ConfigBasedComparator {
  return new ConfigBasedComparator(DEFAULT_COMPARISON_CONFIG, context);
}

async function loadPair(
  oldPath: string | undefined,
  newPath: string | undefined,
  label: string
): Promise<FilePair> {
  const oldExists = await fileExists(oldPath);
  const newExists = await fileExists(newPath);
  if (!oldPath || !newPath || !oldExists || !newExists) {
    const which = !oldExists && !newExists ? "both" : !oldExists ? "old" : "new";
    return { kind: "missing", which: which === "both" ? `old and new ${label}` : `${which} ${label}` };
  }
  try {
    return { kind: "ready", old: await load(oldPath), new: await load(newPath) };
  } catch (e) {
    return { kind: "unreadable", message: errorMessage(e) };
  }
}

async function load(path: string): Promise<LoadedFile> {
  const [text, info] = await Promise.all([readText(path), stat(path)]);
  return { path, text, size: info.size };
}

function unavailable(
  pair: Exclude<FilePair, { kind: "ready" }>,
  base: Omit<ComparisonOutcome, "status">
): ComparisonOutcome {
  return pair.kind === "missing"
    ? { ...base, status: "NotApplicable", detail: `${pair.which} missing` }
    : { ...base, status: "Error", detail: pair.message };
}

function checkLineCount(pair: FilePair): ComparisonOutcome {
  const base = { check: "line_count", metric: "exact match required" };
  if (pair.kind !== "ready") return unavailable(pair, base);
  const oldCount = countLines(pair.old.text);
  const newCount = countLines(pair.new.text);
  return oldCount === newCount
    ? { ...base, status: "Success" }
    : { ...base, status: "Failed", detail: `line count ${oldCount} -> ${newCount}` };
}

function checkKeywords(pair: FilePair, keywords: string[]): ComparisonOutcome {
  const base = { check: "keyword_check", metric: "non-decreasing occurrences" };
  if (pair.kind !== "ready") return unavailable(pair, base);

  const counts = keywords.map((keyword) => ({
    keyword,
    oldCount: countOccurrences(pair.old.text, keyword),
    newCount: countOccurrences(pair.new.text, keyword),
  }));
  const passed = counts.every((c) => c.newCount >= c.oldCount);
  const detail = counts.map((c) => `"${c.keyword}": ${c.oldCount} -> ${c.newCount}`).join(", ");
  return { ...base, status: passed ? "Success" : "Failed", detail };
}

function scanIssues(pair: FilePair): ComparisonOutcome {
  const base = { check: "error_scan", metric: "no increase in warning/error lines" };
  if (pair.kind !== "ready") return unavailable(pair, base);
  const count = (text: string) => splitLines(text).filter((line) => ISSUE_LINE.test(line)).length;
  const oldCount = count(pair.old.text);
  const newCount = count(pair.new.text);
  return {
    ...base,
    status: newCount <= oldCount ? "Success" : "Failed",
    detail: `warning/error lines ${oldCount} -> ${newCount}`,
  };
}

/** `<tool>_<old>_<new>_<suffix>`, so runs over different version pairs never share a file. */
export function evidenceFileName(context: Partial<ComparatorContext>, suffix: string): string {
  const { toolName = "tool", oldVersion, newVersion } = context;
  const parts = [toolName, oldVersion, newVersion].filter((p): p is string => p !== undefined);
  return [...parts.map(safeName), suffix].join("_");
}

function safeName(name: string): string {
  return basename(name).replace(/[^A-Za-z0-9_.-]/g, "_");
}
