import { join } from "node:path";
import { cosmiconfig } from "cosmiconfig";
import { z } from "zod";
import { ConfigLoadError, errorMessage } from "../errors.js";
import { fileExists } from "../compare/text.js";

export interface CustomPattern {
  name: string;
  pattern: string;
  /** Key into `verificationCriteria`; defaults to the pattern name. */
  category?: string;
}

export interface ComparisonMethods {
  formatCheck: boolean;
  lineCount: boolean;
  contentDiff: boolean;
  keywordCheck: string[];
  customPatterns: CustomPattern[];
}

export interface Criterion {
  tolerancePercent?: number;
  allowedChanges?: boolean;
}

export interface ComparisonConfig {
  executeCommand?: string;
  oldArtifactPattern?: string;
  newArtifactPattern?: string;
  inputFiles: string[];
  parameters: string[];
  comparisonMethods: ComparisonMethods;
  logComparisonMethods?: ComparisonMethods;
  verificationCriteria: Record<string, Criterion>;
}

export const NO_METHODS: ComparisonMethods = {
  formatCheck: false,
  lineCount: false,
  contentDiff: false,
  keywordCheck: [],
  customPatterns: [],
};

export const DEFAULT_COMPARISON_CONFIG: ComparisonConfig = {
  inputFiles: [],
  parameters: [],
  comparisonMethods: { ...NO_METHODS, formatCheck: true, lineCount: true, contentDiff: true },
  verificationCriteria: {},
};

// YAML leaves `key:` with no value as null
const nullable = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => (v === null ? undefined : v), schema);

const MethodsSchema = z.object({
  format_check: nullable(z.boolean().default(false)),
  line_count: nullable(z.boolean().default(false)),
  content_diff: nullable(z.boolean().default(false)),
  keyword_check: nullable(z.array(z.string()).default([])),
  custom_patterns: nullable(
    z
      .array(
        z.object({
          name: z.string().min(1),
          pattern: z.string().min(1),
          category: z.string().min(1).optional(),
        })
      )
      .default([])
  ),
});

const CriterionSchema = z.object({
  tolerance_percent: z.number().nonnegative().optional(),
  allowed_changes: z.boolean().optional(),
});

const ComparisonFileSchema = z.object({
  execute_command: nullable(z.string().optional()),
  old_artifact_pattern: nullable(z.string().optional()),
  new_artifact_pattern: nullable(z.string().optional()),
  input_files: nullable(z.union([z.string(), z.array(z.string())]).default([])),
  parameters: nullable(z.array(z.union([z.string(), z.number()])).default([])),
  comparison_methods: nullable(MethodsSchema.optional()),
  log_comparison_methods: nullable(MethodsSchema.optional()),
  verification_criteria: nullable(z.record(z.string(), nullable(CriterionSchema.default({}))).default({})),
});

type MethodsFile = z.infer<typeof MethodsSchema>;

function toMethods(file: MethodsFile): ComparisonMethods {
  return {
    formatCheck: file.format_check,
    lineCount: file.line_count,
    contentDiff: file.content_diff,
    keywordCheck: file.keyword_check,
    customPatterns: file.custom_patterns,
  };
}

/** Validates a parsed config object. Unknown keys are dropped. */
export function parseComparisonConfig(raw: unknown): ComparisonConfig {
  const file = ComparisonFileSchema.parse(raw ?? {});
  const criteria: Record<string, Criterion> = {};
  for (const [name, c] of Object.entries(file.verification_criteria)) {
    criteria[name] = { tolerancePercent: c.tolerance_percent, allowedChanges: c.allowed_changes };
  }
  return {
    executeCommand: file.execute_command,
    oldArtifactPattern: file.old_artifact_pattern,
    newArtifactPattern: file.new_artifact_pattern,
    inputFiles: typeof file.input_files === "string" ? [file.input_files] : file.input_files,
    parameters: file.parameters.map(String),
    comparisonMethods: file.comparison_methods ? toMethods(file.comparison_methods) : { ...NO_METHODS },
    logComparisonMethods: file.log_comparison_methods ? toMethods(file.log_comparison_methods) : undefined,
    verificationCriteria: criteria,
  };
}

export async function loadComparisonConfig(path: string): Promise<ComparisonConfig> {
  const explorer = cosmiconfig("verup", { cache: false });
  let raw: unknown;
  try {
    const result = await explorer.load(path);
    raw = !result || result.isEmpty ? {} : result.config;
  } catch (e) {
    throw new ConfigLoadError(path, errorMessage(e), { cause: e });
  }
  try {
    return parseComparisonConfig(raw);
  } catch (e) {
    const detail =
      e instanceof z.ZodError
        ? e.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ")
        : errorMessage(e);
    throw new ConfigLoadError(path, detail, { cause: e });
  }
}

export const CONFIG_EXTENSIONS = [".yaml", ".yml", ".json"] as const;

/** First `<tool>.yaml|.yml|.json` found across the directories, in order. */
export async function findComparisonConfig(
  tool: string,
  dirs: readonly string[]
): Promise<string | undefined> {
  const base = tool.toLowerCase();
  for (const dir of dirs) {
    for (const ext of CONFIG_EXTENSIONS) {
      const candidate = join(dir, base + ext);
      if (await fileExists(candidate)) return candidate;
    }
  }
  return undefined;
}
