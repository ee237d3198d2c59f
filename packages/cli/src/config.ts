import { cosmiconfig } from "cosmiconfig";
import { z } from "zod";
import { ConfigLoadError, errorMessage } from "@verup/core";

export const REPORT_FORMATS = ["csv", "html", "json"] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

const ItemTemplateSchema = z.object({
  phase: z.enum(["Execution", "Artifact", "Log", "Summary"]),
  item: z.string().min(1),
  successMemo: z.string(),
  failureMemo: z.string(),
  linkType: z.enum(["log", "new_artifact", "compare_artifacts", "diff", "report"]),
});

export const VerupConfigSchema = z.object({
  toolsDir: z.string().default("tools"),
  artifactsDir: z.string().default("artifacts"),
  inputsDir: z.string().default("inputs"),
  logsDir: z.string().default("logs"),
  comparatorsDir: z.string().default("comparators"),
  configDirs: z.array(z.string()).default(["comparators/configs", "configs"]),
  evidenceDir: z.string().default("evidence"),
  /** Per-version execution timeout in milliseconds. */
  timeout: z.number().int().positive().default(300000),
  report: z
    .object({
      formats: z.array(z.enum(REPORT_FORMATS)).default(["csv"]),
      outputDir: z.string().default("reports"),
    })
    .default({}),
  /** Item templates per tool name, replacing the built-in list for that tool. */
  items: z.record(z.string(), z.array(ItemTemplateSchema)).default({}),
});

/** What a config file may contain; every key is optional. */
export type VerupConfig = z.input<typeof VerupConfigSchema>;
export type ResolvedConfig = z.output<typeof VerupConfigSchema>;

export interface LoadedConfig {
  config: ResolvedConfig;
  /** Absent when no config file was found and defaults apply. */
  filepath?: string;
}

export function defineConfig(config: VerupConfig): VerupConfig {
  return config;
}

export async function loadConfig(searchFrom?: string): Promise<LoadedConfig> {
  const explorer = cosmiconfig("verup", {
    searchPlaces: [
      "verup.config.ts",
      "verup.config.js",
      "verup.config.json",
      ".veruprc",
      ".veruprc.json",
    ],
  });

  const result = await explorer.search(searchFrom).catch((e: unknown) => {
    throw new ConfigLoadError(searchFrom ?? process.cwd(), errorMessage(e), { cause: e });
  });

  if (!result || result.isEmpty) {
    return { config: VerupConfigSchema.parse({}), filepath: result?.filepath };
  }

  const parsed = VerupConfigSchema.safeParse(interpolateEnvVars(result.config));
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigLoadError(result.filepath, detail);
  }
  return { config: parsed.data, filepath: result.filepath };
}

/** Replaces `${env.NAME}` in every string of a config tree; unset variables become "". */
export function interpolateEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{env\.(\w+)\}/g, (_, key: string) => env[key] ?? "");
  }
  if (Array.isArray(value)) {
    return value.map((v) => interpolateEnvVars(v, env));
  }
  if (typeof value === "object" && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, v] of Object.entries(value)) {
      result[key] = interpolateEnvVars(v, env);
    }
    return result;
  }
  return value;
}
