import { mkdir, readdir, writeFile } from "node:fs/promises";
import { extname, join, resolve } from "node:path";
import { escape, glob } from "glob";
import { DEFAULT_COMPARISON_CONFIG, type ComparisonConfig } from "../config/comparison.js";
import { errorMessage, errorProperty } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { VersionRun } from "../verify.js";
import { LocalExecutor, type CommandExecutor } from "./executor.js";

export interface RunnerSettings {
  toolsDir: string;
  artifactsDir: string;
  inputsDir: string;
  logsDir: string;
  timeout?: number;
}

export interface ToolVersions {
  tool: string;
  versions: string[];
}

export type RunSide = "old" | "new";

/** Executable extensions, in the order they are preferred. */
export const EXECUTABLE_EXTENSIONS = [".js", ".mjs", ".sh", ".py", ".exe", ".bat", ".cmd"] as const;

const INTERPRETERS: Record<string, string> = {
  ".js": "node",
  ".mjs": "node",
  ".py": "python3",
  ".sh": "sh",
};

const DEFAULT_COMMAND = "{exec} {inputs}";

/**
 * Runs one version of a tool and collects what the comparators need: the
 * execution status, the log file and the artifact it produced. Failures end
 * up in the returned run, never as exceptions.
 */
export class ToolRunner {
  private readonly settings: RunnerSettings;
  private readonly executor: CommandExecutor;
  private readonly logger: Logger;

  constructor(settings: RunnerSettings, executor?: CommandExecutor, logger?: Logger) {
    this.settings = settings;
    this.executor = executor ?? new LocalExecutor();
    this.logger = logger ?? silentLogger;
  }

  async runVersion(
    tool: string,
    version: string,
    side: RunSide,
    config: ComparisonConfig = DEFAULT_COMPARISON_CONFIG
  ): Promise<VersionRun> {
    try {
      return await this.runUnchecked(tool, version, side, config);
    } catch (e) {
      return { version, execution: { status: "Error", detail: errorMessage(e) } };
    }
  }

  private async runUnchecked(
    tool: string,
    version: string,
    side: RunSide,
    config: ComparisonConfig
  ): Promise<VersionRun> {
    const versionDir = join(this.settings.toolsDir, tool, version);
    const executable = await findExecutable(versionDir);
    if (!executable) {
      this.logger.warn(`No executable found in ${versionDir}`);
      return { version, execution: { status: "Error", detail: `no executable found in ${versionDir}` } };
    }

    const inputs = await this.resolveInputs(config.inputFiles);
    const command = buildCommand(config.executeCommand ?? DEFAULT_COMMAND, {
      exec: executableCommand(executable),
      version,
      tool,
      inputs: inputs.map(quote).join(" "),
      output_dir: quote(this.settings.artifactsDir),
    }, config.parameters);

    await mkdir(this.settings.artifactsDir, { recursive: true });
    this.logger.debug(`${tool} ${version}: ${command}`);
    const result = await this.executor.exec(command, { timeout: this.settings.timeout });

    await mkdir(this.settings.logsDir, { recursive: true });
    const logPath = join(this.settings.logsDir, `${tool}_${version}.log`);
    await writeFile(logPath, result.stdout + result.stderr, "utf-8");

    const custom = side === "old" ? config.oldArtifactPattern : config.newArtifactPattern;
    const artifactPath = custom
      ? await this.findArtifact(fillPlaceholders(custom, { tool: escape(tool), version: escape(version) }))
      : await this.findArtifact(`${escape(`${tool}_${version}`)}*`, `${tool}_${version}`);
    if (!artifactPath) {
      this.logger.warn(`${tool} ${version}: no artifact matched ${custom ?? `${tool}_${version}.*`}`);
    }

    const detail = result.timedOut
      ? `timed out after ${this.settings.timeout ?? 30000}ms`
      : result.exitCode !== 0
        ? `exited with code ${result.exitCode}`
        : undefined;
    return {
      version,
      execution: {
        status: result.exitCode === 0 ? "Success" : "Error",
        detail,
        exitCode: result.exitCode,
      },
      artifactPath,
      logPath,
    };
  }

  private async resolveInputs(patterns: readonly string[]): Promise<string[]> {
    const found: string[] = [];
    for (const pattern of patterns) {
      const matches = await glob(pattern, { cwd: this.settings.inputsDir, nodir: true });
      if (matches.length === 0) this.logger.warn(`No input files matched ${pattern}`);
      found.push(...matches.sort().map((m) => join(this.settings.inputsDir, m)));
    }
    return found;
  }

  /** With a `stem`, only `<stem>` itself or `<stem>.<ext>` counts, so `t_1.0` never takes `t_1.0.1.txt`. */
  private async findArtifact(pattern: string, stem?: string): Promise<string | undefined> {
    const matches = (await glob(pattern, { cwd: this.settings.artifactsDir, nodir: true }))
      .filter((m) => stem === undefined || isStemMatch(m, stem))
      .sort();
    if (matches.length > 1) {
      this.logger.debug(`${matches.length} artifacts matched ${pattern}, using ${matches[0]}`);
    }
    return matches.length > 0 ? join(this.settings.artifactsDir, matches[0]) : undefined;
  }
}

/** Tool directories under `toolsDir`, each with its version directories oldest first. */
export async function discoverTools(toolsDir: string): Promise<ToolVersions[]> {
  const tools: ToolVersions[] = [];
  for (const entry of await listDirs(toolsDir)) {
    const versions = (await listDirs(join(toolsDir, entry))).sort(compareVersions);
    if (versions.length > 0) tools.push({ tool: entry, versions });
  }
  return tools.sort((a, b) => a.tool.localeCompare(b.tool));
}

export function compareVersions(a: string, b: string): number {
  return a.localeCompare(b, undefined, { numeric: true, sensitivity: "base" });
}

async function listDirs(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.filter((e) => e.isDirectory()).map((e) => e.name);
  } catch (e) {
    if (errorProperty(e, "code") === "ENOENT") return [];
    throw e;
  }
}

async function findExecutable(dir: string): Promise<string | undefined> {
  const files = (await glob(`*{${EXECUTABLE_EXTENSIONS.join(",")}}`, { cwd: dir, nodir: true })).sort();
  for (const ext of EXECUTABLE_EXTENSIONS) {
    const match = files.find((f) => extname(f).toLowerCase() === ext);
    if (match) return resolve(dir, match);
  }
  return undefined;
}

const EXTENSION_SUFFIX = /^(\.[A-Za-z][A-Za-z0-9]*)*$/;

export function isStemMatch(file: string, stem: string): boolean {
  return file.startsWith(stem) && EXTENSION_SUFFIX.test(file.slice(stem.length));
}

function executableCommand(path: string): string {
  const interpreter = INTERPRETERS[extname(path).toLowerCase()];
  return interpreter ? `${interpreter} ${quote(path)}` : quote(path);
}

export function buildCommand(
  template: string,
  values: Record<string, string>,
  parameters: readonly string[] = []
): string {
  const command = fillPlaceholders(template, values).trim();
  return parameters.length > 0 ? `${command} ${parameters.map(quote).join(" ")}` : command;
}

export function fillPlaceholders(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (whole, key: string) => values[key] ?? whole);
}

/** POSIX shell quoting, only where the word needs it. */
export function quote(word: string): string {
  if (word !== "" && /^[\w@%+=:,./-]+$/.test(word)) return word;
  return `'${word.replace(/'/g, `'\\''`)}'`;
}
