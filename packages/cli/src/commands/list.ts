import chalk from "chalk";
import { ComparatorResolver, discoverTools } from "@verup/core";
import { loadConfig } from "../config.js";

const TIER_LABEL = {
  class: "comparator module",
  config: "comparison config",
  default: "default comparator",
} as const;

export async function runList(): Promise<void> {
  const { config } = await loadConfig();
  const tools = await discoverTools(config.toolsDir);

  console.log();
  if (tools.length === 0) {
    console.log(chalk.yellow(`  No tools found under ${config.toolsDir}`));
    console.log(chalk.dim("  Add tool versions as <toolsDir>/<tool>/<version>/ directories."));
    console.log();
    return;
  }

  const resolver = new ComparatorResolver({
    comparatorsDir: config.comparatorsDir,
    configDirs: config.configDirs,
  });
  for (const { tool, versions } of tools) {
    const resolution = await resolver.resolve(tool);
    const source =
      resolution.kind === "class"
        ? resolution.modulePath
        : resolution.kind === "config"
          ? resolution.configPath
          : "built-in";
    console.log(`  ${chalk.bold(tool)}  ${versions.join(", ")}`);
    console.log(chalk.dim(`    ${TIER_LABEL[resolution.kind]} (${source})`));
  }
  console.log();
}
