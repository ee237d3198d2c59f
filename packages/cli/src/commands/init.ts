import { mkdir, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import chalk from "chalk";

const DEFAULT_CONFIG = `import { defineConfig } from "@verup/cli";

export default defineConfig({
  toolsDir: "tools",
  artifactsDir: "artifacts",
  inputsDir: "inputs",
  logsDir: "logs",
  comparatorsDir: "comparators",
  configDirs: ["comparators/configs"],
  evidenceDir: "evidence",
  report: {
    formats: ["csv", "html"],
    outputDir: "reports",
  },
});
`;

const SAMPLE_COMPARISON = `# Comparison settings for tools/sample_tool/<version>/
execute_command: "{exec} {inputs} {output_dir}"
input_files:
  - "*.txt"
comparison_methods:
  format_check: true
  line_count: true
  content_diff: true
  keyword_check: []
  custom_patterns:
    - name: accuracy
      pattern: "accuracy:\\\\s*(\\\\d+\\\\.\\\\d+)"
verification_criteria:
  accuracy:
    tolerance_percent: 1
`;

const DIRECTORIES = ["tools", "inputs", "artifacts", "logs", "evidence", "reports", join("comparators", "configs")];

export async function runInit(): Promise<void> {
  const cwd = process.cwd();

  console.log();
  console.log(chalk.bold("  Initializing verification project"));
  console.log(chalk.dim("  " + "─".repeat(40)));
  console.log();

  const configPath = join(cwd, "verup.config.ts");
  if (existsSync(configPath)) {
    console.log(chalk.yellow("  verup.config.ts already exists, skipping"));
  } else {
    await writeFile(configPath, DEFAULT_CONFIG, "utf-8");
    console.log(chalk.green("  Created verup.config.ts"));
  }

  for (const dir of DIRECTORIES) {
    const path = join(cwd, dir);
    if (!existsSync(path)) {
      await mkdir(path, { recursive: true });
      console.log(chalk.green(`  Created ${dir}/`));
    }
  }

  const samplePath = join(cwd, "comparators", "configs", "sample_tool.yaml");
  if (!existsSync(samplePath)) {
    await writeFile(samplePath, SAMPLE_COMPARISON, "utf-8");
    console.log(chalk.green("  Created comparators/configs/sample_tool.yaml"));
  }

  console.log();
  console.log(chalk.bold("  Next steps:"));
  console.log(chalk.dim("  1. Put each tool version under tools/<tool>/<version>/"));
  console.log(chalk.dim("  2. Describe the comparison in comparators/configs/<tool>.yaml"));
  console.log(chalk.dim("     or write comparators/<tool>.comparator.js for custom logic"));
  console.log(chalk.dim("  3. Run: verup run --tool <tool>"));
  console.log();
}
