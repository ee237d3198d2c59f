#!/usr/bin/env node
import { Command } from "commander";
import { createRequire } from "node:module";
import chalk from "chalk";
import { errorMessage } from "@verup/core";
import { runInit } from "./commands/init.js";
import { runList } from "./commands/list.js";
import { runRun, type RunOptions } from "./commands/run.js";

const require = createRequire(import.meta.url);
const pkg: { version?: string } = require("../package.json");
const packageVersion = pkg.version ?? "0.0.0";

const program = new Command();

program
  .name("verup")
  .description("Verify that a new tool version still produces what the old one did")
  .version(packageVersion);

program
  .command("init")
  .description("Create a config file and the default directory layout")
  .action(async () => {
    await runInit();
  });

program
  .command("list")
  .description("List discovered tools, their versions and comparators")
  .action(async () => {
    await runList();
  });

program
  .command("run")
  .description("Run old and new versions of each tool and compare their output")
  .option("--tool <name>", "Verify only this tool")
  .option("--old <version>", "Baseline version (default: second newest)")
  .option("--new <version>", "Candidate version (default: newest)")
  .option("--format <list>", "Report formats: csv,html,json")
  .option("--output-dir <dir>", "Directory for report files")
  .option("--no-report", "Skip writing report files")
  .option("--debug", "Print debug output")
  .option("--silent", "Print nothing; rely on the exit code")
  .action(async (options: RunOptions) => {
    process.exitCode = await runRun(options);
  });

program.parseAsync().catch((e: unknown) => {
  console.error(chalk.red(`  Error: ${errorMessage(e)}`));
  process.exitCode = 1;
});
