import chalk from "chalk";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export function createConsoleLogger(options?: { debug?: boolean }): Logger {
  return {
    info: (message) => console.log(chalk.dim(`  ${message}`)),
    warn: (message) => console.warn(chalk.yellow(`  Warning: ${message}`)),
    error: (message) => console.error(chalk.red(`  Error: ${message}`)),
    debug: (message) => {
      if (options?.debug) console.log(chalk.gray(`  [debug] ${message}`));
    },
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
