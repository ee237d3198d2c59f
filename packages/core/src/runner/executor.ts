import { exec as execCb } from "node:child_process";
import { promisify } from "node:util";
import { errorProperty } from "../errors.js";

const execAsync = promisify(execCb);

export interface ExecOpts {
  cwd?: string;
  timeout?: number;
}

export interface ExecResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut?: boolean;
}

/** Runs one shell command. Implementations report failures in the result. */
export interface CommandExecutor {
  exec(command: string, opts?: ExecOpts): Promise<ExecResult>;
}

export class LocalExecutor implements CommandExecutor {
  async exec(command: string, opts?: ExecOpts): Promise<ExecResult> {
    const timeout = opts?.timeout ?? 30000;

    try {
      const { stdout, stderr } = await execAsync(command, {
        cwd: opts?.cwd,
        timeout,
        maxBuffer: 10 * 1024 * 1024,
      });
      return { exitCode: 0, stdout, stderr };
    } catch (e: unknown) {
      const code = errorProperty(e, "code");
      const stdout = errorProperty(e, "stdout");
      const stderr = errorProperty(e, "stderr");
      const timedOut = errorProperty(e, "killed") === true && errorProperty(e, "signal") === "SIGTERM";
      return {
        exitCode: typeof code === "number" ? code : 1,
        stdout: typeof stdout === "string" ? stdout : "",
        stderr: typeof stderr === "string" && stderr ? stderr : String(e),
        timedOut: timedOut || undefined,
      };
    }
  }
}
