import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { DeploymentError } from "../errors";

const execFileAsync = promisify(execFile);

export interface CommandResult {
  stdout: string;
  stderr: string;
}

/** Runs an external tool; rejects with DeploymentError on a non-zero exit. */
export interface CommandRunner {
  run(command: string, args: string[]): Promise<CommandResult>;
}

export function describeCommand(command: string, args: string[]): string {
  return [command, ...args].join(" ");
}

export function createCommandRunner(): CommandRunner {
  return {
    async run(command, args) {
      try {
        const { stdout, stderr } = await execFileAsync(command, args, {
          maxBuffer: 16 * 1024 * 1024,
        });
        return { stdout, stderr };
      } catch (err) {
        const stderr =
          err !== null && typeof err === "object" && "stderr" in err && typeof err.stderr === "string"
            ? err.stderr
            : undefined;
        throw new DeploymentError({
          message: `${command} failed: ${err instanceof Error ? err.message : String(err)}`,
          command: describeCommand(command, args),
          stderr,
          cause: err,
        });
      }
    },
  };
}
