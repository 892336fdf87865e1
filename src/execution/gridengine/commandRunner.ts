import { spawnSync } from "child_process";
import { ExecutionUnavailableError } from "../../core/errors.js";

export const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;

export interface CommandResult {
  status: number | null;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  run(program: string, args: readonly string[]): Promise<CommandResult>;
}

export class SystemCommandRunner implements CommandRunner {
  constructor(private readonly timeoutMs: number = DEFAULT_COMMAND_TIMEOUT_MS) {}

  async run(program: string, args: readonly string[]): Promise<CommandResult> {
    const res = spawnSync(program, [...args], {
      stdio: ["ignore", "pipe", "pipe"],
      timeout: this.timeoutMs > 0 ? this.timeoutMs : undefined
    });

    if (res.error) {
      throw new ExecutionUnavailableError(program, res.error);
    }

    return {
      status: res.status,
      stdout: res.stdout ? res.stdout.toString("utf8") : "",
      stderr: res.stderr ? res.stderr.toString("utf8") : ""
    };
  }
}
