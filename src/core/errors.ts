/**
 * Extract error message from unknown catch value.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * The local process could not be spawned, or a scheduler program could not be
 * started (not installed, not executable, timed out).
 */
export class ExecutionUnavailableError extends Error {
  override readonly name = "ExecutionUnavailableError";

  constructor(
    readonly program: string,
    cause: unknown
  ) {
    super(`unable to execute ${program}: ${errorMessage(cause)}`, { cause });
  }
}

export class SchedulerCommandError extends Error {
  override readonly name = "SchedulerCommandError";

  constructor(
    readonly program: string,
    readonly exitCode: number | null,
    readonly stderr: string
  ) {
    super(`${program} failed (exit ${exitCode ?? "signal"})${stderr.trim() ? `: ${stderr.trim()}` : ""}`);
  }
}

export class UnknownRunnerError extends Error {
  override readonly name = "UnknownRunnerError";

  constructor(readonly runnerName: string) {
    super(`unknown job runner: ${runnerName}`);
  }
}

export class RunnerSpecError extends Error {
  override readonly name = "RunnerSpecError";
}

export class UnknownJobError extends Error {
  override readonly name = "UnknownJobError";

  constructor(readonly jobId: string) {
    super(`unknown job_id: ${jobId}`);
  }
}

export class ConfigError extends Error {
  override readonly name = "ConfigError";
}
