export type { JobId, LocalJobId, GridEngineJobId } from "./core/ids.js";
export { isJobId } from "./core/ids.js";
export {
  ConfigError,
  ExecutionUnavailableError,
  RunnerSpecError,
  SchedulerCommandError,
  UnknownJobError,
  UnknownRunnerError,
  errorMessage
} from "./core/errors.js";
export type { EventLog } from "./core/eventLog.js";
export { SilentEventLog, StderrEventLog, defaultEventLog } from "./core/eventLog.js";
export type { JobRecord, JobRunner, JobStatus, RunnerKind, RunnerOptions } from "./execution/backends/types.js";
export { LocalProcessRunner, type LocalProcessRunnerOptions } from "./execution/backends/localProcess.js";
export {
  GridEngineRunner,
  type GridEnginePrograms,
  type GridEngineRunnerOptions
} from "./execution/backends/gridEngine.js";
export type { CommandResult, CommandRunner } from "./execution/gridengine/commandRunner.js";
export { SystemCommandRunner } from "./execution/gridengine/commandRunner.js";
export { fetchRunner, parseRunnerSpec, type RunnerDefaults, type RunnerName } from "./execution/runnerFactory.js";
export { waitForJobs, type WaitOptions } from "./execution/polling.js";
export { RunnerSettings, type RunnerConfig } from "./config/runnerConfig.js";
