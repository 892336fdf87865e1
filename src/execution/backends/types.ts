import type { ChildProcess } from "child_process";
import type { EventLog } from "../../core/eventLog.js";
import type { GridEngineJobId, JobId, LocalJobId } from "../../core/ids.js";

export type RunnerKind = "local_process" | "grid_engine";

interface JobRecordBase {
  name: string;
  workingDir: string;
  /** Log directory in effect when the job was submitted. */
  logDir: string;
  logFile: string;
  /** null when stderr is joined into the log file. */
  errFile: string | null;
  /** ISO timestamp. */
  submittedAt: string;
  finished: boolean;
}

export interface LocalJobRecord extends JobRecordBase {
  kind: "local_process";
  id: LocalJobId;
  pid: number;
  child: ChildProcess;
}

export interface GridEngineJobRecord extends JobRecordBase {
  kind: "grid_engine";
  id: GridEngineJobId;
  schedulerId: string;
  schedulerName: string;
}

export type JobRecord = LocalJobRecord | GridEngineJobRecord;

export interface RunnerOptions {
  /** Merge stderr into the stdout log; no separate error file is produced. */
  joinLogs?: boolean;
  /** Initial log directory; defaults to each job's working directory. */
  logDir?: string | null;
  events?: EventLog;
}

export interface JobStatus {
  running: boolean;
  /** Only ever true while the job is still listed by its backend. */
  errorState: boolean;
  submittedAt: string;
}

export interface JobRunner<K extends RunnerKind = RunnerKind> {
  readonly kind: K;
  readonly joinLogs: boolean;
  readonly logDir: string | null;

  submit(name: string, workingDir: string, command: string, args: readonly string[]): Promise<JobId>;
  isRunning(jobId: JobId): Promise<boolean>;
  terminate(jobId: JobId): Promise<boolean>;
  errorState(jobId: JobId): Promise<boolean>;
  /** Liveness and error state taken from a single observation of the backend. */
  status(jobId: JobId): Promise<JobStatus>;
  list(): Promise<JobId[]>;

  jobName(jobId: JobId): string;
  logFile(jobId: JobId): string;
  errFile(jobId: JobId): string | null;

  /** Applies to jobs submitted after the call; null restores the working-directory default. */
  setLogDir(dir: string | null): void;
}
