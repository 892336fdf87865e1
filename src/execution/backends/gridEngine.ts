import path from "path";
import { SchedulerCommandError } from "../../core/errors.js";
import { defaultEventLog, type EventLog } from "../../core/eventLog.js";
import { gridEngineJobId, type JobId } from "../../core/ids.js";
import { SystemCommandRunner, type CommandRunner } from "../gridengine/commandRunner.js";
import { buildQsubArgs, extraArgsJoinLogs, gridEngineJobName, parseQsubJobId } from "../gridengine/qsub.js";
import { isErrorState, parseQstatJobs, type QstatEntry } from "../gridengine/qstat.js";
import { JobBook, assertJobName } from "./jobBook.js";
import type { GridEngineJobRecord, JobRunner, JobStatus, RunnerOptions } from "./types.js";

export interface GridEnginePrograms {
  qsub: string;
  qstat: string;
  qdel: string;
}

export const DEFAULT_GRID_ENGINE_PROGRAMS: GridEnginePrograms = {
  qsub: "qsub",
  qstat: "qstat",
  qdel: "qdel"
};

export interface GridEngineRunnerOptions extends RunnerOptions {
  /** Appended verbatim to every qsub invocation, e.g. ["-l", "short"] or ["-j", "y"]. */
  extraArgs?: readonly string[];
  programs?: Partial<GridEnginePrograms>;
  /** Used by the default command runner; ignored when `commands` is given. */
  commandTimeoutMs?: number;
  commands?: CommandRunner;
}

/**
 * Submits jobs with qsub and follows them through qstat/qdel.
 *
 * Output files are created by the scheduler once the job starts, named
 * `<name>.o<id>` and `<name>.e<id>` in the log directory, so they may not exist
 * yet while a job is still queued.
 */
export class GridEngineRunner implements JobRunner<"grid_engine"> {
  readonly kind = "grid_engine" as const;
  readonly joinLogs: boolean;
  readonly extraArgs: readonly string[];
  readonly programs: GridEnginePrograms;

  private readonly book: JobBook<GridEngineJobRecord>;
  private readonly events: EventLog;
  private readonly commands: CommandRunner;

  constructor(options: GridEngineRunnerOptions = {}) {
    this.extraArgs = [...(options.extraArgs ?? [])];
    this.joinLogs = (options.joinLogs ?? false) || extraArgsJoinLogs(this.extraArgs);
    this.programs = {
      qsub: options.programs?.qsub ?? DEFAULT_GRID_ENGINE_PROGRAMS.qsub,
      qstat: options.programs?.qstat ?? DEFAULT_GRID_ENGINE_PROGRAMS.qstat,
      qdel: options.programs?.qdel ?? DEFAULT_GRID_ENGINE_PROGRAMS.qdel
    };
    this.book = new JobBook(options.logDir ?? null);
    this.events = options.events ?? defaultEventLog();
    this.commands = options.commands ?? new SystemCommandRunner(options.commandTimeoutMs);
  }

  get logDir(): string | null {
    return this.book.logDir;
  }

  setLogDir(dir: string | null): void {
    this.book.setLogDir(dir);
  }

  async submit(name: string, workingDir: string, command: string, args: readonly string[]): Promise<JobId> {
    assertJobName(name);
    if (!command) throw new Error("command must be non-empty");

    const cwd = path.resolve(workingDir);
    const logDir = this.book.resolveLogDir(cwd);
    const schedulerName = gridEngineJobName(name);

    const qsubArgs = buildQsubArgs({
      schedulerName,
      workingDir: cwd,
      logDir,
      joinLogs: this.joinLogs,
      extraArgs: this.extraArgs,
      command,
      args
    });

    const res = await this.commands.run(this.programs.qsub, qsubArgs);
    if (res.status !== 0) {
      throw new SchedulerCommandError(this.programs.qsub, res.status, res.stderr);
    }

    const schedulerId = parseQsubJobId(res.stdout) ?? parseQsubJobId(res.stderr);
    if (!schedulerId) {
      throw new Error(`unable to parse qsub job id from output: ${res.stdout || res.stderr}`);
    }

    // scheduler ids wrap around on long-lived clusters
    const id = this.book.freshId(gridEngineJobId(schedulerId), (generation) =>
      gridEngineJobId(`${schedulerId}.${generation}`)
    );
    const { logFile, errFile } = JobBook.logPaths(logDir, schedulerName, schedulerId, this.joinLogs);

    this.book.add({
      kind: "grid_engine",
      id,
      schedulerId,
      schedulerName,
      name,
      workingDir: cwd,
      logDir,
      logFile,
      errFile,
      submittedAt: new Date().toISOString(),
      finished: false
    });

    this.events.event("job.submit", `${name} (${id}): ${command}`, {
      job_id: id,
      scheduler_name: schedulerName,
      working_dir: cwd,
      log_file: logFile,
      err_file: errFile
    });
    return id;
  }

  private async activeJobs(): Promise<Map<string, QstatEntry>> {
    const res = await this.commands.run(this.programs.qstat, []);
    if (res.status !== 0) {
      throw new SchedulerCommandError(this.programs.qstat, res.status, res.stderr);
    }
    return parseQstatJobs(res.stdout);
  }

  private observe(record: GridEngineJobRecord, active: Map<string, QstatEntry>): QstatEntry | null {
    if (record.finished) return null;
    const entry = active.get(record.schedulerId);
    if (entry) return entry;
    if (this.book.markFinished(record)) {
      this.events.event("job.finished", `${record.name} (${record.id})`, { job_id: record.id });
    }
    return null;
  }

  async isRunning(jobId: JobId): Promise<boolean> {
    const record = this.book.get(jobId);
    if (record.finished) return false;
    return this.observe(record, await this.activeJobs()) !== null;
  }

  async errorState(jobId: JobId): Promise<boolean> {
    const record = this.book.get(jobId);
    if (record.finished) return false;
    const entry = this.observe(record, await this.activeJobs());
    return entry ? isErrorState(entry.state) : false;
  }

  async status(jobId: JobId): Promise<JobStatus> {
    const record = this.book.get(jobId);
    const entry = record.finished ? null : this.observe(record, await this.activeJobs());
    return {
      running: entry !== null,
      errorState: entry ? isErrorState(entry.state) : false,
      submittedAt: record.submittedAt
    };
  }

  async terminate(jobId: JobId): Promise<boolean> {
    const record = this.book.get(jobId);
    if (record.finished) return true;

    const res = await this.commands.run(this.programs.qdel, [record.schedulerId]);
    if (res.status === 0) {
      this.events.event("job.terminate", `${record.name} (${jobId})`, { job_id: jobId });
      return true;
    }

    // qdel fails for jobs that already left the queue
    return !(await this.isRunning(jobId));
  }

  async list(): Promise<JobId[]> {
    const pending = this.book.all().filter((r) => !r.finished);
    if (!pending.length) return [];
    const active = await this.activeJobs();
    return pending.filter((r) => this.observe(r, active) !== null).map((r) => r.id);
  }

  jobName(jobId: JobId): string {
    return this.book.get(jobId).name;
  }

  logFile(jobId: JobId): string {
    return this.book.get(jobId).logFile;
  }

  errFile(jobId: JobId): string | null {
    return this.book.get(jobId).errFile;
  }
}
