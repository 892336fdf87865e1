import { spawn, type ChildProcess } from "child_process";
import { once } from "events";
import { closeSync, openSync, renameSync, rmSync, statSync, type Stats } from "fs";
import path from "path";
import { ExecutionUnavailableError, errorMessage } from "../../core/errors.js";
import { defaultEventLog, type EventLog } from "../../core/eventLog.js";
import { localJobId, pendingLogStem, type JobId } from "../../core/ids.js";
import { JobBook, assertJobName } from "./jobBook.js";
import type { JobRunner, JobStatus, LocalJobRecord, RunnerOptions } from "./types.js";

export const DEFAULT_TERMINATION_GRACE_MS = 2000;

export interface LocalProcessRunnerOptions extends RunnerOptions {
  /** How long to wait after SIGTERM (and again after SIGKILL) before giving up. */
  terminationGraceMs?: number;
  env?: Record<string, string>;
}

function hasExited(child: ChildProcess): boolean {
  return child.exitCode !== null || child.signalCode !== null;
}

function removeQuietly(filePath: string | null): void {
  if (filePath) rmSync(filePath, { force: true });
}

function assertWorkingDir(command: string, cwd: string): void {
  let stats: Stats;
  try {
    stats = statSync(cwd);
  } catch (e) {
    throw new ExecutionUnavailableError(command, e);
  }
  if (!stats.isDirectory()) {
    throw new ExecutionUnavailableError(command, new Error(`working directory is not a directory: ${cwd}`));
  }
}

export class LocalProcessRunner implements JobRunner<"local_process"> {
  readonly kind = "local_process" as const;
  readonly joinLogs: boolean;
  readonly terminationGraceMs: number;

  private readonly book: JobBook<LocalJobRecord>;
  private readonly events: EventLog;
  private readonly env: Record<string, string>;

  constructor(options: LocalProcessRunnerOptions = {}) {
    this.joinLogs = options.joinLogs ?? false;
    this.terminationGraceMs = Math.max(0, options.terminationGraceMs ?? DEFAULT_TERMINATION_GRACE_MS);
    this.book = new JobBook(options.logDir ?? null);
    this.events = options.events ?? defaultEventLog();
    this.env = options.env ?? {};
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
    assertWorkingDir(command, cwd);
    const logDir = this.book.resolveLogDir(cwd);

    // pid is unknown until spawn, so logs are opened under a unique name and renamed afterwards
    const stem = path.join(logDir, pendingLogStem(name));
    const pendingLog = `${stem}.o`;
    const pendingErr = this.joinLogs ? null : `${stem}.e`;

    const child = this.spawnWithLogs(command, args, cwd, pendingLog, pendingErr);

    if (child.pid === undefined) {
      const failure: unknown[] = await once(child, "error");
      removeQuietly(pendingLog);
      removeQuietly(pendingErr);
      throw new ExecutionUnavailableError(command, failure[0]);
    }

    const pid = child.pid;
    const id = this.book.freshId(localJobId(pid), (generation) => localJobId(pid, generation));
    const { logFile, errFile } = JobBook.logPaths(logDir, name, String(pid), this.joinLogs);
    try {
      renameSync(pendingLog, logFile);
      if (pendingErr && errFile) renameSync(pendingErr, errFile);
    } catch (e) {
      // no record will exist for this child, so it must not outlive submit
      child.kill("SIGKILL");
      for (const filePath of [pendingLog, pendingErr, logFile, errFile]) removeQuietly(filePath);
      this.events.event("job.abandoned", `${name} (pid ${pid}): ${errorMessage(e)}`, { pid });
      throw e;
    }

    const record: LocalJobRecord = {
      kind: "local_process",
      id,
      pid,
      child,
      name,
      workingDir: cwd,
      logDir,
      logFile,
      errFile,
      submittedAt: new Date().toISOString(),
      finished: false
    };

    child.on("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      if (this.book.markFinished(record)) {
        this.events.event("job.finished", `${name} (${id})`, { job_id: id, exit_code: code, signal });
      }
    });
    child.on("error", (err: Error) => {
      this.events.event("job.error", `${name} (${id}): ${err.message}`, { job_id: id });
    });

    this.book.add(record);
    this.events.event("job.submit", `${name} (${id}): ${command}`, {
      job_id: id,
      working_dir: cwd,
      log_file: logFile,
      err_file: errFile
    });
    return id;
  }

  private spawnWithLogs(
    command: string,
    args: readonly string[],
    cwd: string,
    logPath: string,
    errPath: string | null
  ): ChildProcess {
    const fds: number[] = [];
    try {
      const outFd = openSync(logPath, "w");
      fds.push(outFd);
      let errFd = outFd;
      if (errPath) {
        errFd = openSync(errPath, "w");
        fds.push(errFd);
      }
      return spawn(command, [...args], {
        cwd,
        env: { ...process.env, ...this.env },
        stdio: ["ignore", outFd, errFd]
      });
    } catch (e) {
      removeQuietly(logPath);
      removeQuietly(errPath);
      throw e;
    } finally {
      // the child holds its own copies of the descriptors
      for (const fd of fds) closeSync(fd);
    }
  }

  async isRunning(jobId: JobId): Promise<boolean> {
    const record = this.book.get(jobId);
    if (record.finished) return false;
    if (hasExited(record.child)) {
      this.book.markFinished(record);
      return false;
    }
    return true;
  }

  async terminate(jobId: JobId): Promise<boolean> {
    const record = this.book.get(jobId);
    if (!(await this.isRunning(jobId))) return true;

    this.events.event("job.terminate", `${record.name} (${jobId})`, { job_id: jobId });
    record.child.kill("SIGTERM");
    if (await this.waitForExit(record)) return true;

    this.events.event("job.kill", `${record.name} (${jobId}) still alive after ${this.terminationGraceMs}ms`, {
      job_id: jobId
    });
    record.child.kill("SIGKILL");
    return this.waitForExit(record);
  }

  private async waitForExit(record: LocalJobRecord): Promise<boolean> {
    const child = record.child;
    const exited =
      hasExited(child) ||
      (await new Promise<boolean>((resolve) => {
        let timer: NodeJS.Timeout | undefined;
        const onExit = (): void => {
          if (timer) clearTimeout(timer);
          resolve(true);
        };
        timer = setTimeout(() => {
          child.off("exit", onExit);
          resolve(false);
        }, this.terminationGraceMs);
        child.once("exit", onExit);
      }));
    if (exited) this.book.markFinished(record);
    return exited;
  }

  async errorState(jobId: JobId): Promise<boolean> {
    this.book.get(jobId);
    return false;
  }

  async status(jobId: JobId): Promise<JobStatus> {
    const running = await this.isRunning(jobId);
    return { running, errorState: false, submittedAt: this.book.get(jobId).submittedAt };
  }

  async list(): Promise<JobId[]> {
    const running: JobId[] = [];
    for (const record of this.book.all()) {
      if (await this.isRunning(record.id)) running.push(record.id);
    }
    return running;
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
