import path from "path";
import { UnknownJobError } from "../../core/errors.js";
import type { JobId } from "../../core/ids.js";
import type { JobRecord } from "./types.js";

export interface LogPaths {
  logFile: string;
  errFile: string | null;
}

/**
 * Per-runner job bookkeeping shared by the backends: the current log directory
 * and the Job Records issued so far. Records capture the log directory at
 * submission time and are never rewritten by later setLogDir calls.
 */
export class JobBook<R extends JobRecord> {
  private readonly records = new Map<JobId, R>();
  private currentLogDir: string | null;

  constructor(logDir: string | null = null) {
    this.currentLogDir = logDir ? path.resolve(logDir) : null;
  }

  get logDir(): string | null {
    return this.currentLogDir;
  }

  setLogDir(dir: string | null): void {
    this.currentLogDir = dir ? path.resolve(dir) : null;
  }

  resolveLogDir(workingDir: string): string {
    return this.currentLogDir ?? path.resolve(workingDir);
  }

  static logPaths(logDir: string, name: string, id: string, joinLogs: boolean): LogPaths {
    return {
      logFile: path.join(logDir, `${name}.o${id}`),
      errFile: joinLogs ? null : path.join(logDir, `${name}.e${id}`)
    };
  }

  /** First of `base`, `variant(2)`, `variant(3)`, ... not issued by this book yet. */
  freshId<I extends JobId>(base: I, variant: (generation: number) => I): I {
    let id = base;
    for (let generation = 2; this.records.has(id); generation++) id = variant(generation);
    return id;
  }

  add(record: R): void {
    if (this.records.has(record.id)) throw new Error(`duplicate job_id: ${record.id}`);
    this.records.set(record.id, record);
  }

  get(jobId: JobId): R {
    const record = this.records.get(jobId);
    if (!record) throw new UnknownJobError(jobId);
    return record;
  }

  /** Returns true only on the running -> finished transition. */
  markFinished(record: R): boolean {
    if (record.finished) return false;
    record.finished = true;
    return true;
  }

  all(): R[] {
    return [...this.records.values()];
  }
}

export function assertJobName(name: string): void {
  if (!name.trim()) throw new Error("job name must be non-empty");
  if (name.includes("/") || name.includes("\\") || name.includes("\0")) {
    throw new Error(`unsafe job name: ${name}`);
  }
}
