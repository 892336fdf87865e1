import { ulid } from "ulid";

export type LocalJobId = `local_${string}`;
export type GridEngineJobId = `ge_${string}`;
export type JobId = LocalJobId | GridEngineJobId;

const JOB_ID_PATTERN = /^(local|ge)_[0-9A-Za-z.]+$/;

export function isJobId(value: string): value is JobId {
  return JOB_ID_PATTERN.test(value);
}

/** Generations above 1 distinguish a reused pid from the job that held it earlier. */
export function localJobId(pid: number, generation = 1): LocalJobId {
  return generation > 1 ? `local_${pid}.${generation}` : `local_${pid}`;
}

export function gridEngineJobId(schedulerId: string): GridEngineJobId {
  return `ge_${schedulerId}` as const;
}

export function pendingLogStem(name: string): string {
  return `.${name}.${ulid()}.pending`;
}
