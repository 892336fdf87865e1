import { existsSync } from "fs";
import { setTimeout as sleep } from "timers/promises";
import type { JobId } from "../core/ids.js";
import type { JobRunner } from "./backends/types.js";

export interface WaitOptions {
  attempts?: number;
  intervalMs?: number;
  /** Also wait for the stdout log to exist; scheduler-created files can appear after the job leaves the queue. */
  requireLogFiles?: boolean;
}

/**
 * Poll until none of the jobs is running. Resolves false once the retry budget
 * is spent; jobs are left as they are.
 */
export async function waitForJobs(runner: JobRunner, jobIds: readonly JobId[], options: WaitOptions = {}): Promise<boolean> {
  const attempts = options.attempts ?? 100;
  const intervalMs = options.intervalMs ?? 100;

  for (let attempt = 0; attempt < attempts; attempt++) {
    let done = true;
    for (const jobId of jobIds) {
      if ((await runner.isRunning(jobId)) || (options.requireLogFiles && !existsSync(runner.logFile(jobId)))) {
        done = false;
        break;
      }
    }
    if (done) return true;
    await sleep(intervalMs);
  }
  return false;
}
