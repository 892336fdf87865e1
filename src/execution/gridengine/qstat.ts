export interface QstatEntry {
  schedulerId: string;
  state: string;
}

/**
 * Parse default `qstat` output. Header and separator lines are skipped; array
 * tasks repeat the same id and collapse into one entry.
 */
export function parseQstatJobs(stdout: string): Map<string, QstatEntry> {
  const jobs = new Map<string, QstatEntry>();

  const lines = stdout
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0);

  for (const line of lines) {
    const fields = line.split(/\s+/);
    const id = fields[0] ?? "";
    if (!/^\d+$/.test(id)) continue;
    if (!jobs.has(id)) {
      jobs.set(id, { schedulerId: id, state: fields[4] ?? "" });
    }
  }

  return jobs;
}

export function isErrorState(state: string): boolean {
  return state.includes("E");
}
