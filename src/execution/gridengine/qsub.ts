export interface QsubInput {
  schedulerName: string;
  workingDir: string;
  logDir: string;
  joinLogs: boolean;
  extraArgs: readonly string[];
  command: string;
  args: readonly string[];
}

/** True when the extra arguments already ask qsub to join stdout and stderr. */
export function extraArgsJoinLogs(extraArgs: readonly string[]): boolean {
  for (let i = 0; i < extraArgs.length - 1; i++) {
    if (extraArgs[i] === "-j" && /^(y|yes)$/i.test(extraArgs[i + 1] ?? "")) return true;
  }
  return false;
}

/**
 * Grid Engine rejects job names starting with a digit or containing characters
 * such as '/', ':' or whitespace.
 */
export function gridEngineJobName(name: string): string {
  const cleaned = name.replace(/[^A-Za-z0-9_.-]/g, "_");
  return /^[0-9]/.test(cleaned) ? `j${cleaned}` : cleaned;
}

export function buildQsubArgs(input: QsubInput): string[] {
  const args: string[] = ["-b", "y", "-V", "-N", input.schedulerName, "-wd", input.workingDir, "-o", input.logDir];

  if (input.joinLogs) {
    if (!extraArgsJoinLogs(input.extraArgs)) args.push("-j", "y");
  } else {
    args.push("-e", input.logDir);
  }

  args.push(...input.extraArgs, input.command, ...input.args);
  return args;
}

export function parseQsubJobId(output: string): string | null {
  const trimmed = output.trim();
  if (!trimmed) return null;

  const m = /Your job(?:-array)?\s+(\d+)/.exec(trimmed);
  if (m && m[1]) return m[1];

  // -terse prints just the id ("123" or "123.1-10:1" for arrays)
  const terse = /^(\d+)(?:\.\S*)?$/.exec(trimmed.split(/\s+/)[0] ?? "");
  return terse && terse[1] ? terse[1] : null;
}
