import { RunnerSpecError, UnknownRunnerError } from "../core/errors.js";
import type { EventLog } from "../core/eventLog.js";
import { GridEngineRunner, type GridEnginePrograms } from "./backends/gridEngine.js";
import { LocalProcessRunner } from "./backends/localProcess.js";
import type { JobRunner } from "./backends/types.js";
import type { CommandRunner } from "./gridengine/commandRunner.js";

export type RunnerName = "SimpleJobRunner" | "GEJobRunner";

export const RUNNER_NAMES: readonly RunnerName[] = ["SimpleJobRunner", "GEJobRunner"];

export interface RunnerSpec {
  name: string;
  args: string[];
}

export interface RunnerDefaults {
  logDir?: string | null;
  events?: EventLog;
  terminationGraceMs?: number;
  gridEngine?: {
    programs?: Partial<GridEnginePrograms>;
    commandTimeoutMs?: number;
    commands?: CommandRunner;
  };
}

function isRunnerName(value: string): value is RunnerName {
  return RUNNER_NAMES.some((n) => n === value);
}

/** `Name` or `Name(token token ...)`; tokens are whitespace-separated, no quoting. */
export function parseRunnerSpec(spec: string): RunnerSpec {
  const m = /^\s*([A-Za-z_][A-Za-z0-9_]*)\s*(?:\(([^()]*)\))?\s*$/.exec(spec);
  if (!m || !m[1]) {
    throw new RunnerSpecError(`invalid runner spec: ${JSON.stringify(spec)}`);
  }
  const args = (m[2] ?? "")
    .trim()
    .split(/\s+/)
    .filter((t) => t.length > 0);
  return { name: m[1], args };
}

function parseLocalArgs(args: readonly string[]): { joinLogs: boolean } {
  let joinLogs = false;
  for (const token of args) {
    const m = /^join_logs(?:=(true|false|yes|no))?$/i.exec(token);
    if (!m) {
      throw new RunnerSpecError(`unsupported SimpleJobRunner argument: ${token}`);
    }
    const value = (m[1] ?? "true").toLowerCase();
    joinLogs = value === "true" || value === "yes";
  }
  return { joinLogs };
}

export function fetchRunner(spec: string, defaults: RunnerDefaults = {}): JobRunner {
  const { name, args } = parseRunnerSpec(spec);
  if (!isRunnerName(name)) throw new UnknownRunnerError(name);

  switch (name) {
    case "SimpleJobRunner":
      return new LocalProcessRunner({
        ...parseLocalArgs(args),
        logDir: defaults.logDir ?? null,
        events: defaults.events,
        terminationGraceMs: defaults.terminationGraceMs
      });
    case "GEJobRunner":
      return new GridEngineRunner({
        extraArgs: args,
        logDir: defaults.logDir ?? null,
        events: defaults.events,
        programs: defaults.gridEngine?.programs,
        commandTimeoutMs: defaults.gridEngine?.commandTimeoutMs,
        commands: defaults.gridEngine?.commands
      });
  }
}
