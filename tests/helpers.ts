import path from "path";
import { ExecutionUnavailableError } from "../src/core/errors.js";
import type { EventLog } from "../src/core/eventLog.js";
import type { JsonObject } from "../src/core/json.js";
import type { CommandResult, CommandRunner } from "../src/execution/gridengine/commandRunner.js";

export interface RecordedEvent {
  kind: string;
  message: string;
  data: JsonObject | undefined;
}

export class MemoryEventLog implements EventLog {
  readonly events: RecordedEvent[] = [];

  event(kind: string, message: string, data?: JsonObject): void {
    this.events.push({ kind, message, data });
  }

  kinds(): string[] {
    return this.events.map((e) => e.kind);
  }
}

/** Node one-liner run through the current interpreter, so tests need no system binaries. */
export function nodeScript(source: string): { command: string; args: string[] } {
  return { command: process.execPath, args: ["-e", source] };
}

export interface RecordedCommand {
  program: string;
  args: string[];
}

/**
 * In-process stand-in for qsub/qstat/qdel. Jobs stay listed until finish() or
 * a successful qdel removes them.
 */
export class FakeGridEngine implements CommandRunner {
  readonly calls: RecordedCommand[] = [];
  readonly active = new Map<string, { name: string; state: string }>();
  nextId = 100;
  qsubOverride: CommandResult | null = null;
  unavailable = new Set<string>();

  async run(program: string, args: readonly string[]): Promise<CommandResult> {
    const tool = path.basename(program);
    this.calls.push({ program, args: [...args] });
    if (this.unavailable.has(tool)) {
      throw new ExecutionUnavailableError(program, new Error("spawnSync " + program + " ENOENT"));
    }

    if (tool === "qsub") {
      if (this.qsubOverride) return this.qsubOverride;
      const id = String(this.nextId++);
      const name = args[args.indexOf("-N") + 1] ?? "job";
      this.active.set(id, { name, state: "qw" });
      return { status: 0, stdout: `Your job ${id} ("${name}") has been submitted\n`, stderr: "" };
    }

    if (tool === "qstat") {
      if (!this.active.size) return { status: 0, stdout: "", stderr: "" };
      const rows = [...this.active.entries()].map(
        ([id, job]) => `${id.padStart(7)} 0.55500 ${job.name.padEnd(10)} tester       ${job.state.padEnd(5)} 10/19/2026 09:30:00 all.q@node01                       1`
      );
      const header =
        "job-ID  prior   name       user         state submit/start at     queue                          slots ja-task-ID\n" +
        "-----------------------------------------------------------------------------------------------------------------\n";
      return { status: 0, stdout: header + rows.join("\n") + "\n", stderr: "" };
    }

    if (tool === "qdel") {
      const id = args[0] ?? "";
      if (this.active.delete(id)) {
        return { status: 0, stdout: `tester has registered the job ${id} for deletion\n`, stderr: "" };
      }
      return { status: 1, stdout: "", stderr: `denied: job "${id}" does not exist\n` };
    }

    throw new ExecutionUnavailableError(program, new Error("unknown program"));
  }

  setState(id: string, state: string): void {
    const job = this.active.get(id);
    if (job) job.state = state;
  }

  finish(id: string): void {
    this.active.delete(id);
  }

  callsTo(tool: string): RecordedCommand[] {
    return this.calls.filter((c) => path.basename(c.program) === tool);
  }
}
