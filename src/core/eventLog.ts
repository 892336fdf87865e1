import type { JsonObject } from "./json.js";

export interface EventLog {
  event(kind: string, message: string, data?: JsonObject): void;
}

export class StderrEventLog implements EventLog {
  event(kind: string, message: string, data?: JsonObject): void {
    const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : "";
    console.error(`[${new Date().toISOString()}] ${kind}: ${message}${suffix}`);
  }
}

export class SilentEventLog implements EventLog {
  event(_kind: string, _message: string, _data?: JsonObject): void {}
}

export function defaultEventLog(): EventLog {
  return (process.env.RUNNER_LOG ?? "").toLowerCase() === "quiet" ? new SilentEventLog() : new StderrEventLog();
}
