import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { McpError, ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { ConfigError, errorMessage } from "../core/errors.js";
import type { EventLog } from "../core/eventLog.js";
import type { RunnerDefaults } from "../execution/runnerFactory.js";

export const zRunnerConfig = z.object({
  version: z.literal(1),
  runner: z.string().min(1),
  log_dir: z.string().min(1).nullable().optional(),
  local: z
    .object({
      termination_grace_ms: z.number().int().nonnegative().optional()
    })
    .optional(),
  grid_engine: z
    .object({
      qsub: z.string().min(1).optional(),
      qstat: z.string().min(1).optional(),
      qdel: z.string().min(1).optional(),
      command_timeout_ms: z.number().int().nonnegative().optional()
    })
    .optional(),
  gateway: z
    .object({
      command_allowlist: z.array(z.string().min(1)),
      max_preview_bytes: z.number().int().positive().optional(),
      max_preview_lines: z.number().int().positive().optional()
    })
    .optional()
});

export type RunnerConfig = z.infer<typeof zRunnerConfig>;

function expandEnvToken(value: string): string | null {
  const trimmed = value.trim();
  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (!m) return value;
  const varName = m[1];
  if (!varName) return null;
  const v = process.env[varName]?.trim();
  return v ? v : null;
}

export class RunnerSettings {
  constructor(private readonly config: RunnerConfig) {}

  static parse(value: unknown, source = "<inline>"): RunnerSettings {
    const res = zRunnerConfig.safeParse(value);
    if (!res.success) {
      const issue = res.error.issues[0];
      const where = issue && issue.path.length ? `${issue.path.join(".")}: ` : "";
      throw new ConfigError(`invalid runner config at ${source}: ${where}${issue?.message ?? "unknown issue"}`);
    }
    const logDir = res.data.log_dir ? expandEnvToken(res.data.log_dir) : null;
    return new RunnerSettings({ ...res.data, log_dir: logDir });
  }

  static async loadFromFile(filePath: string): Promise<RunnerSettings> {
    const raw = await fs.readFile(filePath, "utf8");
    let parsed: unknown;
    try {
      parsed = YAML.parse(raw);
    } catch (e) {
      throw new ConfigError(`invalid YAML in ${filePath}: ${errorMessage(e)}`);
    }
    return RunnerSettings.parse(parsed, filePath);
  }

  runnerSpec(): string {
    return this.config.runner;
  }

  logDir(): string | null {
    return this.config.log_dir ? path.resolve(this.config.log_dir) : null;
  }

  runnerDefaults(events?: EventLog): RunnerDefaults {
    const ge = this.config.grid_engine ?? {};
    return {
      logDir: this.logDir(),
      events,
      terminationGraceMs: this.config.local?.termination_grace_ms,
      gridEngine: {
        programs: { qsub: ge.qsub, qstat: ge.qstat, qdel: ge.qdel },
        commandTimeoutMs: ge.command_timeout_ms
      }
    };
  }

  previewCaps(): { maxBytes: number; maxLines: number } {
    return {
      maxBytes: this.config.gateway?.max_preview_bytes ?? 8192,
      maxLines: this.config.gateway?.max_preview_lines ?? 200
    };
  }

  assertCommandAllowed(command: string): void {
    const allowlist = this.config.gateway?.command_allowlist ?? [];
    if (!allowlist.length) {
      throw new McpError(ErrorCode.InvalidRequest, `policy denied command (no allowlist configured): ${command}`);
    }
    // no basename matching: a path is allowed only when listed as written
    if (!allowlist.includes(command)) {
      throw new McpError(ErrorCode.InvalidRequest, `policy denied command: ${command}`);
    }
  }
}
