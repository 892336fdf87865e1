import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { promises as fs } from "fs";
import type { FileHandle } from "fs/promises";
import type { RunnerSettings } from "../config/runnerConfig.js";
import {
  ExecutionUnavailableError,
  RunnerSpecError,
  SchedulerCommandError,
  UnknownJobError,
  errorMessage
} from "../core/errors.js";
import { isJobId, type JobId } from "../core/ids.js";
import type { JobRunner } from "../execution/backends/types.js";
import {
  zJobListInput,
  zJobListOutput,
  zJobLogPreviewInput,
  zJobLogPreviewOutput,
  zJobStatusInput,
  zJobStatusOutput,
  zJobSubmitInput,
  zJobSubmitOutput,
  zJobTerminateInput,
  zJobTerminateOutput,
  zRunnerSetLogDirInput,
  zRunnerSetLogDirOutput
} from "./toolSchemas.js";

export interface GatewayDeps {
  settings: RunnerSettings;
  runner: JobRunner;
}

function toMcpError(e: unknown): McpError {
  if (e instanceof McpError) return e;
  if (e instanceof UnknownJobError || e instanceof RunnerSpecError) {
    return new McpError(ErrorCode.InvalidParams, e.message);
  }
  if (e instanceof ExecutionUnavailableError || e instanceof SchedulerCommandError) {
    return new McpError(ErrorCode.InternalError, e.message);
  }
  return new McpError(ErrorCode.InternalError, errorMessage(e));
}

function requireJobId(value: string): JobId {
  if (!isJobId(value)) throw new McpError(ErrorCode.InvalidParams, `invalid job_id: ${value}`);
  return value;
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

async function tailText(
  filePath: string,
  maxBytes: number,
  maxLines: number
): Promise<{ text: string; truncated: boolean } | null> {
  let handle: FileHandle;
  try {
    handle = await fs.open(filePath, "r");
  } catch (e) {
    if (isNotFound(e)) return null;
    throw e;
  }

  try {
    const { size } = await handle.stat();
    const length = Math.min(size, maxBytes);
    const buf = Buffer.alloc(length);
    if (length > 0) await handle.read(buf, 0, length, size - length);

    let text = buf.toString("utf8");
    let truncated = size > length;

    const trailingNewline = text.endsWith("\n");
    const lines = (trailingNewline ? text.slice(0, -1) : text).split("\n");
    if (text.length > 0 && lines.length > maxLines) {
      truncated = true;
      text = lines.slice(-maxLines).join("\n") + (trailingNewline ? "\n" : "");
    }
    return { text, truncated };
  } finally {
    await handle.close();
  }
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: "job-runner-gateway",
    version: "0.1.0"
  });
  const { settings, runner } = deps;

  mcp.registerTool(
    "job_submit",
    {
      description: `Submit a command as an asynchronous job on the ${runner.kind} runner (command allowlist enforced).`,
      inputSchema: zJobSubmitInput,
      outputSchema: zJobSubmitOutput
    },
    async (args) => {
      try {
        settings.assertCommandAllowed(args.command);
        const jobId = await runner.submit(args.name, args.working_dir, args.command, args.args ?? []);
        const structured = {
          job_id: jobId,
          name: runner.jobName(jobId),
          log_file: runner.logFile(jobId),
          err_file: runner.errFile(jobId)
        };
        return {
          content: [{ type: "text", text: `Submitted ${args.name} (${jobId})` }],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "job_status",
    {
      description: "Poll a submitted job: liveness, scheduler error state and log locations.",
      inputSchema: zJobStatusInput,
      outputSchema: zJobStatusOutput
    },
    async (args) => {
      try {
        const jobId = requireJobId(args.job_id);
        const { running, errorState, submittedAt } = await runner.status(jobId);
        const structured = {
          job_id: jobId,
          name: runner.jobName(jobId),
          running,
          error_state: errorState,
          submitted_at: submittedAt,
          log_file: runner.logFile(jobId),
          err_file: runner.errFile(jobId)
        };
        return {
          content: [{ type: "text", text: `${structured.name} (${jobId}) ${running ? "running" : "finished"}` }],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "job_terminate",
    {
      description: "Request a job be stopped. Finished jobs are a successful no-op; re-poll job_status to confirm.",
      inputSchema: zJobTerminateInput,
      outputSchema: zJobTerminateOutput
    },
    async (args) => {
      try {
        const jobId = requireJobId(args.job_id);
        const accepted = await runner.terminate(jobId);
        return {
          content: [{ type: "text", text: `terminate ${jobId}: ${accepted ? "accepted" : "not accepted"}` }],
          structuredContent: { job_id: jobId, accepted }
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "job_list",
    {
      description: "List jobs submitted through this gateway that are still running.",
      inputSchema: zJobListInput,
      outputSchema: zJobListOutput
    },
    async () => {
      try {
        const jobIds = await runner.list();
        return {
          content: [{ type: "text", text: `${jobIds.length} running job(s)` }],
          structuredContent: { job_ids: jobIds }
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "job_log_preview",
    {
      description: "Preview the tail of a job's stdout or stderr log (size capped by config).",
      inputSchema: zJobLogPreviewInput,
      outputSchema: zJobLogPreviewOutput
    },
    async (args) => {
      try {
        const jobId = requireJobId(args.job_id);
        const filePath = args.stream === "stdout" ? runner.logFile(jobId) : runner.errFile(jobId);
        const caps = settings.previewCaps();
        const maxLines = Math.min(args.max_lines ?? caps.maxLines, caps.maxLines);

        const tail = filePath ? await tailText(filePath, caps.maxBytes, maxLines) : null;
        const structured = {
          job_id: jobId,
          stream: args.stream,
          path: filePath,
          exists: tail !== null,
          text: tail?.text ?? "",
          truncated: tail?.truncated ?? false
        };
        return {
          content: [{ type: "text", text: structured.text }],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "runner_set_log_dir",
    {
      description: "Set the log directory for jobs submitted from now on (null: each job's working directory).",
      inputSchema: zRunnerSetLogDirInput,
      outputSchema: zRunnerSetLogDirOutput
    },
    async (args) => {
      try {
        runner.setLogDir(args.log_dir);
        return {
          content: [{ type: "text", text: `log_dir=${runner.logDir ?? "<working_dir>"}` }],
          structuredContent: { log_dir: runner.logDir }
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  return mcp;
}
