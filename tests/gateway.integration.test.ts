import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { setTimeout as sleep } from "timers/promises";

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";

import { RunnerSettings } from "../src/config/runnerConfig.js";
import { SilentEventLog } from "../src/core/eventLog.js";
import { errorMessage } from "../src/core/errors.js";
import { GridEngineRunner } from "../src/execution/backends/gridEngine.js";
import { LocalProcessRunner } from "../src/execution/backends/localProcess.js";
import type { JobRunner } from "../src/execution/backends/types.js";
import { createGatewayServer } from "../src/mcp/gatewayServer.js";
import {
  zJobListOutput,
  zJobLogPreviewOutput,
  zJobStatusOutput,
  zJobSubmitOutput,
  zJobTerminateOutput,
  zRunnerSetLogDirOutput
} from "../src/mcp/toolSchemas.js";
import { FakeGridEngine } from "./helpers.js";

async function connectClient(runner: JobRunner, allowlist: string[]) {
  const settings = RunnerSettings.parse({
    version: 1,
    runner: runner.kind === "grid_engine" ? "GEJobRunner" : "SimpleJobRunner",
    gateway: {
      command_allowlist: allowlist,
      max_preview_bytes: 4096,
      max_preview_lines: 3
    }
  });
  const server = createGatewayServer({ settings, runner });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  const client = new Client({ name: "jobrunner-test-client", version: "0.0.0" });
  await client.connect(clientTransport);
  return { client, clientTransport, serverTransport };
}

async function callTool(client: Client, name: string, args: Record<string, unknown>): Promise<unknown> {
  const res = await client.request({ method: "tools/call", params: { name, arguments: args } }, CallToolResultSchema);
  if (res.isError) throw new Error(`${name} failed`);
  return res.structuredContent;
}

describe.sequential("gateway (local runner)", () => {
  let workingDir: string;
  let logDir: string;
  let runner: LocalProcessRunner;
  let client: Client;
  let serverTransport: InMemoryTransport;
  let clientTransport: InMemoryTransport;

  async function request(name: string, args: Record<string, unknown>) {
    return client.request({ method: "tools/call", params: { name, arguments: args } }, CallToolResultSchema);
  }

  function textOf(res: Awaited<ReturnType<typeof request>>): string {
    return res.content.map((c) => (c.type === "text" ? c.text : c.type)).join("\n");
  }

  async function call(name: string, args: Record<string, unknown>): Promise<unknown> {
    const res = await request(name, args);
    if (res.isError) throw new Error(`${name} failed: ${textOf(res)}`);
    return res.structuredContent;
  }

  async function callError(name: string, args: Record<string, unknown>): Promise<string> {
    try {
      const res = await request(name, args);
      if (res.isError) return textOf(res);
    } catch (e) {
      return errorMessage(e);
    }
    throw new Error(`expected ${name} to fail`);
  }

  async function submit(name: string, source: string) {
    return zJobSubmitOutput.parse(
      await call("job_submit", { name, working_dir: workingDir, command: process.execPath, args: ["-e", source] })
    );
  }

  async function waitUntilFinished(jobId: string): Promise<void> {
    for (let i = 0; i < 100; i++) {
      const status = zJobStatusOutput.parse(await call("job_status", { job_id: jobId }));
      if (!status.running) return;
      await sleep(100);
    }
    throw new Error(`timed out waiting for ${jobId}`);
  }

  beforeAll(async () => {
    workingDir = await mkdtemp(path.join(os.tmpdir(), "jobrunner-gw-work-"));
    logDir = await mkdtemp(path.join(os.tmpdir(), "jobrunner-gw-logs-"));

    runner = new LocalProcessRunner({ events: new SilentEventLog() });
    ({ client, clientTransport, serverTransport } = await connectClient(runner, [process.execPath]));
  });

  afterAll(async () => {
    for (const jobId of await runner.list()) await runner.terminate(jobId);
    await clientTransport.close();
    await serverTransport.close();
    await rm(workingDir, { recursive: true, force: true });
    await rm(logDir, { recursive: true, force: true });
  });

  it("submits a job, polls it to completion and previews its logs", async () => {
    const submitted = await submit("hello", "console.log('hello gateway')");
    expect(submitted.job_id).toMatch(/^local_\d+$/);
    expect(submitted.name).toBe("hello");
    const pid = submitted.job_id.slice("local_".length);
    expect(submitted.log_file).toBe(path.join(workingDir, `hello.o${pid}`));
    expect(submitted.err_file).toBe(path.join(workingDir, `hello.e${pid}`));

    await waitUntilFinished(submitted.job_id);

    const status = zJobStatusOutput.parse(await call("job_status", { job_id: submitted.job_id }));
    expect(status).toEqual({
      job_id: submitted.job_id,
      name: "hello",
      running: false,
      error_state: false,
      submitted_at: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T/),
      log_file: submitted.log_file,
      err_file: submitted.err_file
    });

    const stdout = zJobLogPreviewOutput.parse(
      await call("job_log_preview", { job_id: submitted.job_id, stream: "stdout" })
    );
    expect(stdout).toEqual({
      job_id: submitted.job_id,
      stream: "stdout",
      path: submitted.log_file,
      exists: true,
      text: "hello gateway\n",
      truncated: false
    });

    const stderr = zJobLogPreviewOutput.parse(
      await call("job_log_preview", { job_id: submitted.job_id, stream: "stderr" })
    );
    expect(stderr.text).toBe("");
    expect(stderr.exists).toBe(true);
  });

  it("caps log previews to the configured number of lines", async () => {
    const submitted = await submit("lines", "for (let i = 1; i <= 5; i++) console.log('l' + i)");
    await waitUntilFinished(submitted.job_id);

    const capped = zJobLogPreviewOutput.parse(
      await call("job_log_preview", { job_id: submitted.job_id, stream: "stdout" })
    );
    expect(capped.text).toBe("l3\nl4\nl5\n");
    expect(capped.truncated).toBe(true);

    const narrower = zJobLogPreviewOutput.parse(
      await call("job_log_preview", { job_id: submitted.job_id, stream: "stdout", max_lines: 2 })
    );
    expect(narrower.text).toBe("l4\nl5\n");
  });

  it("lists and terminates a long-running job", async () => {
    const submitted = await submit("long", "setInterval(() => {}, 1000)");

    const listed = zJobListOutput.parse(await call("job_list", {}));
    expect(listed.job_ids).toContain(submitted.job_id);

    const terminated = zJobTerminateOutput.parse(await call("job_terminate", { job_id: submitted.job_id }));
    expect(terminated).toEqual({ job_id: submitted.job_id, accepted: true });

    const status = zJobStatusOutput.parse(await call("job_status", { job_id: submitted.job_id }));
    expect(status.running).toBe(false);

    const after = zJobListOutput.parse(await call("job_list", {}));
    expect(after.job_ids).not.toContain(submitted.job_id);
  });

  it("sets the log directory for later submissions only", async () => {
    const before = await submit("before", "console.log('a')");

    const set = zRunnerSetLogDirOutput.parse(await call("runner_set_log_dir", { log_dir: logDir }));
    expect(set.log_dir).toBe(logDir);
    const after = await submit("after", "console.log('b')");

    expect(path.dirname(before.log_file)).toBe(workingDir);
    expect(path.dirname(after.log_file)).toBe(logDir);
    expect(path.dirname(after.err_file ?? "")).toBe(logDir);

    const cleared = zRunnerSetLogDirOutput.parse(await call("runner_set_log_dir", { log_dir: null }));
    expect(cleared.log_dir).toBeNull();

    await waitUntilFinished(before.job_id);
    await waitUntilFinished(after.job_id);
  });

  it("denies commands outside the allowlist", async () => {
    const message = await callError("job_submit", { name: "nope", working_dir: workingDir, command: "rm", args: ["-rf", "x"] });
    expect(message).toContain("policy denied command: rm");
  });

  it("reports unknown job ids", async () => {
    const message = await callError("job_status", { job_id: "local_999999999" });
    expect(message).toContain("unknown job_id: local_999999999");
  });

  it("rejects malformed job ids", async () => {
    const message = await callError("job_terminate", { job_id: "job-1" });
    expect(message).toContain("job_id");
  });
});

describe.sequential("gateway (grid engine runner)", () => {
  let logDir: string;
  let fake: FakeGridEngine;
  let client: Client;
  let serverTransport: InMemoryTransport;
  let clientTransport: InMemoryTransport;

  beforeAll(async () => {
    logDir = await mkdtemp(path.join(os.tmpdir(), "jobrunner-gw-ge-"));
    fake = new FakeGridEngine();
    const runner = new GridEngineRunner({ commands: fake, logDir, events: new SilentEventLog() });
    ({ client, clientTransport, serverTransport } = await connectClient(runner, ["echo"]));
  });

  afterAll(async () => {
    await clientTransport.close();
    await serverTransport.close();
    await rm(logDir, { recursive: true, force: true });
  });

  it("previews nothing until the scheduler has written the log", async () => {
    const submitted = zJobSubmitOutput.parse(
      await callTool(client, "job_submit", { name: "queued", working_dir: logDir, command: "echo", args: ["hi"] })
    );
    expect(submitted.job_id).toBe("ge_100");
    expect(submitted.log_file).toBe(path.join(logDir, "queued.o100"));

    const pending = zJobLogPreviewOutput.parse(
      await callTool(client, "job_log_preview", { job_id: submitted.job_id, stream: "stdout" })
    );
    expect(pending).toEqual({
      job_id: "ge_100",
      stream: "stdout",
      path: submitted.log_file,
      exists: false,
      text: "",
      truncated: false
    });

    await writeFile(submitted.log_file, "hi\n");
    const written = zJobLogPreviewOutput.parse(
      await callTool(client, "job_log_preview", { job_id: submitted.job_id, stream: "stdout" })
    );
    expect(written.exists).toBe(true);
    expect(written.text).toBe("hi\n");
  });

  it("reports running and error state from one qstat observation", async () => {
    fake.setState("100", "Eqw");
    const qstatBefore = fake.callsTo("qstat").length;

    const stuck = zJobStatusOutput.parse(await callTool(client, "job_status", { job_id: "ge_100" }));
    expect(stuck.running).toBe(true);
    expect(stuck.error_state).toBe(true);
    expect(fake.callsTo("qstat")).toHaveLength(qstatBefore + 1);

    fake.finish("100");
    const done = zJobStatusOutput.parse(await callTool(client, "job_status", { job_id: "ge_100" }));
    expect(done.running).toBe(false);
    expect(done.error_state).toBe(false);
    expect(done.submitted_at).toBe(stuck.submitted_at);
  });
});
