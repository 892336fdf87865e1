import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { RunnerSettings } from "./config/runnerConfig.js";
import { defaultEventLog } from "./core/eventLog.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { fetchRunner } from "./execution/runnerFactory.js";

async function main(): Promise<void> {
  const configPath = process.env.RUNNER_CONFIG_PATH ?? "config/default.runner.yaml";

  const settings = await RunnerSettings.loadFromFile(configPath);
  const spec = process.env.RUNNER_SPEC?.trim() || settings.runnerSpec();
  const runner = fetchRunner(spec, settings.runnerDefaults(defaultEventLog()));

  const server = createGatewayServer({ settings, runner });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`job runner gateway ready (${spec})`);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
