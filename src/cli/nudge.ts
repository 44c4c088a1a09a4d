#!/usr/bin/env node
import { readEnv } from "../config/env";
import { createLogger, stderrSink } from "../config/logger";
import { BrokerClient, brokerUrl } from "../client/brokerClient";
import { ensureBroker, isBrokerRunning } from "../client/launcher";
import { runCli } from "./commands";

async function main(): Promise<void> {
  const env = readEnv();
  // Agents read the CLI's terminal output; info-level chatter stays out of it by default.
  const logger = createLogger(env.NUDGE_LOG_LEVEL === "info" ? "warn" : env.NUDGE_LOG_LEVEL, stderrSink);

  const outcome = await runCli(process.argv.slice(2), {
    logger,
    defaultPort: env.NUDGE_PORT,
    defaultTimeoutSeconds: env.NUDGE_CLIENT_TIMEOUT_SECONDS,
    pollIntervalMs: env.NUDGE_POLL_INTERVAL_MS,
    createClient: (port) => new BrokerClient({ baseUrl: brokerUrl(port), logger }),
    ensureBroker: (port) => ensureBroker(port, logger),
    isBrokerRunning: (port) => isBrokerRunning(port),
    announce: (line) => process.stderr.write(`${line}\n`),
  });

  if (outcome.stdout !== undefined) process.stdout.write(`${outcome.stdout}\n`);
  if (outcome.stderr !== undefined) process.stderr.write(`${outcome.stderr}\n`);
  process.exitCode = outcome.exitCode;
}

void main().catch((error) => {
  process.stderr.write(`nudge fatal: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
