import { describeEnvForLogs, readEnv } from "./config/env";
import { createLogger } from "./config/logger";
import { startBroker, type Broker } from "./broker";
import { createLogNotifier } from "./notifications/notifier";

function arg(name: string, fallback?: string): string | undefined {
  const prefix = `--${name}=`;
  const row = process.argv.find((entry) => entry.startsWith(prefix));
  if (!row) return fallback;
  return row.slice(prefix.length);
}

function resolvePort(defaultPort: number): number {
  const raw = arg("port");
  if (raw === undefined) return defaultPort;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid --port=${raw}. Use an integer between 1 and 65535.`);
  }
  return port;
}

async function main(): Promise<void> {
  const env = readEnv();
  const logger = createLogger(env.NUDGE_LOG_LEVEL);
  const port = resolvePort(env.NUDGE_PORT);

  logger.info("nudge_broker_boot", { pid: process.pid, env: { ...describeEnvForLogs(env), NUDGE_PORT: port } });

  const broker: Broker = startBroker({
    host: env.NUDGE_HOST,
    port,
    logger,
    idleTimeoutMs: env.NUDGE_IDLE_TIMEOUT_MS,
    idleCheckIntervalMs: env.NUDGE_IDLE_CHECK_INTERVAL_MS,
    notifier: createLogNotifier(logger),
  });

  const shutdown = async (reason: "SIGINT" | "SIGTERM" | "fatal", exitCode = 0): Promise<void> => {
    process.exitCode = exitCode;
    try {
      await broker.close(reason);
    } catch (error) {
      logger.error("nudge_broker_shutdown_failed", {
        reason,
        message: error instanceof Error ? error.message : String(error),
      });
      process.exitCode = 1;
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("uncaughtException", (error) => {
    logger.error("nudge_broker_uncaught_exception", {
      message: error.message,
      stack: error.stack ?? null,
    });
    void shutdown("fatal", 1);
  });
  process.on("unhandledRejection", (reason) => {
    logger.error("nudge_broker_unhandled_rejection", {
      message: reason instanceof Error ? reason.message : String(reason),
    });
    void shutdown("fatal", 1);
  });

  await broker.ready;
  const reason = await broker.closed;
  logger.info("nudge_broker_exit", { reason });
}

void main().catch((error) => {
  process.stderr.write(`nudge-broker fatal: ${error instanceof Error ? error.stack : String(error)}\n`);
  process.exit(1);
});
