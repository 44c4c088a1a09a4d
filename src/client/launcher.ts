import { spawn } from "node:child_process";
import net from "node:net";
import path from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import type { Logger } from "../config/logger";

export type LaunchOptions = {
  host?: string;
  attempts?: number;
  attemptDelayMs?: number;
  spawnBroker?: (port: number) => void;
};

export function isBrokerRunning(port: number, host = "127.0.0.1", timeoutMs = 1_000): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = net.createConnection({ port, host });
    const finish = (running: boolean) => {
      socket.destroy();
      resolve(running);
    };
    socket.setTimeout(timeoutMs, () => finish(false));
    socket.once("connect", () => finish(true));
    socket.once("error", () => finish(false));
  });
}

// Works from the compiled tree and from sources run through a loader such as tsx.
export function brokerEntryPath(): string {
  return path.join(__dirname, "..", `index${path.extname(__filename)}`);
}

export function spawnBroker(port: number): void {
  const child = spawn(process.execPath, [...process.execArgv, brokerEntryPath(), `--port=${port}`], {
    detached: true,
    stdio: "ignore",
    windowsHide: true,
  });
  child.unref();
}

/**
 * Starts a broker on `port` unless one is already listening, then waits for
 * it to accept connections. Returns false when it never came up.
 */
export async function ensureBroker(port: number, logger: Logger, options: LaunchOptions = {}): Promise<boolean> {
  const host = options.host ?? "127.0.0.1";
  if (await isBrokerRunning(port, host)) return true;

  const launch = options.spawnBroker ?? spawnBroker;
  logger.info("nudge_cli_broker_spawn", { port });
  launch(port);

  const attempts = options.attempts ?? 50;
  const attemptDelayMs = options.attemptDelayMs ?? 100;
  for (let attempt = 0; attempt < attempts; attempt += 1) {
    if (await isBrokerRunning(port, host)) return true;
    await delay(attemptDelayMs);
  }
  logger.warn("nudge_cli_broker_not_ready", { port, attempts });
  return false;
}
