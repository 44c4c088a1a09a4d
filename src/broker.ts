import type http from "node:http";
import type { Logger } from "./config/logger";
import { startHttpServer } from "./http/server";
import { IdleWatchdog } from "./jobs/idleWatchdog";
import type { Notifier } from "./notifications/notifier";
import type { RequestStore } from "./stores/interfaces";
import { MemoryRequestStore } from "./stores/memoryRequestStore";

export type BrokerCloseReason = "shutdown_route" | "idle_timeout" | "SIGINT" | "SIGTERM" | "fatal" | "test";

export type BrokerOptions = {
  host: string;
  port: number;
  logger: Logger;
  idleTimeoutMs: number;
  idleCheckIntervalMs: number;
  store?: RequestStore;
  notifier?: Notifier | null;
};

export type Broker = {
  server: http.Server;
  store: RequestStore;
  watchdog: IdleWatchdog;
  /** Resolves with the bound port once the socket is listening. */
  ready: Promise<number>;
  /** Resolves once the broker has fully stopped, whatever stopped it. */
  closed: Promise<BrokerCloseReason>;
  close: (reason: BrokerCloseReason) => Promise<void>;
};

export function startBroker(options: BrokerOptions): Broker {
  const { logger } = options;
  const store = options.store ?? new MemoryRequestStore();
  let closing: Promise<void> | null = null;
  let resolveClosed: (reason: BrokerCloseReason) => void = () => {};
  const closed = new Promise<BrokerCloseReason>((resolve) => {
    resolveClosed = resolve;
  });

  const close = (reason: BrokerCloseReason): Promise<void> => {
    if (closing) return closing;
    logger.info("nudge_broker_shutdown_start", { reason, ...store.stats() });
    watchdog.stop();
    closing = new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) reject(error);
        else resolve();
      });
    }).then(() => {
      logger.info("nudge_broker_shutdown_complete", { reason });
      resolveClosed(reason);
    });
    return closing;
  };

  // Route and watchdog shutdowns are fire-and-forget; failures end up in the log.
  const requestClose = (reason: BrokerCloseReason): void => {
    void close(reason).catch((error: unknown) => {
      logger.error("nudge_broker_shutdown_failed", {
        reason,
        message: error instanceof Error ? error.message : String(error),
      });
    });
  };

  const server = startHttpServer({
    host: options.host,
    port: options.port,
    logger,
    store,
    notifier: options.notifier,
    onShutdownRequested: () => requestClose("shutdown_route"),
  });

  const watchdog = new IdleWatchdog({
    store,
    logger,
    idleTimeoutMs: options.idleTimeoutMs,
    intervalMs: options.idleCheckIntervalMs,
    onIdle: () => requestClose("idle_timeout"),
  });

  const ready = new Promise<number>((resolve, reject) => {
    server.once("error", reject);
    server.once("listening", () => {
      server.off("error", reject);
      watchdog.start();
      const address = server.address();
      resolve(typeof address === "object" && address !== null ? address.port : options.port);
    });
  });

  return { server, store, watchdog, ready, closed, close };
}
