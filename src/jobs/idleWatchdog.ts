import type { Logger } from "../config/logger";
import type { RequestStore } from "../stores/interfaces";

export type IdleWatchdogOptions = {
  store: Pick<RequestStore, "hasPending" | "stats">;
  logger: Logger;
  idleTimeoutMs: number;
  intervalMs: number;
  onIdle: () => void;
  now?: () => number;
};

export type IdleWatchdogStats = {
  running: boolean;
  lastActiveAt: string | null;
  ticks: number;
  firedAt: string | null;
};

/**
 * Stops a broker nobody is using. Each tick refreshes the activity mark while
 * requests are pending; once nothing has been pending for longer than the
 * idle timeout, `onIdle` runs exactly once and the loop ends.
 */
export class IdleWatchdog {
  private timer: NodeJS.Timeout | null = null;
  private lastActiveAtMs: number | null = null;
  private ticks = 0;
  private firedAtMs: number | null = null;
  private readonly now: () => number;

  constructor(private readonly options: IdleWatchdogOptions) {
    this.now = options.now ?? Date.now;
  }

  start(): void {
    if (this.timer || this.firedAtMs !== null) return;
    this.lastActiveAtMs = this.now();
    this.timer = setInterval(() => this.tick(), this.options.intervalMs);
    if (typeof this.timer.unref === "function") {
      this.timer.unref();
    }
    this.options.logger.debug("nudge_broker_watchdog_started", {
      idleTimeoutMs: this.options.idleTimeoutMs,
      intervalMs: this.options.intervalMs,
    });
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /** Returns true when this tick fired `onIdle`. */
  tick(): boolean {
    if (this.firedAtMs !== null) return false;
    const nowMs = this.now();
    this.ticks += 1;
    if (this.lastActiveAtMs === null) this.lastActiveAtMs = nowMs;

    if (this.options.store.hasPending()) {
      this.lastActiveAtMs = nowMs;
      return false;
    }
    const idleForMs = nowMs - this.lastActiveAtMs;
    if (idleForMs <= this.options.idleTimeoutMs) return false;

    this.firedAtMs = nowMs;
    this.stop();
    this.options.logger.info("nudge_broker_idle_timeout", { idleForMs, ...this.options.store.stats() });
    this.options.onIdle();
    return true;
  }

  getStats(): IdleWatchdogStats {
    return {
      running: this.timer !== null,
      lastActiveAt: this.lastActiveAtMs === null ? null : new Date(this.lastActiveAtMs).toISOString(),
      ticks: this.ticks,
      firedAt: this.firedAtMs === null ? null : new Date(this.firedAtMs).toISOString(),
    };
  }
}
