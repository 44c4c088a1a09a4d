import { setTimeout as delay } from "node:timers/promises";
import { z } from "zod";
import { silentLogger, type Logger } from "../config/logger";
import { AgentRequestRecordSchema, type AgentRequestRecord } from "../http/records";
import type { RequestType } from "../stores/interfaces";
import { BrokerBackpressureError, BrokerHttpError, ClientTimeoutError } from "./errors";

export const DEFAULT_BROKER_PORT = 9131;

const ErrorBodySchema = z.object({ error: z.string() });
const AskResponseSchema = z.object({ id: z.string() });
const HealthResponseSchema = z.object({ status: z.literal("ok") });
const PendingResponseSchema = z.array(AgentRequestRecordSchema);

export type AskPayload = {
  question: string;
  context?: string;
  agent?: string;
  task?: string;
  request_type?: RequestType;
  command?: string;
};

export type WaitOptions = {
  timeoutMs: number;
  pollIntervalMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

export type BrokerClientOptions = {
  baseUrl: string;
  logger?: Logger;
  requestTimeoutMs?: number;
  fetchImpl?: typeof fetch;
};

export function brokerUrl(port: number, host = "127.0.0.1"): string {
  return `http://${host}:${port}`;
}

export class BrokerClient {
  readonly baseUrl: string;
  private readonly logger: Logger;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: BrokerClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.logger = options.logger ?? silentLogger;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 5_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async health(): Promise<boolean> {
    try {
      const { status, payload } = await this.request("GET", "/api/health");
      return status === 200 && HealthResponseSchema.safeParse(payload).success;
    } catch (error) {
      this.logger.debug("nudge_cli_health_failed", {
        message: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  async ask(payload: AskPayload): Promise<string> {
    const { status, payload: body } = await this.request("POST", "/api/ask", payload);
    this.assertOk(status, body);
    return AskResponseSchema.parse(body).id;
  }

  async status(id: string): Promise<AgentRequestRecord | null> {
    const { status, payload } = await this.request("GET", `/api/status/${encodeURIComponent(id)}`);
    if (status === 404) return null;
    this.assertOk(status, payload);
    return AgentRequestRecordSchema.parse(payload);
  }

  async pending(): Promise<AgentRequestRecord[]> {
    const { status, payload } = await this.request("GET", "/api/pending");
    this.assertOk(status, payload);
    return PendingResponseSchema.parse(payload);
  }

  async answer(id: string, text: string): Promise<boolean> {
    const { status, payload } = await this.request("POST", "/api/answer", { id, answer: text });
    if (status === 404) return false;
    this.assertOk(status, payload);
    return true;
  }

  async shutdown(): Promise<void> {
    const { status, payload } = await this.request("POST", "/api/shutdown");
    this.assertOk(status, payload);
  }

  /**
   * Polls the status route until the request is answered. Read failures are
   * logged and retried until the deadline; the broker is never told that the
   * caller gave up.
   */
  async waitForAnswer(id: string, options: WaitOptions): Promise<AgentRequestRecord> {
    const now = options.now ?? Date.now;
    const sleep = options.sleep ?? ((ms: number) => delay(ms));
    const pollIntervalMs = options.pollIntervalMs ?? 1_000;
    const deadline = now() + options.timeoutMs;

    while (now() < deadline) {
      try {
        const record = await this.status(id);
        if (record?.status === "answered") return record;
        if (!record) this.logger.debug("nudge_cli_status_missing", { requestId: id });
      } catch (error) {
        this.logger.warn("nudge_cli_status_poll_failed", {
          requestId: id,
          message: error instanceof Error ? error.message : String(error),
        });
      }
      await sleep(pollIntervalMs);
    }

    throw new ClientTimeoutError(id, options.timeoutMs);
  }

  private assertOk(status: number, payload: unknown): void {
    if (status >= 200 && status < 300) return;
    const parsed = ErrorBodySchema.safeParse(payload);
    const message = parsed.success ? parsed.data.error : `HTTP ${status}`;
    if (status === 429) throw new BrokerBackpressureError(message);
    throw new BrokerHttpError(status, message);
  }

  private async request(method: "GET" | "POST", path: string, body?: unknown): Promise<{ status: number; payload: unknown }> {
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { "content-type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: AbortSignal.timeout(this.requestTimeoutMs),
    });
    const text = await response.text();
    let payload: unknown = null;
    if (text) {
      try {
        payload = JSON.parse(text);
      } catch {
        throw new BrokerHttpError(response.status, `Unparseable response from ${path}`);
      }
    }
    return { status: response.status, payload };
  }
}
