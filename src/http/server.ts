import http from "node:http";
import { URL } from "node:url";
import crypto from "node:crypto";
import type { Logger } from "../config/logger";
import type { AgentRequest, RequestStore } from "../stores/interfaces";
import type { Notifier } from "../notifications/notifier";
import { MAX_REQUEST_BODY_BYTES } from "../stores/limits";
import { readJsonBody } from "./body";
import { corsHeadersFor, isLoopbackOrigin, preflightHeadersFor } from "./origin";
import { toRecord } from "./records";
import { AnswerBodySchema, AskBodySchema, validateBody } from "./schemas";

const STATUS_PREFIX = "/api/status/";

function withSecurityHeaders(headers: Record<string, string>): Record<string, string> {
  return {
    "x-content-type-options": "nosniff",
    "x-frame-options": "DENY",
    "cache-control": "no-store",
    ...headers,
  };
}

function formatHost(host: string): string {
  return host.includes(":") ? `[${host}]` : host;
}

function parseRequestTarget(raw: string, host: string, port: number): URL | null {
  try {
    return new URL(raw, `http://${formatHost(host)}:${port}`);
  } catch {
    return null;
  }
}

export function startHttpServer(params: {
  host: string;
  port: number;
  logger: Logger;
  store: RequestStore;
  notifier?: Notifier | null;
  maxBodyBytes?: number;
  onShutdownRequested?: () => void;
}): http.Server {
  const {
    host,
    port,
    logger,
    store,
    notifier = null,
    maxBodyBytes = MAX_REQUEST_BODY_BYTES,
    onShutdownRequested,
  } = params;

  const boundPort = (): number => {
    const address = server.address();
    return typeof address === "object" && address !== null ? address.port : port;
  };

  const dispatchNotification = (request: AgentRequest): void => {
    if (!notifier) return;
    const url = `http://${formatHost(host)}:${boundPort()}`;
    void Promise.resolve()
      .then(() => notifier.notify({ question: request.question, agent: request.agent, url }))
      .catch((error: unknown) => {
        logger.warn("nudge_broker_notification_failed", {
          requestId: request.id,
          message: error instanceof Error ? error.message : String(error),
        });
      });
  };

  const server = http.createServer(async (req, res) => {
    const traceId = crypto.randomUUID();
    const startedAt = Date.now();
    const method = req.method ?? "GET";
    let pathname = req.url ?? "/";
    const originHeader = req.headers.origin ?? null;
    const corsHeaders = corsHeadersFor(originHeader);
    let statusCode = 500;

    const sendJson = (status: number, payload: unknown, onFlushed?: () => void): void => {
      statusCode = status;
      res.writeHead(
        status,
        withSecurityHeaders({ "content-type": "application/json", ...corsHeaders, "x-request-id": traceId })
      );
      res.end(JSON.stringify(payload), onFlushed);
    };

    try {
      const target = parseRequestTarget(req.url ?? "/", host, port);
      if (!target) {
        sendJson(400, { error: "invalid request target" });
        return;
      }
      pathname = target.pathname;

      if (method === "OPTIONS") {
        statusCode = 204;
        res.writeHead(statusCode, withSecurityHeaders({ ...preflightHeadersFor(originHeader), "x-request-id": traceId }));
        res.end();
        return;
      }

      if (method === "GET" && pathname === "/api/health") {
        sendJson(200, { status: "ok" });
        return;
      }

      if (method === "GET" && pathname === "/api/pending") {
        sendJson(200, store.pending().map(toRecord));
        return;
      }

      if (method === "GET" && pathname.startsWith(STATUS_PREFIX)) {
        const request = store.get(pathname.slice(STATUS_PREFIX.length));
        if (!request) {
          sendJson(404, { error: "not found" });
          return;
        }
        sendJson(200, toRecord(request));
        return;
      }

      if (method === "POST" && pathname === "/api/ask") {
        const body = await readJsonBody(req, maxBodyBytes);
        if (!body.ok) {
          logger.warn("nudge_broker_body_rejected", { traceId, path: pathname, reason: body.reason });
          sendJson(400, { error: "invalid request body" });
          return;
        }
        const validation = validateBody(AskBodySchema, body.body);
        if (!validation.ok) {
          sendJson(400, { error: validation.error });
          return;
        }
        const ask = validation.value;
        const result = store.create({
          question: ask.question,
          context: ask.context,
          agent: ask.agent,
          task: ask.task,
          requestType: ask.request_type ?? "question",
          command: ask.command,
        });
        if (result.status === "invalid") {
          sendJson(400, { error: `missing ${result.field}` });
          return;
        }
        if (result.status === "rejected") {
          logger.warn("nudge_broker_capacity_reached", { traceId, ...store.stats() });
          sendJson(429, { error: "too many pending requests" });
          return;
        }
        logger.info("nudge_broker_request_created", {
          requestId: result.request.id,
          requestType: result.request.requestType,
          agent: result.request.agent,
        });
        sendJson(200, { id: result.request.id });
        dispatchNotification(result.request);
        return;
      }

      if (method === "POST" && pathname === "/api/answer") {
        const body = await readJsonBody(req, maxBodyBytes);
        if (!body.ok) {
          logger.warn("nudge_broker_body_rejected", { traceId, path: pathname, reason: body.reason });
          sendJson(400, { error: "invalid request body" });
          return;
        }
        const validation = validateBody(AnswerBodySchema, body.body);
        if (!validation.ok) {
          sendJson(400, { error: validation.error });
          return;
        }
        if (!store.answer(validation.value.id, validation.value.answer)) {
          sendJson(404, { error: "request not found or already answered" });
          return;
        }
        logger.info("nudge_broker_request_answered", { requestId: validation.value.id });
        sendJson(200, { status: "ok" });
        return;
      }

      if (method === "POST" && pathname === "/api/shutdown") {
        if (originHeader !== null && !isLoopbackOrigin(originHeader)) {
          sendJson(403, { error: "forbidden origin" });
          return;
        }
        logger.info("nudge_broker_shutdown_requested", { traceId });
        sendJson(200, { status: "shutting_down" }, () => onShutdownRequested?.());
        return;
      }

      sendJson(404, { error: "not found" });
    } catch (error) {
      logger.error("nudge_broker_http_handler_error", {
        traceId,
        method,
        path: pathname,
        message: error instanceof Error ? error.message : String(error),
      });
      if (res.headersSent) {
        res.end();
        return;
      }
      sendJson(500, { error: "internal server error" });
    } finally {
      const entry = {
        traceId,
        method,
        path: pathname,
        statusCode,
        durationMs: Date.now() - startedAt,
      };
      // Pollers hit the read routes every second; keep those out of info.
      if (method === "GET") logger.debug("nudge_broker_http_request", entry);
      else logger.info("nudge_broker_http_request", entry);
    }
  });

  server.listen(port, host, () => {
    logger.info("nudge_broker_http_listening", { host, port: boundPort() });
  });

  return server;
}
