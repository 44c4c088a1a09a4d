import type http from "node:http";
import { MAX_REQUEST_BODY_BYTES } from "../stores/limits";

export type JsonBodyResult =
  | { ok: true; body: Record<string, unknown> }
  | { ok: false; reason: "too_large" | "invalid_json" | "not_object" };

const utf8 = new TextDecoder("utf-8", { fatal: true });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads a JSON object body, never buffering more than `maxBytes`. An empty
 * body reads as `{}` so that route validation reports the missing field.
 */
export async function readJsonBody(
  req: http.IncomingMessage,
  maxBytes: number = MAX_REQUEST_BODY_BYTES
): Promise<JsonBodyResult> {
  const declared = Number(req.headers["content-length"] ?? "0");
  if (Number.isFinite(declared) && declared > maxBytes) {
    req.resume();
    return { ok: false, reason: "too_large" };
  }

  const chunks: Buffer[] = [];
  let received = 0;
  let overflow = false;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    received += buffer.length;
    if (received > maxBytes) {
      overflow = true;
      continue;
    }
    chunks.push(buffer);
  }
  if (overflow) return { ok: false, reason: "too_large" };
  if (!chunks.length) return { ok: true, body: {} };

  let parsed: unknown;
  try {
    parsed = JSON.parse(utf8.decode(Buffer.concat(chunks)));
  } catch {
    return { ok: false, reason: "invalid_json" };
  }
  if (!isRecord(parsed)) return { ok: false, reason: "not_object" };
  return { ok: true, body: parsed };
}
