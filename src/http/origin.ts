const LOOPBACK_ORIGIN_HOSTS = new Set(["127.0.0.1", "localhost"]);

export const CORS_ALLOW_METHODS = "GET, POST, OPTIONS";
export const CORS_ALLOW_HEADERS = "Content-Type";

/**
 * True when the Origin header names a page served from this machine, at any
 * port. The bundled UI runs on a port of its own, so the broker port alone
 * is not enough.
 */
export function isLoopbackOrigin(origin: string | null | undefined): boolean {
  if (!origin) return false;
  let parsed: URL;
  try {
    parsed = new URL(origin);
  } catch {
    return false;
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") return false;
  if (parsed.username || parsed.password) return false;
  return LOOPBACK_ORIGIN_HOSTS.has(parsed.hostname);
}

export function corsHeadersFor(origin: string | null | undefined): Record<string, string> {
  if (!origin || !isLoopbackOrigin(origin)) return {};
  return {
    "access-control-allow-origin": origin,
    vary: "Origin",
  };
}

export function preflightHeadersFor(origin: string | null | undefined): Record<string, string> {
  return {
    ...corsHeadersFor(origin),
    "access-control-allow-methods": CORS_ALLOW_METHODS,
    "access-control-allow-headers": CORS_ALLOW_HEADERS,
  };
}
