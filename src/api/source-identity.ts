import type { IncomingHttpHeaders } from "node:http";

/**
 * Caller origin used as the per-source rate-limit key. `req.ip` already
 * honours the app's "trust proxy" setting; the raw X-Forwarded-For header
 * is only a fallback when the socket address is unknown.
 */
export function resolveSourceIdentity(req: { ip?: string; headers: IncomingHttpHeaders }): string {
  const ip = (req.ip || "").trim();
  if (ip) return ip;

  const raw = req.headers["x-forwarded-for"];
  const forwarded = Array.isArray(raw) ? raw[0] : raw;
  const first = (forwarded || "").split(",")[0].trim();
  return first || "unknown";
}
