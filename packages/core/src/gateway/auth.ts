import { createHash, timingSafeEqual } from "node:crypto";
import type { IncomingMessage } from "node:http";

/**
 * Gateway authentication. `none` leaves every route open; `token` requires
 * a bearer token on RPC routes and on the WebSocket upgrade.
 */

export type AuthMode = "none" | "token";

export type AuthConfig = {
  mode: AuthMode;
  token?: string;
};

export type AuthResult = { ok: true; method: AuthMode } | { ok: false; reason: string };

/**
 * Extract bearer token from Authorization header.
 */
export function extractBearerToken(req: IncomingMessage): string | undefined {
  const authHeader = headerValue(req.headers.authorization);
  if (!authHeader?.startsWith("Bearer ")) return undefined;
  return authHeader.slice("Bearer ".length).trim();
}

/**
 * Browsers cannot set headers on a WebSocket handshake, so the upgrade may
 * carry the token as `?token=` instead.
 */
export function extractToken(req: IncomingMessage, allowQuery: boolean): string | undefined {
  return extractBearerToken(req) ?? (allowQuery ? getQueryParam(req, "token") : undefined);
}

/**
 * Authorize a gateway request.
 */
export function authorizeRequest(params: {
  config: AuthConfig;
  token: string | undefined;
}): AuthResult {
  const { config, token } = params;

  switch (config.mode) {
    case "none":
      return { ok: true, method: "none" };
    case "token":
      return tokensMatch(token, config.token)
        ? { ok: true, method: "token" }
        : { ok: false, reason: "Invalid or missing token" };
  }
}

/**
 * Constant-time token comparison. Both sides are hashed to 32-byte digests
 * first so the comparison time does not depend on either length.
 */
export function tokensMatch(provided: string | undefined, expected: string | undefined): boolean {
  if (provided === undefined || expected === undefined) return false;
  const providedDigest = createHash("sha256").update(provided).digest();
  const expectedDigest = createHash("sha256").update(expected).digest();
  return timingSafeEqual(providedDigest, expectedDigest);
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function getQueryParam(req: IncomingMessage, name: string): string | undefined {
  const url = req.url;
  if (!url) return undefined;
  try {
    const parsed = new URL(url, "http://localhost");
    return parsed.searchParams.get(name) ?? undefined;
  } catch {
    return undefined;
  }
}
