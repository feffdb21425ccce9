import {
  createServer as createHttpServer,
  type Server as HttpServer,
  type IncomingMessage,
  type ServerResponse,
} from "node:http";
import type { Logger } from "tslog";
import {
  AppError,
  AuthError,
  NotFoundError,
  PayloadTooLargeError,
} from "../infra/errors.js";
import type { MetricsScrapeHandler } from "../infra/metrics.js";
import { err, ok, type Result } from "../infra/result.js";
import { authorizeRequest, extractToken, type AuthConfig } from "./auth.js";
import {
  buildErrorBody,
  buildRpcResponse,
  parseJsonBody,
  toAppError,
} from "./protocol/frames.js";
import type { RouteHandler } from "./server-methods/rpc.js";

/**
 * Express-free HTTP server with security headers, permissive CORS and the
 * JSON RPC routes.
 */

export const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

export interface HttpServerOptions {
  routes: Map<string, RouteHandler>;
  authConfig: AuthConfig;
  logger: Logger<unknown>;
  maxBodyBytes?: number;
  /** Serves `GET /metrics` when set. */
  metrics?: MetricsScrapeHandler;
}

/**
 * Create an HTTP server with security headers applied to every response.
 */
export function createGatewayHttpServer(options: HttpServerOptions): HttpServer {
  const { logger } = options;

  return createHttpServer((req, res) => {
    handleRequest(req, res, options).catch((error: unknown) => {
      logger.error(`Unhandled error on ${req.method} ${req.url}:`, error);
      if (!res.headersSent) {
        sendError(res, toAppError(error));
      } else {
        res.destroy();
      }
    });
  });
}

async function handleRequest(
  req: IncomingMessage,
  res: ServerResponse,
  options: HttpServerOptions,
): Promise<void> {
  const { routes, authConfig, logger } = options;
  applySecurityHeaders(res);
  applyCorsHeaders(res);

  const path = new URL(req.url ?? "/", "http://localhost").pathname;

  if (req.method === "OPTIONS") {
    res.writeHead(204);
    res.end();
    return;
  }

  if (path === "/health") {
    if (req.method !== "GET") return sendMethodNotAllowed(res, "GET");
    sendJson(res, 200, { status: "ok" });
    return;
  }

  if (path === "/metrics" && options.metrics) {
    if (req.method !== "GET") return sendMethodNotAllowed(res, "GET");
    options.metrics(req, res);
    return;
  }

  const route = routes.get(path);
  if (!route) {
    sendError(res, new NotFoundError(`No route for ${path}`));
    return;
  }
  if (req.method !== "POST") return sendMethodNotAllowed(res, "POST");

  const auth = authorizeRequest({ config: authConfig, token: extractToken(req, false) });
  if (!auth.ok) {
    logger.warn(`HTTP auth rejected for ${path}: ${auth.reason}`);
    sendError(res, new AuthError(auth.reason));
    return;
  }

  const raw = await readBody(req, options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES);
  const body = raw.ok ? parseJsonBody(raw.value) : raw;
  const result = body.ok ? await route(body.value) : body;

  if (!result.ok) {
    const { error } = result;
    const line = `${path} failed (${error.code}): ${error.message}`;
    if (error.statusCode >= 500) logger.error(line);
    else logger.warn(line);
    sendError(res, error);
    return;
  }

  logger.debug(`${path} ok in ${result.value.latencyMs.toFixed(1)}ms`);
  sendJson(res, 200, buildRpcResponse(result.value.data, result.value.latencyMs));
}

/**
 * Collect the request body. Bytes past the limit are drained and dropped.
 */
function readBody(
  req: IncomingMessage,
  limit: number,
): Promise<Result<string, PayloadTooLargeError>> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;

    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > limit) tooLarge = true;
      if (!tooLarge) chunks.push(chunk);
    });
    req.on("end", () => {
      resolve(
        tooLarge
          ? err(new PayloadTooLargeError(`Request body exceeds ${limit} bytes`))
          : ok(Buffer.concat(chunks).toString("utf-8")),
      );
    });
    req.on("error", reject);
  });
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function sendError(res: ServerResponse, error: AppError): void {
  sendJson(res, error.statusCode, buildErrorBody(error));
}

function sendMethodNotAllowed(res: ServerResponse, allow: string): void {
  res.setHeader("Allow", allow);
  sendError(res, new AppError("Method not allowed", "METHOD_NOT_ALLOWED", 405));
}

function applyCorsHeaders(res: ServerResponse): void {
  res.setHeader("Access-Control-Allow-Origin", "*");
  res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization");
  res.setHeader("Access-Control-Max-Age", "86400");
}

/**
 * Apply security headers to every HTTP response.
 */
function applySecurityHeaders(res: ServerResponse): void {
  res.setHeader("Content-Security-Policy", "default-src 'none'; frame-ancestors 'none'");
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.setHeader("X-Frame-Options", "DENY");
  res.setHeader("X-XSS-Protection", "0");
  res.setHeader("Referrer-Policy", "no-referrer");
  res.setHeader("Permissions-Policy", "camera=(), microphone=(), geolocation=()");
  res.setHeader(
    "Strict-Transport-Security",
    "max-age=31536000; includeSubDomains",
  );
}
