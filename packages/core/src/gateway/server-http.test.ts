import type { Server } from "node:http";
import { afterEach, describe, expect, it } from "vitest";
import { ConnectionError, RemoteError } from "../infra/errors.js";
import { createLogger } from "../infra/logger.js";
import {
  createLatencyRecorder,
  createMetricsRegistry,
  type MetricsScrapeHandler,
} from "../infra/metrics.js";
import { err, ok } from "../infra/result.js";
import { UnaryCallAdapter } from "../rpc/unary.js";
import { FakeChannel } from "../testing/fake-channel.js";
import type { AuthConfig } from "./auth.js";
import { createGatewayHttpServer } from "./server-http.js";
import { createRpcRoutes, type RouteHandler } from "./server-methods/rpc.js";

const logger = createLogger("test", { level: "fatal" });

let server: Server | null = null;

afterEach(async () => {
  if (server?.listening) {
    const current = server;
    await new Promise<void>((resolve) => current.close(() => resolve()));
  }
  server = null;
});

async function start(
  routes: Map<string, RouteHandler>,
  authConfig: AuthConfig = { mode: "none" },
  maxBodyBytes?: number,
  metrics?: MetricsScrapeHandler,
): Promise<string> {
  const created = createGatewayHttpServer({ routes, authConfig, logger, maxBodyBytes, metrics });
  server = created;
  await new Promise<void>((resolve) => created.listen(0, "127.0.0.1", () => resolve()));
  const address = created.address();
  if (address === null || typeof address === "string") throw new Error("Server is not listening on a port");
  return `http://127.0.0.1:${address.port}`;
}

const stubRoutes = new Map<string, RouteHandler>([
  ["/rpc/echo", async (body) => ok({ data: body, latencyMs: 1.23456 })],
  ["/rpc/fail", async () => err(new RemoteError("Block not found"))],
  [
    "/rpc/throw",
    async () => {
      throw new Error("boom");
    },
  ],
]);

function post(url: string, body: string, headers: Record<string, string> = {}): Promise<Response> {
  return fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body,
  });
}

describe("gateway HTTP server", () => {
  it("answers health checks", async () => {
    const base = await start(stubRoutes);

    const res = await fetch(`${base}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok" });
  });

  it("sets security and CORS headers on every response", async () => {
    const base = await start(stubRoutes);

    const res = await fetch(`${base}/health`);

    expect(res.headers.get("x-content-type-options")).toBe("nosniff");
    expect(res.headers.get("x-frame-options")).toBe("DENY");
    expect(res.headers.get("referrer-policy")).toBe("no-referrer");
    expect(res.headers.get("access-control-allow-origin")).toBe("*");
  });

  it("answers CORS preflight with 204", async () => {
    const base = await start(stubRoutes);

    const res = await fetch(`${base}/rpc/echo`, { method: "OPTIONS" });

    expect(res.status).toBe(204);
    expect(res.headers.get("access-control-allow-methods")).toBe("GET, POST, OPTIONS");
    expect(res.headers.get("access-control-allow-headers")).toBe("Content-Type, Authorization");
  });

  it("returns 404 for unknown paths", async () => {
    const base = await start(stubRoutes);

    const res = await fetch(`${base}/rpc/nope`, { method: "POST" });

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: "No route for /rpc/nope",
      code: 404,
      kind: "NOT_FOUND",
    });
  });

  it("returns 405 for GET on an RPC route", async () => {
    const base = await start(stubRoutes);

    const res = await fetch(`${base}/rpc/echo`);

    expect(res.status).toBe(405);
    expect(res.headers.get("allow")).toBe("POST");
  });

  it("wraps route results in the success envelope", async () => {
    const base = await start(stubRoutes);

    const res = await post(`${base}/rpc/echo`, JSON.stringify({ value: 1 }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      data: { value: 1 },
      error: null,
      latency_ms: 1.235,
    });
  });

  it("treats an empty body as an empty object", async () => {
    const base = await start(stubRoutes);

    const res = await post(`${base}/rpc/echo`, "");

    expect(await res.json()).toMatchObject({ success: true, data: {} });
  });

  it("rejects invalid JSON", async () => {
    const base = await start(stubRoutes);

    const res = await post(`${base}/rpc/echo`, "{not json");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid JSON", code: 400, kind: "VALIDATION_ERROR" });
  });

  it("rejects bodies over the limit", async () => {
    const base = await start(stubRoutes, { mode: "none" }, 16);

    const res = await post(`${base}/rpc/echo`, JSON.stringify({ padding: "x".repeat(64) }));

    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({
      error: "Request body exceeds 16 bytes",
      code: 413,
      kind: "PAYLOAD_TOO_LARGE",
    });
  });

  it("maps route failures to their status", async () => {
    const base = await start(stubRoutes);

    const res = await post(`${base}/rpc/fail`, "{}");

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({ error: "Block not found", code: 422, kind: "REMOTE_ERROR" });
  });

  it("hides unexpected exceptions behind a 500", async () => {
    const base = await start(stubRoutes);

    const res = await post(`${base}/rpc/throw`, "{}");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: "Internal server error",
      code: 500,
      kind: "INTERNAL_ERROR",
    });
  });

  describe("token auth", () => {
    const auth: AuthConfig = { mode: "token", token: "test-secret" };

    it("rejects requests without a token", async () => {
      const base = await start(stubRoutes, auth);

      const res = await post(`${base}/rpc/echo`, "{}");

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({
        error: "Invalid or missing token",
        code: 401,
        kind: "AUTH_ERROR",
      });
    });

    it("ignores a token in the query string", async () => {
      const base = await start(stubRoutes, auth);

      const res = await post(`${base}/rpc/echo?token=test-secret`, "{}");

      expect(res.status).toBe(401);
    });

    it("accepts the bearer token", async () => {
      const base = await start(stubRoutes, auth);

      const res = await post(`${base}/rpc/echo`, "{}", { Authorization: "Bearer test-secret" });

      expect(res.status).toBe(200);
    });

    it("leaves the health check open", async () => {
      const base = await start(stubRoutes, auth);

      const res = await fetch(`${base}/health`);

      expect(res.status).toBe(200);
    });
  });

  describe("metrics", () => {
    it("serves recorded latencies in Prometheus text format", async () => {
      const registry = createMetricsRegistry();
      const record = createLatencyRecorder({ meter: registry.meter });
      record("get_dag_tips", 7);
      const base = await start(stubRoutes, { mode: "token", token: "test-secret" }, undefined, registry.scrape);

      const res = await fetch(`${base}/metrics`);

      expect(res.status).toBe(200);
      const text = await res.text();
      expect(text).toMatch(/^gateway_rpc_latency\w*_count\{[^}]*operation="get_dag_tips"[^}]*\} 1( \d+)?$/m);
      expect(text).toMatch(/^gateway_rpc_latency\w*_sum\{[^}]*operation="get_dag_tips"[^}]*\} 7( \d+)?$/m);
      expect(text).toMatch(/^gateway_rpc_latency\w*_bucket\{[^}]*le="10"[^}]*\} 1( \d+)?$/m);
      await registry.shutdown();
    });

    it("rejects other methods on /metrics", async () => {
      const registry = createMetricsRegistry();
      const base = await start(stubRoutes, { mode: "none" }, undefined, registry.scrape);

      const res = await post(`${base}/metrics`, "{}");

      expect(res.status).toBe(405);
      expect(res.headers.get("allow")).toBe("GET");
      await registry.shutdown();
    });

    it("returns 404 for /metrics without a registry", async () => {
      const base = await start(stubRoutes);

      const res = await fetch(`${base}/metrics`);

      expect(res.status).toBe(404);
    });
  });

  describe("RPC routes", () => {
    const hash = "f".repeat(64);

    it("serves getBlock through the unary adapter", async () => {
      const channel = new FakeChannel((_envelope, stream) => {
        stream.reply({ getBlockResponse: { block: { header: { hash, blueScore: "12" } } } });
      });
      const base = await start(createRpcRoutes(new UnaryCallAdapter(channel)));

      const res = await post(`${base}/rpc/getBlock`, JSON.stringify({ hash }));

      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body).toMatchObject({
        success: true,
        error: null,
        data: { hash, header: { blueScore: "12" }, transactions: [], verboseData: null },
      });
    });

    it("returns 400 for an invalid hash", async () => {
      const base = await start(createRpcRoutes(new UnaryCallAdapter(new FakeChannel())));

      const res = await post(`${base}/rpc/getBlock`, JSON.stringify({ hash: "zz" }));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "Invalid request: hash: Invalid block hash format",
        code: 400,
        kind: "VALIDATION_ERROR",
      });
    });

    it("returns 502 when the node cannot be reached", async () => {
      const channel = new FakeChannel();
      channel.openError = new ConnectionError("Channel closed");
      const base = await start(createRpcRoutes(new UnaryCallAdapter(channel)));

      const res = await post(`${base}/rpc/getDAGTips`, "");

      expect(res.status).toBe(502);
      expect(await res.json()).toEqual({
        error: "Channel closed",
        code: 502,
        kind: "CONNECTION_ERROR",
      });
    });
  });
});
