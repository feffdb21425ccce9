import { z } from "zod";

export const NodeSchema = z.object({
  /** `host:port`; an `http://` or `https://` scheme selects plaintext or TLS. */
  rpcUrl: z.string().trim().min(1).default("localhost:16110"),
  connectTimeoutMs: z.number().int().min(100).default(10_000),
});

export const GatewayAuthSchema = z
  .object({
    mode: z.enum(["none", "token"]).default("none"),
    token: z.string().min(32).optional(),
  })
  .refine(
    (auth) => auth.mode === "none" || (typeof auth.token === "string" && auth.token.length >= 32),
    { message: "Auth credential required for selected mode" },
  );

export const GatewayServerSchema = z.object({
  host: z.string().trim().min(1).default("0.0.0.0"),
  port: z.number().int().min(0).max(65535).default(8080),
  maxBodyBytes: z.number().int().min(1).default(1024 * 1024),
  /** A WebSocket client with more than this queued is disconnected with 1013. */
  maxWsBufferedBytes: z.number().int().min(0).default(4 * 1024 * 1024),
  auth: GatewayAuthSchema.default({ mode: "none" }),
});

export const LoggingSchema = z.object({
  level: z
    .enum(["silly", "trace", "debug", "info", "warn", "error", "fatal"])
    .default("info"),
  format: z.enum(["pretty", "json"]).default("pretty"),
  redactSecrets: z.boolean().default(true),
});

export const ObservabilitySchema = z.object({
  enabled: z.boolean().default(false),
  otlp: z
    .object({
      endpoint: z.string().url(),
      headersEnvVar: z.string().optional(),
    })
    .optional(),
  serviceName: z.string().default("kaspa-gateway"),
  latencyWarnMs: z.number().min(0).default(50),
});

export const GatewayConfigSchema = z.object({
  node: NodeSchema.default({}),
  gateway: GatewayServerSchema.default({}),
  logging: LoggingSchema.default({}),
  observability: ObservabilitySchema.default({}),
});
