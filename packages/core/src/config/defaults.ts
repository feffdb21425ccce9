import type { GatewayConfig } from "./types.js";

/** Looked up in the working directory; a missing default file is fine. */
export const DEFAULT_CONFIG_PATH = "gateway.json5";

/**
 * Effective configuration with no file and no environment overrides.
 * Auth is off by default; token mode must be opted into.
 */
export const DEFAULT_CONFIG: GatewayConfig = {
  node: {
    rpcUrl: "localhost:16110",
    connectTimeoutMs: 10_000,
  },
  gateway: {
    host: "0.0.0.0",
    port: 8080,
    maxBodyBytes: 1024 * 1024,
    maxWsBufferedBytes: 4 * 1024 * 1024,
    auth: { mode: "none" },
  },
  logging: {
    level: "info",
    format: "pretty",
    redactSecrets: true,
  },
  observability: {
    enabled: false,
    serviceName: "kaspa-gateway",
    latencyWarnMs: 50,
  },
};
