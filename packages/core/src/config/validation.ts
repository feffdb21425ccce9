import { ConfigError } from "../infra/errors.js";
import type { GatewayConfig } from "./types.js";

export class ConfigValidationError extends ConfigError {
  constructor(
    public readonly errors: string[],
  ) {
    super(`Config validation failed:\n${errors.map((e) => `  - ${e}`).join("\n")}`);
    this.name = "ConfigValidationError";
  }
}

const RPC_URL_RE = /^(?:https?:\/\/)?(?:\[[0-9a-fA-F:.]+\]|[^\s:/[\]]+):\d{1,5}\/?$/i;

/**
 * Cross-field validation that goes beyond what Zod schema refinements handle.
 */
export function validateConfig(config: GatewayConfig): void {
  const errors: string[] = [];

  if (!RPC_URL_RE.test(config.node.rpcUrl)) {
    errors.push(
      `node.rpcUrl must be "host:port", optionally with an http:// or https:// scheme (got "${config.node.rpcUrl}").`,
    );
  }

  const { auth } = config.gateway;
  if (auth.mode === "token" && (auth.token?.length ?? 0) < 32) {
    errors.push("gateway.auth.token must be at least 32 characters in token mode.");
  }

  if (config.observability.enabled && !config.observability.otlp) {
    errors.push("observability.otlp.endpoint is required when observability is enabled.");
  }

  if (errors.length > 0) {
    throw new ConfigValidationError(errors);
  }
}
