import { existsSync, readFileSync } from "node:fs";
import JSON5 from "json5";
import { z } from "zod";
import { parseBindAddress } from "../gateway/net.js";
import { ConfigError } from "../infra/errors.js";
import { DEFAULT_CONFIG_PATH } from "./defaults.js";
import { GatewayConfigSchema, GatewayServerSchema } from "./schema.js";
import type { GatewayConfig } from "./types.js";
import { validateConfig } from "./validation.js";

type RawConfig = Record<string, unknown>;

/**
 * Load config from a JSON or JSON5 file, apply environment overrides, then
 * validate. The default file may be absent; an explicitly named one may not.
 */
export async function loadConfig(
  filePath?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<GatewayConfig> {
  const path = filePath ?? DEFAULT_CONFIG_PATH;
  let raw: RawConfig = {};

  if (existsSync(path)) {
    raw = readConfigFile(path);
  } else if (filePath !== undefined) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }

  const result = GatewayConfigSchema.safeParse(applyEnvOverrides(raw, env));
  if (!result.success) {
    const messages = result.error.issues.map(
      (i) => `${i.path.join(".")}: ${i.message}`,
    );
    throw new ConfigError(
      `Config validation failed:\n${messages.map((m) => `  - ${m}`).join("\n")}`,
    );
  }

  validateConfig(result.data);
  return result.data;
}

const PortOptionSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, "Port must be a whole number")
  .transform(Number)
  .pipe(GatewayServerSchema.shape.port);

/** Parse a port given on the command line with the same bounds as the config file. */
export function parsePortOption(value: string): number {
  const result = PortOptionSchema.safeParse(value);
  if (!result.success) {
    const reason = result.error.issues[0]?.message ?? "Invalid port";
    throw new ConfigError(`Invalid port "${value}": ${reason}`);
  }
  return result.data;
}

function readConfigFile(path: string): RawConfig {
  let parsed: unknown;
  try {
    parsed = JSON5.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON or JSON5: ${path}`, error);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file must contain an object: ${path}`);
  }
  return parsed;
}

/**
 * Overlay the supported environment variables onto a raw config object.
 * Returns a new object; the input is not modified.
 *
 * - `KASPA_RPC_URL` sets `node.rpcUrl`
 * - `BIND_ADDRESS` (`host:port`) sets `gateway.host` and `gateway.port`
 * - `GATEWAY_AUTH_TOKEN` sets `gateway.auth.token`, and turns on token
 *   mode unless the file chose a mode
 * - `LOG_LEVEL` sets `logging.level`
 */
export function applyEnvOverrides(raw: RawConfig, env: NodeJS.ProcessEnv): RawConfig {
  const node = section(raw, "node");
  const gateway = section(raw, "gateway");
  const auth = section(gateway, "auth");
  const logging = section(raw, "logging");

  const rpcUrl = env.KASPA_RPC_URL?.trim();
  if (rpcUrl) node.rpcUrl = rpcUrl;

  const bindAddress = env.BIND_ADDRESS?.trim();
  if (bindAddress) {
    const bind = parseBindAddress(bindAddress);
    if (!bind) {
      throw new ConfigError(`BIND_ADDRESS must be "host:port" (got "${bindAddress}")`);
    }
    gateway.host = bind.host;
    gateway.port = bind.port;
  }

  const token = env.GATEWAY_AUTH_TOKEN?.trim();
  if (token) {
    auth.token = token;
    auth.mode ??= "token";
  }

  const level = env.LOG_LEVEL?.trim().toLowerCase();
  if (level) logging.level = level;

  return {
    ...raw,
    node,
    gateway: { ...gateway, auth },
    logging,
  };
}

function section(parent: RawConfig, key: string): RawConfig {
  const value = parent[key];
  return isRecord(value) ? { ...value } : {};
}

function isRecord(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
