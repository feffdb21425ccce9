import { randomBytes } from "node:crypto";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "../infra/errors.js";
import { DEFAULT_CONFIG } from "./defaults.js";
import { applyEnvOverrides, loadConfig, parsePortOption } from "./loader.js";
import { ConfigValidationError } from "./validation.js";

const TOKEN = "test-secret-".padEnd(32, "0");

function makeTempDir(): string {
  const dir = join(tmpdir(), `kaspa-gateway-test-${randomBytes(8).toString("hex")}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

describe("loadConfig", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir();
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfig(name: string, content: string): string {
    const path = join(tempDir, name);
    writeFileSync(path, content);
    return path;
  }

  it("returns the defaults when the default file is absent", async () => {
    // The repository ships gateway.example.json5, never gateway.json5
    const config = await loadConfig(undefined, {});
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it("throws for an explicitly named file that does not exist", async () => {
    const path = join(tempDir, "missing.json5");
    await expect(loadConfig(path, {})).rejects.toThrow(`Config file not found: ${path}`);
  });

  it("reads JSON5 with comments and fills defaults", async () => {
    const path = writeConfig(
      "gateway.json5",
      `{
        // local node
        node: { rpcUrl: "http://127.0.0.1:16110" },
        gateway: { port: 9090, },
      }`,
    );

    const config = await loadConfig(path, {});

    expect(config.node).toEqual({ rpcUrl: "http://127.0.0.1:16110", connectTimeoutMs: 10_000 });
    expect(config.gateway).toEqual({
      host: "0.0.0.0",
      port: 9090,
      maxBodyBytes: 1024 * 1024,
      maxWsBufferedBytes: 4 * 1024 * 1024,
      auth: { mode: "none" },
    });
    expect(config.logging.level).toBe("info");
  });

  it("rejects unparsable files", async () => {
    const path = writeConfig("broken.json5", "{ node: ");

    await expect(loadConfig(path, {})).rejects.toThrow(
      `Config file is not valid JSON or JSON5: ${path}`,
    );
  });

  it("rejects files that do not hold an object", async () => {
    const path = writeConfig("list.json", "[1, 2]");

    await expect(loadConfig(path, {})).rejects.toThrow(
      `Config file must contain an object: ${path}`,
    );
  });

  it("reports schema violations with their paths", async () => {
    const path = writeConfig("bad.json", JSON.stringify({ gateway: { port: 70000 } }));

    const error = await loadConfig(path, {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toHaveProperty(
      "message",
      "Config validation failed:\n  - gateway.port: Number must be less than or equal to 65535",
    );
  });

  it("runs cross-field validation", async () => {
    const path = writeConfig("otlp.json", JSON.stringify({ observability: { enabled: true } }));

    await expect(loadConfig(path, {})).rejects.toBeInstanceOf(ConfigValidationError);
  });

  it("applies environment overrides on top of the file", async () => {
    const path = writeConfig("gateway.json", JSON.stringify({ node: { rpcUrl: "node-a:16110" } }));

    const config = await loadConfig(path, {
      KASPA_RPC_URL: "node-b:16110",
      BIND_ADDRESS: "127.0.0.1:3000",
      GATEWAY_AUTH_TOKEN: TOKEN,
      LOG_LEVEL: "DEBUG",
    });

    expect(config.node.rpcUrl).toBe("node-b:16110");
    expect(config.gateway.host).toBe("127.0.0.1");
    expect(config.gateway.port).toBe(3000);
    expect(config.gateway.auth).toEqual({ mode: "token", token: TOKEN });
    expect(config.logging.level).toBe("debug");
  });
});

describe("applyEnvOverrides", () => {
  it("leaves the input untouched", () => {
    const raw = { node: { rpcUrl: "a:1" } };

    const result = applyEnvOverrides(raw, { KASPA_RPC_URL: "b:2" });

    expect(raw).toEqual({ node: { rpcUrl: "a:1" } });
    expect(result.node).toEqual({ rpcUrl: "b:2" });
  });

  it("keeps an auth mode chosen in the file", () => {
    const result = applyEnvOverrides(
      { gateway: { auth: { mode: "none" } } },
      { GATEWAY_AUTH_TOKEN: TOKEN },
    );

    expect(result.gateway).toEqual({ auth: { mode: "none", token: TOKEN } });
  });

  it("ignores blank variables", () => {
    expect(applyEnvOverrides({}, { KASPA_RPC_URL: "  ", LOG_LEVEL: "" })).toEqual({
      node: {},
      gateway: { auth: {} },
      logging: {},
    });
  });

  it("accepts a bracketed IPv6 bind address", () => {
    const result = applyEnvOverrides({}, { BIND_ADDRESS: "[::1]:8080" });

    expect(result.gateway).toEqual({ host: "::1", port: 8080, auth: {} });
  });

  it("rejects a malformed bind address", () => {
    expect(() => applyEnvOverrides({}, { BIND_ADDRESS: "localhost" })).toThrow(
      'BIND_ADDRESS must be "host:port" (got "localhost")',
    );
  });
});

describe("parsePortOption", () => {
  it("accepts ports within range", () => {
    expect(parsePortOption("9090")).toBe(9090);
    expect(parsePortOption(" 0 ")).toBe(0);
  });

  it("rejects values that are not whole numbers", () => {
    expect(() => parsePortOption("abc")).toThrow(ConfigError);
    expect(() => parsePortOption("abc")).toThrow('Invalid port "abc": Port must be a whole number');
    expect(() => parsePortOption("80.5")).toThrow("Port must be a whole number");
  });

  it("rejects ports above 65535", () => {
    expect(() => parsePortOption("70000")).toThrow(
      'Invalid port "70000": Number must be less than or equal to 65535',
    );
  });
});
