import { describe, expect, it } from "vitest";
import { ConfigError } from "../infra/errors.js";
import { isEnvVarName, resolveSecret } from "./secrets.js";

describe("isEnvVarName", () => {
  it("accepts upper-case names with digits and underscores", () => {
    expect(isEnvVarName("OTLP_HEADERS")).toBe(true);
    expect(isEnvVarName("A1")).toBe(true);
  });

  it("rejects anything else", () => {
    expect(isEnvVarName("otlp_headers")).toBe(false);
    expect(isEnvVarName("1_HEADERS")).toBe(false);
    expect(isEnvVarName("HAS SPACE")).toBe(false);
    expect(isEnvVarName("")).toBe(false);
  });
});

describe("resolveSecret", () => {
  it("reads the variable from the given environment", () => {
    expect(resolveSecret("OTLP_HEADERS", { OTLP_HEADERS: "x-api-key=test-secret" })).toBe(
      "x-api-key=test-secret",
    );
  });

  it("treats unset and empty variables alike", () => {
    expect(resolveSecret("OTLP_HEADERS", {})).toBeUndefined();
    expect(resolveSecret("OTLP_HEADERS", { OTLP_HEADERS: "" })).toBeUndefined();
  });

  it("throws a ConfigError for an invalid name", () => {
    expect(() => resolveSecret("bad-name", {})).toThrow(ConfigError);
    expect(() => resolveSecret("bad-name", {})).toThrow(
      'Invalid env var name: "bad-name". Must be uppercase alphanumeric with underscores.',
    );
  });
});
