import { describe, expect, it } from "vitest";
import { formatHostPort, parseBindAddress } from "./net.js";

describe("parseBindAddress", () => {
  it("parses host:port", () => {
    expect(parseBindAddress("0.0.0.0:8080")).toEqual({ host: "0.0.0.0", port: 8080 });
    expect(parseBindAddress(" localhost:9000 ")).toEqual({ host: "localhost", port: 9000 });
  });

  it("parses bracketed IPv6 hosts", () => {
    expect(parseBindAddress("[::1]:8080")).toEqual({ host: "::1", port: 8080 });
  });

  it("accepts port 0 for an ephemeral port", () => {
    expect(parseBindAddress("127.0.0.1:0")).toEqual({ host: "127.0.0.1", port: 0 });
  });

  it("rejects malformed addresses", () => {
    expect(parseBindAddress("8080")).toBeNull();
    expect(parseBindAddress(":8080")).toBeNull();
    expect(parseBindAddress("::1:8080")).toBeNull();
    expect(parseBindAddress("[::1]8080")).toBeNull();
    expect(parseBindAddress("[nope]:8080")).toBeNull();
    expect(parseBindAddress("localhost:http")).toBeNull();
    expect(parseBindAddress("localhost:70000")).toBeNull();
  });
});

describe("formatHostPort", () => {
  it("brackets IPv6 hosts only", () => {
    expect(formatHostPort("0.0.0.0", 8080)).toBe("0.0.0.0:8080");
    expect(formatHostPort("::", 8080)).toBe("[::]:8080");
  });
});
