import { isIP } from "node:net";

export interface BindAddress {
  host: string;
  port: number;
}

/**
 * Parse a `host:port` bind address. IPv6 hosts must be bracketed
 * (`[::]:8080`). Returns null for anything else.
 */
export function parseBindAddress(raw: string): BindAddress | null {
  const trimmed = raw.trim();
  let host: string;
  let portText: string;

  if (trimmed.startsWith("[")) {
    const end = trimmed.indexOf("]");
    if (end === -1 || trimmed[end + 1] !== ":") return null;
    host = trimmed.slice(1, end);
    portText = trimmed.slice(end + 2);
    if (isIP(host) !== 6) return null;
  } else {
    const colon = trimmed.lastIndexOf(":");
    if (colon <= 0 || trimmed.indexOf(":") !== colon) return null;
    host = trimmed.slice(0, colon);
    portText = trimmed.slice(colon + 1);
  }

  if (!/^\d{1,5}$/.test(portText)) return null;
  const port = Number(portText);
  if (port > 65535) return null;
  return { host, port };
}

/**
 * Render a host and port for log lines and URLs, bracketing IPv6 hosts.
 */
export function formatHostPort(host: string, port: number): string {
  return isIP(host) === 6 ? `[${host}]:${port}` : `${host}:${port}`;
}
