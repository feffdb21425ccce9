import { Logger } from "tslog";

export const LOG_LEVELS = [
  "silly",
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFormat = "pretty" | "json";

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  redact?: boolean;
}

/** Keys whose string values never reach a log line. */
const MASKED_KEYS = [
  "token",
  "authToken",
  "authorization",
  "password",
  "secret",
  "jwtSecret",
  "apiKey",
  "api_key",
  "credential",
];

const SENSITIVE_KEY_PATTERNS = [
  /token/i,
  /password/i,
  /secret/i,
  /api[_-]?key/i,
  /authorization/i,
  /credential/i,
];

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Recursively replace sensitive string values, e.g. before printing a
 * loaded config.
 */
export function redactSensitive(value: unknown): unknown {
  if (value === null || typeof value !== "object") return value;

  if (Array.isArray(value)) {
    return value.map(redactSensitive);
  }

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (isSensitiveKey(key) && typeof entry === "string") {
      result[key] = "[REDACTED]";
    } else {
      result[key] = redactSensitive(entry);
    }
  }
  return result;
}

export function createLogger(
  name: string,
  options?: LoggerOptions,
): Logger<unknown> {
  const level = options?.level ?? "info";
  const shouldRedact = options?.redact !== false;

  return new Logger({
    name,
    minLevel: LOG_LEVELS.indexOf(level),
    type: options?.format ?? "pretty",
    ...(shouldRedact && {
      maskValuesOfKeys: MASKED_KEYS,
      maskPlaceholder: "[REDACTED]",
    }),
  });
}
