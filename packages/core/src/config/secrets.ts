import { ConfigError } from "../infra/errors.js";

/**
 * Config files name environment variables that hold credentials (e.g.
 * `observability.otlp.headersEnvVar`); the values themselves only ever
 * come from the environment.
 */

const ENV_VAR_NAME_RE = /^[A-Z][A-Z0-9_]{0,127}$/;

export function isEnvVarName(name: string): boolean {
  return ENV_VAR_NAME_RE.test(name);
}

export function resolveSecret(
  envVarName: string,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  if (!isEnvVarName(envVarName)) {
    throw new ConfigError(
      `Invalid env var name: "${envVarName}". Must be uppercase alphanumeric with underscores.`,
    );
  }
  const value = env[envVarName];
  return value === "" ? undefined : value;
}
