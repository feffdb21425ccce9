import { metrics, type Meter } from "@opentelemetry/api";
import type { MetricReader } from "@opentelemetry/sdk-metrics";
import { resolveSecret } from "../config/secrets.js";

export interface TelemetryConfig {
  enabled: boolean;
  serviceName?: string;
  otlp?: {
    endpoint: string;
    headersEnvVar?: string;
  };
}

export interface TelemetryHandle {
  shutdown(): Promise<void>;
}

const NOOP_HANDLE: TelemetryHandle = {
  shutdown: () => Promise.resolve(),
};

let active: TelemetryHandle | null = null;

/**
 * Start the OpenTelemetry Node SDK for traces. Metrics go through the
 * gateway's own meter provider; see `createOtlpMetricReader`.
 */
export async function initTelemetry(
  config: TelemetryConfig,
): Promise<TelemetryHandle> {
  if (!config.enabled) return NOOP_HANDLE;
  if (active) return active;

  // Loaded lazily so a disabled gateway never pulls in the SDK
  const { NodeSDK } = await import("@opentelemetry/sdk-node");
  const { OTLPTraceExporter } = await import("@opentelemetry/exporter-trace-otlp-http");
  const { Resource } = await import("@opentelemetry/resources");
  const { ATTR_SERVICE_NAME } = await import("@opentelemetry/semantic-conventions");

  const headers = otlpHeaders(config);

  const sdk = new NodeSDK({
    resource: new Resource({
      [ATTR_SERVICE_NAME]: config.serviceName ?? "kaspa-gateway",
    }),
    traceExporter: config.otlp
      ? new OTLPTraceExporter({ url: `${config.otlp.endpoint}/v1/traces`, headers })
      : undefined,
  });

  sdk.start();
  const handle: TelemetryHandle = {
    async shutdown() {
      active = null;
      await sdk.shutdown();
    },
  };
  active = handle;
  return handle;
}

/**
 * Periodic OTLP exporter for the gateway's metrics, or null when telemetry
 * is off or has no OTLP endpoint.
 */
export async function createOtlpMetricReader(
  config: TelemetryConfig,
): Promise<MetricReader | null> {
  if (!config.enabled || !config.otlp) return null;

  const { OTLPMetricExporter } = await import("@opentelemetry/exporter-metrics-otlp-http");
  const { PeriodicExportingMetricReader } = await import("@opentelemetry/sdk-metrics");

  return new PeriodicExportingMetricReader({
    exporter: new OTLPMetricExporter({
      url: `${config.otlp.endpoint}/v1/metrics`,
      headers: otlpHeaders(config),
    }),
    exportIntervalMillis: 30_000,
  });
}

function otlpHeaders(config: TelemetryConfig): Record<string, string> {
  return parseOtlpHeaders(
    config.otlp?.headersEnvVar ? resolveSecret(config.otlp.headersEnvVar) : undefined,
  );
}

/**
 * Parse the "key=value,key2=value2" header format used by OTLP env vars.
 */
export function parseOtlpHeaders(raw: string | undefined): Record<string, string> {
  const headers: Record<string, string> = {};
  if (!raw) return headers;
  for (const pair of raw.split(",")) {
    const [key, value] = pair.split("=", 2);
    if (key?.trim() && value?.trim()) headers[key.trim()] = value.trim();
  }
  return headers;
}

export function getMeter(name: string = "kaspa-gateway"): Meter {
  return metrics.getMeter(name);
}
