import type { IncomingMessage, ServerResponse } from "node:http";
import type { Meter } from "@opentelemetry/api";
import { PrometheusExporter } from "@opentelemetry/exporter-prometheus";
import { MeterProvider, type MetricReader } from "@opentelemetry/sdk-metrics";
import type { Logger } from "tslog";
import { getMeter } from "./telemetry.js";

/**
 * Sink for per-operation latency. Called after every unary call, whether it
 * succeeded or not; it must not throw or block.
 */
export type LatencyRecorder = (operation: string, latencyMs: number) => void;

export const noopLatencyRecorder: LatencyRecorder = () => {};

export interface LatencyRecorderOptions {
  meter?: Meter;
  logger?: Logger<unknown>;
  /** Calls slower than this are logged at warn level. */
  warnAboveMs?: number;
}

export const DEFAULT_LATENCY_WARN_MS = 50;

/** Histogram buckets in milliseconds. */
export const LATENCY_BUCKETS_MS = [1, 5, 10, 25, 50, 100, 250, 500, 1000];

export function createLatencyRecorder(
  options: LatencyRecorderOptions = {},
): LatencyRecorder {
  const meter = options.meter ?? getMeter();
  const warnAboveMs = options.warnAboveMs ?? DEFAULT_LATENCY_WARN_MS;
  const histogram = meter.createHistogram("gateway.rpc.latency", {
    description: "Latency of node round trips by operation",
    unit: "ms",
    advice: { explicitBucketBoundaries: LATENCY_BUCKETS_MS },
  });

  return (operation, latencyMs) => {
    histogram.record(latencyMs, { operation });
    if (latencyMs > warnAboveMs) {
      options.logger?.warn(
        `${operation} took ${latencyMs.toFixed(1)}ms (target ${warnAboveMs}ms)`,
      );
    }
  };
}

/** Writes the Prometheus text exposition of every recorded metric. */
export type MetricsScrapeHandler = (req: IncomingMessage, res: ServerResponse) => void;

export interface MetricsRegistry {
  meter: Meter;
  scrape: MetricsScrapeHandler;
  shutdown(): Promise<void>;
}

/**
 * Meter provider owned by the gateway. Always readable through `scrape`;
 * extra readers (OTLP) receive the same metrics.
 */
export function createMetricsRegistry(
  options: { readers?: MetricReader[] } = {},
): MetricsRegistry {
  const exporter = new PrometheusExporter({ preventServerStart: true });
  const provider = new MeterProvider({ readers: [exporter, ...(options.readers ?? [])] });

  return {
    meter: provider.getMeter("kaspa-gateway"),
    scrape: (req, res) => exporter.getMetricsRequestHandler(req, res),
    shutdown: () => provider.shutdown(),
  };
}
