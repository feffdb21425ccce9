import type { z } from "zod";
import { AppError, ValidationError } from "../../infra/errors.js";
import { err, ok, type Result } from "../../infra/result.js";
import type { ErrorBody, GatewayFrame, RpcResponse } from "./types.js";

/**
 * Parse a request body. An empty body is treated as `{}` so parameterless
 * routes accept a bare POST.
 */
export function parseJsonBody(raw: string): Result<unknown, ValidationError> {
  if (raw.trim() === "") return ok({});
  try {
    const parsed: unknown = JSON.parse(raw);
    return ok(parsed);
  } catch {
    return err(new ValidationError("Invalid JSON"));
  }
}

/**
 * Validate parsed JSON against a route's request schema.
 */
export function parseParams<S extends z.ZodTypeAny>(
  schema: S,
  body: unknown,
): Result<z.output<S>, ValidationError> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues.map((i) =>
      i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message,
    );
    return err(new ValidationError(`Invalid request: ${issues.join(", ")}`, result.error));
  }
  return ok(result.data);
}

/**
 * Build a success envelope. Latency is rounded to microseconds.
 */
export function buildRpcResponse<T>(data: T, latencyMs: number): RpcResponse<T> {
  return {
    success: true,
    data,
    error: null,
    latency_ms: Math.round(latencyMs * 1000) / 1000,
  };
}

export function buildErrorBody(error: AppError): ErrorBody {
  return { error: error.message, code: error.statusCode, kind: error.code };
}

/**
 * Map anything thrown past a handler to an `AppError`. Unexpected values
 * become an opaque 500.
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error;
  return new AppError("Internal server error", "INTERNAL_ERROR", 500, error);
}

export function serializeFrame(frame: GatewayFrame): string {
  return JSON.stringify(frame);
}
