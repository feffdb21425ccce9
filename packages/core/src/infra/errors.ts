export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "AppError";
  }
}

export class ConfigError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", 500, cause);
    this.name = "ConfigError";
  }
}

export class AuthError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "AUTH_ERROR", 401, cause);
    this.name = "AuthError";
  }
}

export class ValidationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "VALIDATION_ERROR", 400, cause);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "NOT_FOUND", 404, cause);
    this.name = "NotFoundError";
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(message: string = "Request body too large", cause?: unknown) {
    super(message, "PAYLOAD_TOO_LARGE", 413, cause);
    this.name = "PayloadTooLargeError";
  }
}

/**
 * A reply matched the expected variant but lacks data the JSON layer
 * needs (e.g. a block without a header).
 */
export class DecodeError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "DECODE_ERROR", 500, cause);
    this.name = "DecodeError";
  }
}

// --- RPC relay failures ---

/** Opening, writing to or reading from a node stream failed. */
export class ConnectionError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONNECTION_ERROR", 502, cause);
    this.name = "ConnectionError";
  }
}

/** The node closed the stream before sending a reply. */
export class EmptyResponseError extends AppError {
  constructor(message: string = "Empty response stream", cause?: unknown) {
    super(message, "EMPTY_RESPONSE", 503, cause);
    this.name = "EmptyResponseError";
  }
}

/** The reply variant does not belong to the request that was sent. */
export class ProtocolMismatchError extends AppError {
  constructor(
    public readonly expected: string,
    public readonly received: string,
  ) {
    super(
      `Expected ${expected} response, received ${received}`,
      "PROTOCOL_MISMATCH",
      500,
    );
    this.name = "ProtocolMismatchError";
  }
}

/** The node answered with its own error field set. Never retried. */
export class RemoteError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "REMOTE_ERROR", 422, cause);
    this.name = "RemoteError";
  }
}

/** Caller input failed a local precondition before anything was sent. */
export class InvalidArgumentError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "INVALID_ARGUMENT", 400, cause);
    this.name = "InvalidArgumentError";
  }
}

export type GatewayError =
  | ConnectionError
  | EmptyResponseError
  | ProtocolMismatchError
  | RemoteError
  | InvalidArgumentError;

export function isGatewayError(err: unknown): err is GatewayError {
  return (
    err instanceof ConnectionError ||
    err instanceof EmptyResponseError ||
    err instanceof ProtocolMismatchError ||
    err instanceof RemoteError ||
    err instanceof InvalidArgumentError
  );
}

/**
 * Readable message for any thrown value.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
