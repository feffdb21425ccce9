import type { ConnectionError } from "../infra/errors.js";
import type { Result } from "../infra/result.js";
import type { RequestEnvelope, ResponseEnvelope } from "./envelope.js";

/**
 * One bidirectional exchange with the node. A stream belongs to whoever
 * opened it and never outlives the call or subscription it serves.
 */
export interface RpcStream {
  /**
   * Replies in arrival order. Completes when the node ends the stream or
   * after `close()`; throws `ConnectionError` on a transport failure.
   */
  readonly messages: AsyncIterable<ResponseEnvelope>;

  send(envelope: RequestEnvelope): Promise<Result<void, ConnectionError>>;

  /** Release the stream. Idempotent; pending reads complete without error. */
  close(reason?: string): void;

  /** Aborted once the stream is closed from either side. */
  readonly closed: AbortSignal;
}

/**
 * Shared handle to the node. Read-only after construction; safe to use from
 * any number of concurrent calls.
 */
export interface RpcChannel {
  openStream(): Result<RpcStream, ConnectionError>;
  close(): void;
}
