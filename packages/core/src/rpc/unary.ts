import { performance } from "node:perf_hooks";
import {
  ConnectionError,
  EmptyResponseError,
  ProtocolMismatchError,
  RemoteError,
  describeError,
  type GatewayError,
} from "../infra/errors.js";
import { noopLatencyRecorder, type LatencyRecorder } from "../infra/metrics.js";
import { err, ok, type Result } from "../infra/result.js";
import type { RpcChannel } from "./channel.js";
import { describePayload, remoteErrorOf } from "./codec.js";
import { defaultIdGenerator, type CorrelationIdGenerator } from "./correlation.js";
import {
  OPERATION_NAMES,
  type ResponseEnvelope,
  type ResponseFor,
  type ResponsePayload,
  type UnaryRequestPayload,
} from "./envelope.js";

export interface UnaryCallOptions {
  ids?: CorrelationIdGenerator;
  recordLatency?: LatencyRecorder;
  /** Invoked when the latency recorder itself throws. */
  onRecorderError?: (error: unknown) => void;
}

/**
 * Turns one logical request into one round trip on a dedicated stream:
 * open, send once, read the first reply, match its variant, close.
 * No retries, no shared state besides the channel handle.
 */
export class UnaryCallAdapter {
  private readonly ids: CorrelationIdGenerator;
  private readonly recordLatency: LatencyRecorder;
  private readonly onRecorderError: (error: unknown) => void;

  constructor(
    private readonly channel: RpcChannel,
    options: UnaryCallOptions = {},
  ) {
    this.ids = options.ids ?? defaultIdGenerator;
    this.recordLatency = options.recordLatency ?? noopLatencyRecorder;
    this.onRecorderError = options.onRecorderError ?? (() => {});
  }

  async call<P extends UnaryRequestPayload>(
    payload: P,
  ): Promise<Result<ResponseFor<P["kind"]>, GatewayError>> {
    const startedAt = performance.now();
    const result = await this.roundTrip(payload);
    this.report(OPERATION_NAMES[payload.kind], performance.now() - startedAt);
    if (!result.ok) return result;

    const reply = result.value.payload;
    if (!isKind<P["kind"]>(reply, payload.kind)) {
      return err(new ProtocolMismatchError(payload.kind, describePayload(reply)));
    }

    const remote = remoteErrorOf(reply);
    if (remote) {
      return err(new RemoteError(remote.message || "Node reported an error"));
    }
    return ok(reply);
  }

  private async roundTrip(
    payload: UnaryRequestPayload,
  ): Promise<Result<ResponseEnvelope, GatewayError>> {
    const opened = this.channel.openStream();
    if (!opened.ok) return opened;
    const stream = opened.value;

    try {
      const sent = await stream.send({ id: this.ids.next(), payload });
      if (!sent.ok) return sent;

      for await (const envelope of stream.messages) {
        return ok(envelope);
      }
      return err(new EmptyResponseError());
    } catch (error) {
      return err(
        error instanceof ConnectionError
          ? error
          : new ConnectionError(`Stream error: ${describeError(error)}`, error),
      );
    } finally {
      stream.close();
    }
  }

  private report(operation: string, latencyMs: number): void {
    try {
      this.recordLatency(operation, latencyMs);
    } catch (error) {
      this.onRecorderError(error);
    }
  }
}

function isKind<K extends ResponsePayload["kind"]>(
  payload: ResponsePayload,
  kind: K,
): payload is Extract<ResponsePayload, { kind: K }> {
  return payload.kind === kind;
}
