import { performance } from "node:perf_hooks";
import {
  ConnectionError,
  InvalidArgumentError,
  RemoteError,
  describeError,
  isGatewayError,
  type GatewayError,
} from "../infra/errors.js";
import { noopLatencyRecorder, type LatencyRecorder } from "../infra/metrics.js";
import { err, ok, type Result } from "../infra/result.js";
import type { RpcChannel, RpcStream } from "./channel.js";
import { defaultIdGenerator, type CorrelationIdGenerator } from "./correlation.js";
import { OPERATION_NAMES } from "./envelope.js";
import type { UtxosChangedNotificationMessage } from "./wire.js";

export type UtxosChangedNotification = UtxosChangedNotificationMessage;

export type RelayState = "idle" | "opening" | "active" | "closed";

/**
 * Pull-based feed of UTXO change notifications for one subscription.
 * Iterable once. Ends when the node ends the stream, throws a
 * `GatewayError` when it fails, and stops reading as soon as `close()` is
 * called or the consumer breaks out of its loop.
 */
export interface NotificationSource extends AsyncIterable<UtxosChangedNotification> {
  readonly addresses: readonly string[];
  readonly state: RelayState;
  close(): void;
}

export interface SubscriptionRelayOptions {
  ids?: CorrelationIdGenerator;
  recordLatency?: LatencyRecorder;
  /** Invoked when the latency recorder itself throws. */
  onRecorderError?: (error: unknown) => void;
}

/**
 * Check a subscription address list: at least one entry, no blank entries,
 * no duplicates. Order is kept as given.
 */
export function validateAddresses(
  addresses: readonly string[],
): InvalidArgumentError | null {
  if (addresses.length === 0) {
    return new InvalidArgumentError("No addresses provided");
  }
  const seen = new Set<string>();
  for (const address of addresses) {
    if (address.trim() === "") {
      return new InvalidArgumentError("Addresses must not be blank");
    }
    if (seen.has(address)) {
      return new InvalidArgumentError(`Duplicate address: ${address}`);
    }
    seen.add(address);
  }
  return null;
}

export class SubscriptionRelay {
  private readonly ids: CorrelationIdGenerator;
  private readonly recordLatency: LatencyRecorder;
  private readonly onRecorderError: (error: unknown) => void;

  constructor(
    private readonly channel: RpcChannel,
    options: SubscriptionRelayOptions = {},
  ) {
    this.ids = options.ids ?? defaultIdGenerator;
    this.recordLatency = options.recordLatency ?? noopLatencyRecorder;
    this.onRecorderError = options.onRecorderError ?? (() => {});
  }

  /**
   * Open a stream and send the subscribe command. Resolves once the command
   * is written; notifications are read only when the source is iterated.
   */
  async subscribe(
    addresses: readonly string[],
  ): Promise<Result<NotificationSource, GatewayError>> {
    const invalid = validateAddresses(addresses);
    if (invalid) return err(invalid);

    const startedAt = performance.now();
    const subscription = new UtxoSubscription([...addresses]);
    const opened = await subscription.open(this.channel, this.ids);
    this.report(OPERATION_NAMES.notifyUtxosChanged, performance.now() - startedAt);
    if (!opened.ok) return opened;
    return ok(subscription);
  }

  private report(operation: string, latencyMs: number): void {
    try {
      this.recordLatency(operation, latencyMs);
    } catch (error) {
      this.onRecorderError(error);
    }
  }
}

class UtxoSubscription implements NotificationSource {
  private current: RelayState = "idle";
  private stream: RpcStream | null = null;
  private iterated = false;

  constructor(readonly addresses: readonly string[]) {}

  get state(): RelayState {
    return this.current;
  }

  async open(
    channel: RpcChannel,
    ids: CorrelationIdGenerator,
  ): Promise<Result<void, ConnectionError>> {
    this.current = "opening";
    const opened = channel.openStream();
    if (!opened.ok) {
      this.current = "closed";
      return opened;
    }
    this.stream = opened.value;

    const sent = await this.stream.send({
      id: ids.next(),
      payload: { kind: "notifyUtxosChanged", addresses: [...this.addresses] },
    });
    if (!sent.ok) {
      this.close();
      return sent;
    }
    // close() may have raced the send
    if (!this.isClosed()) this.current = "active";
    return ok(undefined);
  }

  private isClosed(): boolean {
    return this.current === "closed";
  }

  close(): void {
    if (this.current === "closed") return;
    this.current = "closed";
    this.stream?.close("subscription closed");
  }

  [Symbol.asyncIterator](): AsyncIterator<UtxosChangedNotification> {
    if (this.iterated) {
      throw new Error("Notification source can only be iterated once");
    }
    this.iterated = true;
    return this.relay();
  }

  private async *relay(): AsyncGenerator<UtxosChangedNotification> {
    const stream = this.stream;
    if (!stream || this.current !== "active") return;

    try {
      for await (const envelope of stream.messages) {
        if (this.isClosed()) return;
        const { payload } = envelope;
        if (payload.kind === "utxosChanged") {
          yield payload.message;
        } else if (payload.kind === "notifyUtxosChanged" && payload.message.error) {
          throw new RemoteError(
            payload.message.error.message || "Subscription rejected by node",
          );
        }
        // Any other variant is unrelated traffic on this stream
      }
    } catch (error) {
      if (this.isClosed()) return;
      throw isGatewayError(error)
        ? error
        : new ConnectionError(`Stream error: ${describeError(error)}`, error);
    } finally {
      this.close();
    }
  }
}
