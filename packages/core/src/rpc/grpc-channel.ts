import { fileURLToPath } from "node:url";
import * as grpc from "@grpc/grpc-js";
import * as protoLoader from "@grpc/proto-loader";
import { ConnectionError, describeError } from "../infra/errors.js";
import { err, ok, type Result } from "../infra/result.js";
import type { RpcChannel, RpcStream } from "./channel.js";
import { decodeResponse, encodeRequest } from "./codec.js";
import type { RequestEnvelope, ResponseEnvelope } from "./envelope.js";

/**
 * RPC channel over the node's gRPC `protowire.RPC/MessageStream` service.
 * Every stream is its own HTTP/2 call on one shared connection.
 */

export const DEFAULT_PROTO_DIR = fileURLToPath(new URL("../../proto/", import.meta.url));

const SERVICE_NAME = "protowire.RPC";
const METHOD_NAME = "MessageStream";
const MAX_MESSAGE_BYTES = 64 * 1024 * 1024;

export const PROTO_LOADER_OPTIONS: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

type StreamMethod = protoLoader.MethodDefinition<object, object>;

export interface GrpcChannelOptions {
  /** `host:port`, or with an `http://` / `https://` scheme. */
  url: string;
  connectTimeoutMs?: number;
  protoDir?: string;
}

export function resolveTarget(url: string): { target: string; secure: boolean } {
  const trimmed = url.trim();
  const match = /^(https?):\/\/([^/]+)\/?$/i.exec(trimmed);
  if (!match) return { target: trimmed, secure: false };
  const [, scheme = "http", authority = ""] = match;
  return { target: authority, secure: scheme.toLowerCase() === "https" };
}

/**
 * Load the protowire schema and return the streaming method definition.
 */
export function loadStreamMethod(protoDir: string = DEFAULT_PROTO_DIR): StreamMethod {
  const definition = protoLoader.loadSync("rpc.proto", {
    ...PROTO_LOADER_OPTIONS,
    includeDirs: [protoDir],
  });
  const service: unknown = definition[SERVICE_NAME];
  const method: unknown =
    typeof service === "object" && service !== null
      ? Reflect.get(service, METHOD_NAME)
      : undefined;
  if (!isStreamMethod(method)) {
    throw new Error(`${SERVICE_NAME}/${METHOD_NAME} not found in ${protoDir}`);
  }
  return method;
}

function isStreamMethod(value: unknown): value is StreamMethod {
  return (
    typeof value === "object" &&
    value !== null &&
    "path" in value &&
    "requestSerialize" in value &&
    "responseDeserialize" in value
  );
}

export class GrpcChannel implements RpcChannel {
  private constructor(
    private readonly client: grpc.Client,
    private readonly method: StreamMethod,
    readonly target: string,
  ) {}

  /**
   * Connect once and wait for the transport to become ready. A node that is
   * unreachable within the timeout yields a `ConnectionError`; there is no
   * reconnect loop beyond what grpc-js does for an established channel.
   */
  static async connect(
    options: GrpcChannelOptions,
  ): Promise<Result<GrpcChannel, ConnectionError>> {
    const { target, secure } = resolveTarget(options.url);
    let client: grpc.Client;
    let method: StreamMethod;
    try {
      method = loadStreamMethod(options.protoDir);
      client = new grpc.Client(
        target,
        secure ? grpc.credentials.createSsl() : grpc.credentials.createInsecure(),
        {
          "grpc.max_receive_message_length": MAX_MESSAGE_BYTES,
          "grpc.max_send_message_length": MAX_MESSAGE_BYTES,
        },
      );
    } catch (error) {
      return err(
        new ConnectionError(`Failed to create channel to ${target}: ${describeError(error)}`, error),
      );
    }

    const deadline = Date.now() + (options.connectTimeoutMs ?? 10_000);
    const ready = await new Promise<Error | undefined>((resolve) => {
      client.waitForReady(deadline, (error?: Error) => resolve(error));
    });
    if (ready) {
      client.close();
      return err(
        new ConnectionError(`Failed to connect to ${target}: ${ready.message}`, ready),
      );
    }

    return ok(new GrpcChannel(client, method, target));
  }

  openStream(): Result<RpcStream, ConnectionError> {
    try {
      const call = this.client.makeBidiStreamRequest(
        this.method.path,
        this.method.requestSerialize,
        this.method.responseDeserialize,
      );
      return ok(new GrpcStream(call));
    } catch (error) {
      return err(new ConnectionError(`Failed to open stream: ${describeError(error)}`, error));
    }
  }

  close(): void {
    this.client.close();
  }
}

class GrpcStream implements RpcStream {
  private readonly controller = new AbortController();
  private closing = false;

  constructor(private readonly call: grpc.ClientDuplexStream<object, object>) {
    // Non-OK statuses arrive as "error"; read() rethrows them
    call.on("error", () => this.controller.abort());
    call.on("status", () => this.controller.abort());
  }

  get closed(): AbortSignal {
    return this.controller.signal;
  }

  get messages(): AsyncIterable<ResponseEnvelope> {
    return this.read();
  }

  send(envelope: RequestEnvelope): Promise<Result<void, ConnectionError>> {
    if (this.controller.signal.aborted) {
      return Promise.resolve(err(new ConnectionError("Stream is closed")));
    }
    return new Promise((resolve) => {
      this.call.write(encodeRequest(envelope), (error?: Error | null) => {
        resolve(
          error
            ? err(new ConnectionError(`Failed to send request: ${error.message}`, error))
            : ok(undefined),
        );
      });
    });
  }

  close(reason?: string): void {
    if (this.closing) return;
    this.closing = true;
    this.controller.abort(reason);
    this.call.cancel();
  }

  private async *read(): AsyncGenerator<ResponseEnvelope> {
    try {
      for await (const raw of this.call) {
        if (this.closing) return;
        yield decodeResponse(raw);
      }
    } catch (error) {
      if (this.closing) return;
      throw new ConnectionError(`Stream error: ${describeError(error)}`, error);
    }
  }
}
