import { STATUS_CODES, type IncomingMessage, type Server as HttpServer } from "node:http";
import type { Duplex } from "node:stream";
import type { Logger } from "tslog";
import { WebSocketServer, type WebSocket } from "ws";
import { describeError, type GatewayError } from "../infra/errors.js";
import type { Result } from "../infra/result.js";
import type { NotificationSource } from "../rpc/subscription.js";
import { authorizeRequest, extractToken, type AuthConfig } from "./auth.js";
import { toUtxoChangedFrame } from "./protocol/convert.js";
import { serializeFrame } from "./protocol/frames.js";
import type { GatewayFrame } from "./protocol/types.js";

/**
 * WebSocket relay of UTXO change notifications. Each socket owns exactly
 * one subscription; closing either side tears down the other.
 */

export const SUBSCRIBE_UTXO_PATH = "/ws/subscribeUTXO";

export const DEFAULT_MAX_BUFFERED_BYTES = 4 * 1024 * 1024;

/** The slice of `SubscriptionRelay` the socket handler depends on. */
export interface UtxoSubscriber {
  subscribe(addresses: readonly string[]): Promise<Result<NotificationSource, GatewayError>>;
}

export interface WsServerOptions {
  server: HttpServer;
  relay: UtxoSubscriber;
  authConfig: AuthConfig;
  logger: Logger<unknown>;
  /** Queued bytes past which a client that stopped reading is dropped. */
  maxBufferedBytes?: number;
}

export interface GatewayWsServer {
  wss: WebSocketServer;
  close(): void;
  clientCount(): number;
}

/**
 * Split the `addresses` query value on commas, trimming entries and
 * dropping blanks and repeats. Order of first appearance is kept.
 */
export function parseAddressList(raw: string | null): string[] {
  if (!raw) return [];
  const addresses = raw
    .split(",")
    .map((address) => address.trim())
    .filter((address) => address !== "");
  return [...new Set(addresses)];
}

let nextClientId = 0;

export function createGatewayWsServer(options: WsServerOptions): GatewayWsServer {
  const { server, relay, authConfig, logger } = options;
  const maxBufferedBytes = options.maxBufferedBytes ?? DEFAULT_MAX_BUFFERED_BYTES;

  const wss = new WebSocketServer({ noServer: true });
  const clients = new Map<string, WebSocket>();

  server.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const url = new URL(req.url ?? "/", "http://localhost");

    if (url.pathname !== SUBSCRIBE_UTXO_PATH) {
      rejectUpgrade(socket, 404, `No WebSocket endpoint at ${url.pathname}`);
      return;
    }

    const auth = authorizeRequest({ config: authConfig, token: extractToken(req, true) });
    if (!auth.ok) {
      logger.warn(`WebSocket auth rejected: ${auth.reason}`);
      rejectUpgrade(socket, 401, auth.reason);
      return;
    }

    const addresses = parseAddressList(url.searchParams.get("addresses"));
    if (addresses.length === 0) {
      rejectUpgrade(socket, 400, "No addresses provided");
      return;
    }

    wss.handleUpgrade(req, socket, head, (ws) => {
      const clientId = `client-${++nextClientId}`;
      relaySubscription(clientId, ws, addresses).catch((error: unknown) => {
        logger.error(`Subscription ${clientId} failed unexpectedly:`, error);
        ws.close(1011, "Internal error");
      });
    });
  });

  async function relaySubscription(
    clientId: string,
    ws: WebSocket,
    addresses: string[],
  ): Promise<void> {
    let source: NotificationSource | null = null;
    clients.set(clientId, ws);
    logger.info(`Client connected: ${clientId} (${addresses.length} addresses)`);

    ws.on("close", () => {
      clients.delete(clientId);
      source?.close();
      logger.info(`Client disconnected: ${clientId}`);
    });

    ws.on("error", (err) => {
      logger.error(`WebSocket error for ${clientId}:`, err);
    });

    const subscribed = await relay.subscribe(addresses);
    if (!subscribed.ok) {
      logger.warn(`Subscribe failed for ${clientId}: ${subscribed.error.message}`);
      send(ws, { error: `Failed to subscribe: ${subscribed.error.message}` });
      ws.close(1011, "Subscribe failed");
      return;
    }

    source = subscribed.value;
    if (ws.readyState !== ws.OPEN) {
      // Client left while the subscribe command was in flight
      source.close();
      return;
    }

    send(ws, { status: "subscribed", addresses });

    try {
      for await (const notification of source) {
        const outcome = forwardFrame(ws, toUtxoChangedFrame(notification), maxBufferedBytes);
        if (outcome === "slow") {
          logger.warn(`Dropped slow client ${clientId}: ${ws.bufferedAmount} bytes queued`);
        }
        if (outcome !== "sent") break;
      }
    } catch (error) {
      const message = streamErrorMessage(error);
      logger.error(`${message} (${clientId})`);
      send(ws, { error: message });
    } finally {
      source.close();
      if (ws.readyState === ws.OPEN) ws.close(1000, "Subscription ended");
    }
  }

  function close(): void {
    for (const ws of clients.values()) {
      ws.close(1001, "Server shutting down");
    }
    clients.clear();
    wss.close();
  }

  function clientCount(): number {
    return clients.size;
  }

  return { wss, close, clientCount };
}

export type FrameSocket = Pick<
  WebSocket,
  "readyState" | "OPEN" | "bufferedAmount" | "send" | "close"
>;

export type ForwardOutcome = "sent" | "closed" | "slow";

/**
 * Send a frame unless the client has more than `maxBufferedBytes` still
 * queued, in which case the socket is closed with 1013.
 */
export function forwardFrame(
  ws: FrameSocket,
  frame: GatewayFrame,
  maxBufferedBytes: number,
): ForwardOutcome {
  if (ws.readyState !== ws.OPEN) return "closed";
  if (ws.bufferedAmount > maxBufferedBytes) {
    ws.close(1013, "Client too slow");
    return "slow";
  }
  ws.send(serializeFrame(frame));
  return "sent";
}

function send(ws: WebSocket, frame: GatewayFrame): void {
  if (ws.readyState === ws.OPEN) ws.send(serializeFrame(frame));
}

function streamErrorMessage(error: unknown): string {
  const message = describeError(error);
  return message.startsWith("Stream error:") ? message : `Stream error: ${message}`;
}

function rejectUpgrade(socket: Duplex, status: number, reason: string): void {
  const body = JSON.stringify({ error: reason });
  const headers = [
    `HTTP/1.1 ${status} ${STATUS_CODES[status] ?? "Error"}`,
    "Content-Type: application/json",
    `Content-Length: ${Buffer.byteLength(body)}`,
    "Connection: close",
  ];
  socket.once("finish", () => socket.destroy());
  socket.end(headers.join("\r\n") + "\r\n\r\n" + body);
}
