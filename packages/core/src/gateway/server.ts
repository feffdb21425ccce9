import type { Server as HttpServer } from "node:http";
import type { Logger } from "tslog";
import type { GatewayConfig } from "../config/types.js";
import { createLogger } from "../infra/logger.js";
import type { MetricsScrapeHandler } from "../infra/metrics.js";
import type { AuthConfig } from "./auth.js";
import { formatHostPort } from "./net.js";
import { createGatewayHttpServer } from "./server-http.js";
import { createRpcRoutes, type UnaryCaller } from "./server-methods/rpc.js";
import {
  createGatewayWsServer,
  type GatewayWsServer,
  type UtxoSubscriber,
} from "./server-ws.js";

/**
 * Gateway bootstrap: ties together the HTTP routes, the WebSocket relay
 * and auth in front of one node connection.
 */

export interface GatewayInstance {
  httpServer: HttpServer;
  wsServer: GatewayWsServer;
  logger: Logger<unknown>;
  /** Resolves with the bound port once the server is listening. */
  listen(): Promise<number>;
  close(): Promise<void>;
}

export interface GatewayOptions {
  config: GatewayConfig;
  adapter: UnaryCaller;
  relay: UtxoSubscriber;
  logger?: Logger<unknown>;
  metrics?: MetricsScrapeHandler;
}

export function createGateway(options: GatewayOptions): GatewayInstance {
  const { config, adapter, relay } = options;
  const gwConfig = config.gateway;

  const logger =
    options.logger ??
    createLogger("gateway", {
      level: config.logging.level,
      format: config.logging.format,
      redact: config.logging.redactSecrets,
    });

  const authConfig: AuthConfig = {
    mode: gwConfig.auth.mode,
    token: gwConfig.auth.token,
  };

  const httpServer = createGatewayHttpServer({
    routes: createRpcRoutes(adapter),
    authConfig,
    logger,
    maxBodyBytes: gwConfig.maxBodyBytes,
    metrics: options.metrics,
  });

  const wsServer = createGatewayWsServer({
    server: httpServer,
    relay,
    authConfig,
    logger,
    maxBufferedBytes: gwConfig.maxWsBufferedBytes,
  });

  async function listen(): Promise<number> {
    return new Promise<number>((resolve, reject) => {
      httpServer.once("error", reject);
      httpServer.listen(gwConfig.port, gwConfig.host, () => {
        httpServer.off("error", reject);
        const address = httpServer.address();
        const port = typeof address === "object" && address !== null ? address.port : gwConfig.port;
        logger.info(`Gateway listening on http://${formatHostPort(gwConfig.host, port)}`);
        resolve(port);
      });
    });
  }

  async function close(): Promise<void> {
    wsServer.close();
    return new Promise<void>((resolve, reject) => {
      httpServer.close((err) => {
        if (err) reject(err);
        else resolve();
      });
      httpServer.closeIdleConnections();
    });
  }

  return { httpServer, wsServer, logger, listen, close };
}
