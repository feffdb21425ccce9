// Config
export {
  GatewayConfigSchema,
  GatewayAuthSchema,
  GatewayServerSchema,
  NodeSchema,
  LoggingSchema,
  ObservabilitySchema,
} from "./config/schema.js";
export type {
  GatewayConfig,
  GatewayAuth,
  GatewayServerConfig,
  LoggingConfig,
  NodeConfig,
  ObservabilityConfig,
} from "./config/types.js";
export { DEFAULT_CONFIG, DEFAULT_CONFIG_PATH } from "./config/defaults.js";
export { resolveSecret } from "./config/secrets.js";
export { validateConfig, ConfigValidationError } from "./config/validation.js";
export { loadConfig, applyEnvOverrides, parsePortOption } from "./config/loader.js";

// Infrastructure
export { createLogger, redactSensitive } from "./infra/logger.js";
export type { LogLevel, LogFormat } from "./infra/logger.js";
export {
  AppError,
  ConfigError,
  AuthError,
  ValidationError,
  NotFoundError,
  PayloadTooLargeError,
  DecodeError,
  ConnectionError,
  EmptyResponseError,
  ProtocolMismatchError,
  RemoteError,
  InvalidArgumentError,
  isGatewayError,
  describeError,
} from "./infra/errors.js";
export type { GatewayError } from "./infra/errors.js";
export { ok, err } from "./infra/result.js";
export type { Result } from "./infra/result.js";
export {
  createLatencyRecorder,
  createMetricsRegistry,
  noopLatencyRecorder,
} from "./infra/metrics.js";
export type { LatencyRecorder, MetricsRegistry, MetricsScrapeHandler } from "./infra/metrics.js";
export { createOtlpMetricReader, initTelemetry, getMeter } from "./infra/telemetry.js";
export type { TelemetryHandle } from "./infra/telemetry.js";

// Node RPC
export { CounterIdGenerator, defaultIdGenerator } from "./rpc/correlation.js";
export type { CorrelationIdGenerator } from "./rpc/correlation.js";
export type { RpcChannel, RpcStream } from "./rpc/channel.js";
export { GrpcChannel, resolveTarget } from "./rpc/grpc-channel.js";
export type { GrpcChannelOptions } from "./rpc/grpc-channel.js";
export { encodeRequest, decodeResponse } from "./rpc/codec.js";
export { OPERATION_NAMES } from "./rpc/envelope.js";
export type {
  RequestEnvelope,
  RequestPayload,
  ResponseEnvelope,
  ResponsePayload,
  ResponseFor,
} from "./rpc/envelope.js";
export { UnaryCallAdapter } from "./rpc/unary.js";
export type { UnaryCallOptions } from "./rpc/unary.js";
export { SubscriptionRelay, validateAddresses } from "./rpc/subscription.js";
export type {
  NotificationSource,
  RelayState,
  UtxosChangedNotification,
} from "./rpc/subscription.js";

// Gateway
export { createGateway } from "./gateway/server.js";
export type { GatewayInstance, GatewayOptions } from "./gateway/server.js";
export { createGatewayHttpServer } from "./gateway/server-http.js";
export { createGatewayWsServer, forwardFrame, parseAddressList } from "./gateway/server-ws.js";
export type { GatewayWsServer, UtxoSubscriber } from "./gateway/server-ws.js";
export { createRpcRoutes } from "./gateway/server-methods/rpc.js";
export type { RouteHandler, UnaryCaller } from "./gateway/server-methods/rpc.js";
export { authorizeRequest, extractBearerToken } from "./gateway/auth.js";
export type { AuthConfig, AuthMode, AuthResult } from "./gateway/auth.js";
export { parseBindAddress } from "./gateway/net.js";
export type * from "./gateway/protocol/types.js";
