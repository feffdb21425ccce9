import type { z } from "zod";
import type {
  GatewayAuthSchema,
  GatewayConfigSchema,
  GatewayServerSchema,
  LoggingSchema,
  NodeSchema,
  ObservabilitySchema,
} from "./schema.js";

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;
export type NodeConfig = z.infer<typeof NodeSchema>;
export type GatewayServerConfig = z.infer<typeof GatewayServerSchema>;
export type GatewayAuth = z.infer<typeof GatewayAuthSchema>;
export type LoggingConfig = z.infer<typeof LoggingSchema>;
export type ObservabilityConfig = z.infer<typeof ObservabilitySchema>;
