#!/usr/bin/env node

import "dotenv/config";
import { Command } from "commander";

const program = new Command();

program
  .name("kaspa-gateway")
  .description("HTTP and WebSocket gateway for a Kaspa node's gRPC interface")
  .version("0.1.0");

// --- kaspa-gateway start ---
program
  .command("start")
  .description("Connect to the node and start the gateway server")
  .option("-c, --config <path>", "Path to config file")
  .option("-p, --port <number>", "Override gateway port")
  .option("--node <url>", "Override the node's gRPC address")
  .action(async (options: { config?: string; port?: string; node?: string }) => {
    const { loadConfig, parsePortOption } = await import("./config/loader.js");
    const { createGateway } = await import("./gateway/server.js");
    const { createLogger } = await import("./infra/logger.js");
    const { createOtlpMetricReader, initTelemetry } = await import("./infra/telemetry.js");
    const { createLatencyRecorder, createMetricsRegistry } = await import("./infra/metrics.js");
    const { GrpcChannel } = await import("./rpc/grpc-channel.js");
    const { UnaryCallAdapter } = await import("./rpc/unary.js");
    const { SubscriptionRelay } = await import("./rpc/subscription.js");

    let log = createLogger("kaspa-gateway");

    try {
      const config = await loadConfig(options.config);

      // CLI flags win over file and environment
      if (options.port) {
        config.gateway.port = parsePortOption(options.port);
      }
      if (options.node) {
        config.node.rpcUrl = options.node;
      }

      log = createLogger("kaspa-gateway", {
        level: config.logging.level,
        format: config.logging.format,
        redact: config.logging.redactSecrets,
      });

      const telemetry = await initTelemetry(config.observability);
      const otlpReader = await createOtlpMetricReader(config.observability);
      const metrics = createMetricsRegistry({ readers: otlpReader ? [otlpReader] : [] });

      log.info(`Connecting to node at ${config.node.rpcUrl}`);
      const connected = await GrpcChannel.connect({
        url: config.node.rpcUrl,
        connectTimeoutMs: config.node.connectTimeoutMs,
      });
      if (!connected.ok) {
        log.fatal(connected.error.message);
        await metrics.shutdown();
        await telemetry.shutdown();
        process.exit(1);
      }
      const channel = connected.value;
      log.info(`Connected to node at ${channel.target}`);

      const recordLatency = createLatencyRecorder({
        meter: metrics.meter,
        logger: log,
        warnAboveMs: config.observability.latencyWarnMs,
      });
      const onRecorderError = (error: unknown) => log.warn("Latency recorder failed:", error);
      const adapter = new UnaryCallAdapter(channel, { recordLatency, onRecorderError });
      const relay = new SubscriptionRelay(channel, { recordLatency, onRecorderError });

      const gateway = createGateway({
        config,
        adapter,
        relay,
        logger: log,
        metrics: metrics.scrape,
      });
      await gateway.listen();

      // Graceful shutdown
      const shutdown = async () => {
        log.info("Shutting down...");
        await gateway.close();
        channel.close();
        await metrics.shutdown();
        await telemetry.shutdown();
        process.exit(0);
      };

      const onSignal = () => {
        shutdown().catch((error: unknown) => {
          log.error("Shutdown failed:", error);
          process.exit(1);
        });
      };
      process.once("SIGINT", onSignal);
      process.once("SIGTERM", onSignal);
    } catch (err) {
      log.error(`Failed to start: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  });

// --- kaspa-gateway check ---
program
  .command("check")
  .description("Connect to the node and print its DAG summary")
  .option("-c, --config <path>", "Path to config file")
  .action(async (options: { config?: string }) => {
    const { loadConfig } = await import("./config/loader.js");
    const { GrpcChannel } = await import("./rpc/grpc-channel.js");
    const { UnaryCallAdapter } = await import("./rpc/unary.js");

    const config = await loadConfig(options.config);
    const connected = await GrpcChannel.connect({
      url: config.node.rpcUrl,
      connectTimeoutMs: config.node.connectTimeoutMs,
    });
    if (!connected.ok) {
      console.error(connected.error.message);
      process.exit(1);
    }

    const channel = connected.value;
    const reply = await new UnaryCallAdapter(channel).call({ kind: "getBlockDagInfo" });
    channel.close();
    if (!reply.ok) {
      console.error(`${reply.error.code}: ${reply.error.message}`);
      process.exit(1);
    }

    const info = reply.value.message;
    console.log(`Node:          ${channel.target}`);
    console.log(`Network:       ${info.networkName}`);
    console.log(`Blocks:        ${info.blockCount}`);
    console.log(`Tips:          ${info.tipHashes.length}`);
    console.log(`Virtual DAA:   ${info.virtualDaaScore}`);
  });

// --- kaspa-gateway config show ---
program
  .command("config")
  .command("show")
  .description("Display current config (secrets redacted)")
  .option("-c, --config <path>", "Path to config file")
  .action(async (options: { config?: string }) => {
    const { loadConfig } = await import("./config/loader.js");
    const { redactSensitive } = await import("./infra/logger.js");

    const config = await loadConfig(options.config);
    console.log(JSON.stringify(redactSensitive(config), null, 2));
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
