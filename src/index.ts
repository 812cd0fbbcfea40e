#!/usr/bin/env node
import dotenv from "dotenv";
import { Server } from "http";
import { createApp } from "./app";
import { createMonitor } from "./bootstrap";
import { loadConfig } from "./config";
import { ConfigValidator } from "./services/config-validator";
import { logger } from "./utils/logger";
import { errorMessage } from "./utils/monitor-error";
import { APP_NAME, APP_VERSION } from "./version";

// Load environment variables from .env
dotenv.config();

async function main(): Promise<void> {
  const validation = ConfigValidator.validate(process.env);
  for (const warning of validation.warnings) {
    logger.warn(warning);
  }
  if (!validation.valid) {
    logger.error("Configuration validation failed:");
    for (const error of validation.errors) {
      logger.error(`  - ${error}`);
    }
    process.exit(1);
  }

  const config = loadConfig(process.env);
  logger.configure({ logFile: config.logFile, verbose: config.verbose });
  logger.info(`${APP_NAME} v${APP_VERSION} starting on ${config.serverName}`);

  const monitor = createMonitor(config);
  logger.info(
    `Notification channels: ${monitor.dispatcher.channelNames.join(", ")}`
  );

  let server: Server | null = null;
  if (config.statusPort !== null) {
    const app = createApp({
      getStatus: () => monitor.service.getStatus(),
      loadState: () => monitor.store.loadState(),
    });
    const port = config.statusPort;
    server = app.listen(port, () => {
      logger.info(`Status API listening on port ${port}`);
      logger.info(`- GET http://localhost:${port}/health`);
      logger.info(`- GET http://localhost:${port}/api/status`);
    });
  }

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    monitor.service.stop();
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));

  await monitor.service.start();

  try {
    await monitor.close();
    server?.close();
  } catch (error) {
    logger.error(`Error during shutdown: ${errorMessage(error)}`);
  }
  process.exit(0);
}

main().catch((error: unknown) => {
  logger.error(`Fatal error: ${errorMessage(error)}`);
  process.exit(1);
});
