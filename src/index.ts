/**
 * Delivery robot core
 *
 * Entry point: validates the environment, starts the control loop against the
 * simulated robot and serves the order, button and status API.
 */

import { loadConfig } from "./lib/config";
import { getEnv } from "./lib/env";
import { createLogger, toError } from "./lib/logger";
import { startHttpServer } from "./server";
import { startWorker } from "./worker";

const main = async (): Promise<void> => {
  // 1. Validate environment configuration (exits on invalid input)
  const env = getEnv();
  const config = loadConfig(env);

  const logger = createLogger({ level: config.logging.level, format: config.logging.format });
  logger.info("Delivery robot starting...", {
    startState: config.controlLoop.startState,
    pickupLocation: config.delivery.pickupLocation,
    tickIntervalMs: config.controlLoop.tickIntervalMs,
  });

  try {
    // 2. Start worker (state machine and control loop)
    const worker = await startWorker({ config, logger });
    logger.info("Worker started");

    // 3. Start HTTP server (orders, buttons, status, health, metrics)
    const httpServer = await startHttpServer({
      port: config.server.port,
      logger: logger.child("http"),
      machine: worker.machine,
      controller: worker.controller,
      orders: worker.orders,
      status: worker.status,
      buttons: worker.buttons,
      staleAfterMs: config.controlLoop.staleAfterMs,
    });

    // 4. Setup graceful shutdown
    const shutdown = async (signal: string): Promise<void> => {
      logger.info(`Received ${signal}, shutting down`);
      await worker.shutdown();
      await httpServer.close();
      logger.info("Graceful shutdown complete");
      process.exit(0);
    };

    process.on("SIGTERM", () => void shutdown("SIGTERM"));
    process.on("SIGINT", () => void shutdown("SIGINT"));

    logger.info("Delivery robot initialized");
  } catch (error) {
    logger.error("Fatal error during startup", toError(error));
    process.exit(1);
  }
};

main().catch((error: unknown) => {
  console.error("Unhandled error:", error);
  process.exit(1);
});
