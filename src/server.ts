/**
 * Application entry point.
 *
 * Loads configuration, prepares storage (refusing to start when the
 * collection was built with a different embedding model), registers the HTTP
 * routes and shuts down cleanly on SIGINT/SIGTERM.
 */
import "dotenv/config";

import express from "express";

import { createContainer } from "@app/container";
import { loadConfig } from "@config/index";
import { createLogger } from "@infrastructure/logging/Logger";
import { createErrorHandler } from "@middleware/errorHandler";
import { registerRoutes } from "@routes/index";
import { errorMessage } from "@typesLocal/AppError";

import type { LoggerPort } from "@infrastructure/logging/Logger";

// Console only until the configuration says where logs go.
let logger: LoggerPort = createLogger({ level: "info" });

async function main(): Promise<void> {
  const config = loadConfig();
  logger = createLogger({
    level: config.observability.logLevel,
    file: config.observability.logFile,
  });
  const container = createContainer(config, logger);

  await container.start();

  const app = express();
  app.use(express.json({ limit: "6mb" }));

  registerRoutes(app, container);

  app.use(createErrorHandler(logger));

  const server = app.listen(config.port, () => {
    logger.log("info", "SERVER_STARTED", {
      url: `http://localhost:${config.port}`,
      llmModel: config.models.llmModel,
      embeddingModel: config.models.embeddingModel,
      cache: container.cache.storeName,
    });
  });

  const shutdown = (signal: string): void => {
    logger.log("info", "SERVER_STOPPING", { signal });
    server.close(() => {
      container
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.log("error", "SHUTDOWN_FAILED", { error: errorMessage(error) });
          process.exit(1);
        });
    });
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  logger.log("error", "SERVER_START_FAILED", { error: errorMessage(error) });
  process.exit(1);
});
