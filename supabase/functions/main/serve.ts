/**
 * Node entry point: validate the environment, configure logging, build the
 * services and start listening.
 */

import { serve } from "@hono/node-server";
import { loadConfig } from "../_shared/config.ts";
import { AppError } from "../_shared/errors.ts";
import { configureLogger, logger } from "../_shared/logger.ts";
import { createServices, setServices } from "../_shared/services.ts";
import { createApp } from "./index.ts";

function start(): void {
  const config = loadConfig();
  configureLogger({
    minLevel: config.logLevel,
    service: "translation-ledger",
    includeStackTrace: config.environment !== "production",
  });
  setServices(createServices(config));

  const server = serve({ fetch: createApp().fetch, port: config.port }, (info) => {
    logger.info("Server listening", {
      port: info.port,
      environment: config.environment,
      ledger: config.ledger.driver,
      provider: config.provider.name,
    });
  });

  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal });
    server.close();
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

try {
  start();
} catch (error) {
  logger.error("Startup failed", error, {
    details: error instanceof AppError ? error.details : undefined,
  });
  process.exitCode = 1;
}
