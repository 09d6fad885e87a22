/**
 * Server Entry Point
 * ==================
 * Loads config, builds the container and starts the Express server.
 */

import "dotenv/config";

import type { Server } from "node:http";

import { createApp } from "./app.js";
import { loadConfig } from "./config/env.js";
import { buildContainer } from "./container.js";
import { logger } from "./shared/logger.js";

async function main() {
  const config = loadConfig();
  const container = await buildContainer(config);
  const app = createApp(container);

  const server: Server = app.listen(config.port, () => {
    logger.info("RAG Chat API listening", {
      url: `http://localhost:${config.port}`,
      health: `/health`,
      docs: `/api-docs`,
    });
  });

  let closing = false;
  const shutdown = (signal: string) => {
    if (closing) {return;}
    closing = true;
    logger.info("Shutting down", { signal });
    server.close(() => {
      container
        .close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error("Shutdown failed", err instanceof Error ? err : { error: String(err) });
          process.exit(1);
        });
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  logger.error("Startup failed", err instanceof Error ? err : { error: String(err) });
  process.exit(1);
});
