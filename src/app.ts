/**
 * Express Application Factory
 * ============================
 * Creates and configures the Express app with all routes and middleware.
 * Services arrive already built; this file only wires HTTP.
 */

import cors from "cors";
import express from "express";
import swaggerUi from "swagger-ui-express";

import { API_VERSION, swaggerSpec } from "./config/swagger.js";
import { errorHandler } from "./middleware/error-handler.js";
import { jsonBody } from "./middleware/json-body.js";
import { notFoundHandler } from "./middleware/not-found.js";
import { type AuthService, createAuthRouter } from "./modules/auth/index.js";
import { createChatRouter, type RagService } from "./modules/chat/index.js";
import type { AppConfig } from "./config/env.js";

export type AppDeps = {
  config: AppConfig;
  authService: AuthService;
  ragService: RagService;
};

export function createApp(deps: AppDeps) {
  const app = express();

  app.disable("x-powered-by");
  if (deps.config.trustProxyHops > 0) {
    app.set("trust proxy", deps.config.trustProxyHops);
  }

  app.use(
    cors({
      origin: deps.config.corsOrigins,
      credentials: true,
    })
  );
  // Logout answers 204 whatever the body; the refresh cookie still applies.
  app.use(jsonBody({ limit: "1mb", lenientPaths: ["/auth/logout"] }));

  // Swagger UI
  app.use("/api-docs", swaggerUi.serve, swaggerUi.setup(swaggerSpec));
  app.get("/api-docs.json", (_req, res) => {
    res.json(swaggerSpec);
  });

  /**
   * @swagger
   * /health:
   *   get:
   *     tags: [Health]
   *     summary: Liveness probe
   *     responses:
   *       200:
   *         description: Service is up
   */
  app.get("/health", (_req, res) => {
    res.json({
      success: true,
      status: "ok",
      timestamp: new Date().toISOString(),
      service: "rag-chat-api",
      version: API_VERSION,
    });
  });

  app.use("/auth", createAuthRouter(deps.authService, deps.config.auth));
  app.use("/chat", createChatRouter({ auth: deps.authService, rag: deps.ragService }));

  // 404 + error handling (keep last)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
