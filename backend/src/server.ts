/**
 * Hono server configuration for the Cardwise engine
 *
 * Provides:
 * - Health check endpoint at /api/health
 * - Deck, session and card endpoints under /api
 * - CORS headers for local development
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import type { Scheduler } from "./scheduling/scheduler";
import { createApiRoutes } from "./routes";
import { restErrorHandler } from "./middleware/error-handler";

export interface AppOptions {
  /** Origins allowed by CORS */
  corsOrigins?: string[];
}

const DEFAULT_CORS_ORIGINS = ["http://localhost:5173", "http://localhost:3000"];

/**
 * Create and configure the Hono application
 */
export const createApp = (scheduler: Scheduler, options: AppOptions = {}) => {
  const app = new Hono();

  app.use(
    "/api/*",
    cors({
      origin: options.corsOrigins ?? DEFAULT_CORS_ORIGINS,
      allowMethods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowHeaders: ["Content-Type", "Authorization"],
      credentials: true,
    })
  );

  // Health check endpoint
  app.get("/api/health", (c) => {
    return c.text("Cardwise Engine");
  });

  app.route("/api", createApiRoutes(scheduler));

  app.onError(restErrorHandler);

  return app;
};
