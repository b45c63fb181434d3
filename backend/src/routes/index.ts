/**
 * Route Index
 *
 * Registers every REST route under `/api` with the engine context
 * middleware.
 */

import { Hono } from "hono";
import type { Scheduler } from "../scheduling/scheduler";
import { type EngineEnv, engineContext } from "../middleware/engine-context";
import { deckRoutes } from "./decks";
import { sessionRoutes } from "./sessions";
import { cardRoutes } from "./cards";

/**
 * Build the API router bound to a scheduler.
 *
 * Usage in server.ts:
 * ```typescript
 * app.route("/api", createApiRoutes(scheduler));
 * ```
 */
export function createApiRoutes(scheduler: Scheduler): Hono<EngineEnv> {
  const api = new Hono<EngineEnv>();

  api.use("/*", engineContext(scheduler));

  api.route("/decks", deckRoutes);
  api.route("/sessions", sessionRoutes);
  api.route("/cards", cardRoutes);

  return api;
}
