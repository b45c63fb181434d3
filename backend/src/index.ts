/**
 * Cardwise Engine
 *
 * Entry point for the Hono server on Node:
 * - Loads configuration from YAML and the environment
 * - Opens the SQLite card store
 * - Serves the REST API until SIGINT/SIGTERM
 */

import { serve } from "@hono/node-server";
import { loadEngineConfig } from "./engine-config";
import { openCardStore } from "./scheduling/sqlite-card-store";
import { Scheduler } from "./scheduling/scheduler";
import { createApp } from "./server";
import { serverLog as log, setLogLevel } from "./logger";

async function main(): Promise<void> {
  const config = await loadEngineConfig();
  if (config.logLevel) {
    setLogLevel(config.logLevel);
  }

  const store = await openCardStore(config.databasePath);
  const scheduler = new Scheduler(store, {
    policy: config.policy,
    clock: config.clock,
    learningJitterSeconds: config.learningJitterSeconds,
    defaultDeckPrefs: config.defaultDeckPrefs,
    onLeech: (event) => {
      log.warn(`Leech: card ${event.cardId} in deck ${event.deckId} has ${event.lapses} lapses`);
    },
  });

  const app = createApp(scheduler, { corsOrigins: config.corsOrigins });
  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    const displayHost = config.host === "0.0.0.0" ? "localhost" : config.host;
    log.info(`Cardwise engine running at http://${displayHost}:${info.port}`);
    log.info(`Health check at http://${displayHost}:${info.port}/api/health`);
    if (config.host === "0.0.0.0") {
      log.info(`Server bound to all interfaces (0.0.0.0) - accessible remotely`);
    }
  });

  const shutdown = (signal: string) => {
    log.info(`Received ${signal}, shutting down`);
    server.close(() => {
      store.close();
      process.exit(0);
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  log.error("Failed to start server:", error);
  process.exit(1);
});
