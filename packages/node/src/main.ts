/**
 * @aliaspay/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, seeds demo aliases, starts the
 * HTTP server, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseSeedAliases } from "./config.js";
import { buildServiceConfig } from "./bootstrap.js";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const dispatchLogger = logger.child({ component: "dispatcher" });
  const { app, service } = createApp({
    serviceConfig: buildServiceConfig(config, {
      dispatchLog: (event) => {
        if (event.state === "rejected" || event.code !== undefined) {
          dispatchLogger.warn(event, `intent ${event.intentId} ${event.state}`);
        } else {
          dispatchLogger.info(event, `intent ${event.intentId} ${event.state}`);
        }
      },
    }),
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onInternalError: (err) => {
      logger.error({ err }, "Unhandled error");
    },
  });

  const seeds = parseSeedAliases(config.SEED_ALIASES);
  const seeded = await service.seedAliases(seeds);
  for (const [i, result] of seeded.entries()) {
    if (!result.ok) {
      logger.warn({ entry: seeds[i], code: result.error.code }, result.error.message);
    }
  }

  logger.info(
    {
      rail: service.rail.name,
      storage: config.DATA_DIR ?? "memory",
      aliases: await service.registry.count(),
      intentParser: config.INTENT_PARSER_URL !== undefined,
    },
    "Services configured",
  );

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST },
    "Aliaspay node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "Error while closing the server");
        process.exit(1);
      }
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
