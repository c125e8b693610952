/**
 * @sharepool/node: Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";
import { createAuthConfig } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  let auth: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0) {
    auth = createAuthConfig(parsedKeys);
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured, trusting the X-Caller-Id header");
  }

  const { app, registry, eventStore } = createApp({
    defaultCurrency: config.DEFAULT_CURRENCY,
    defaultDecimals: config.DEFAULT_DECIMALS,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${String(entry.status)}`);
    },
    auth,
    dataDir: config.EVENT_LOG_DIR,
    onEvent: (stored) => {
      logger.debug(
        { streamId: stored.streamId, version: stored.version, type: stored.event.type },
        "Notification recorded",
      );
    },
    onPublishError: (failure) => {
      logger.error(
        {
          streamId: failure.streamId,
          types: failure.events.map((e) => e.type),
          reason: failure.reason,
        },
        "Notification batch not recorded",
      );
    },
  });

  const integrity = eventStore.verifyIntegrity();
  if (!integrity.valid) {
    logger.error({ errors: integrity.errors }, "Notification log failed integrity check");
  }
  logger.info(
    {
      splitters: registry.ids().length,
      events: eventStore.globalPosition(),
      persistent: registry.persistent,
    },
    "State loaded",
  );

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Sharepool node started");

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "Server close failed");
      }
      registry.save();
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
