/**
 * @tollgate/node — Entry point.
 *
 * Loads config, builds the ledger service and Hono app, starts the HTTP
 * server, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { InMemoryEventStore, JsonlEventStore } from "@tollgate/event-store";
import type { EventStore } from "@tollgate/event-store";
import { assetFromConfig, loadConfig, parseApiKeys, policyFromConfig } from "./config.js";
import { authConfigFromKeys, createApp } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const keys = parseApiKeys(config.API_KEYS);
  if (keys.length > 0) {
    logger.info({ apiKeyCount: keys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured; running in unsecured mode (X-Account-Id)");
  }

  const eventStore: EventStore =
    config.EVENT_LOG_PATH !== undefined
      ? new JsonlEventStore({ filePath: config.EVENT_LOG_PATH })
      : new InMemoryEventStore();
  logger.info(
    { eventLog: config.EVENT_LOG_PATH ?? "memory" },
    "Event store opened",
  );

  const { app } = createApp({
    serviceConfig: {
      asset: assetFromConfig(config),
      administrator: config.ASSET_ADMIN,
      policy: policyFromConfig(config),
      eventStore,
    },
    logger,
    auth: keys.length > 0 ? authConfigFromKeys(keys) : undefined,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, asset: config.ASSET_SYMBOL },
    "Ledger node started",
  );

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err !== undefined ? reject(err) : resolve()));
    });
    logger.info("Shutdown complete");
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
