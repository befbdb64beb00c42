/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import pino from "pino";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import type { ApiKeyRecord } from "./types/auth.js";
import { LedgerService } from "./services/ledger-service.js";
import type { LedgerServiceConfig } from "./services/ledger-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { authMiddleware, headerIdentityMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createErrorEnvelope } from "./types/error.js";
import { createHealthRoutes } from "./routes/health.js";
import { createAssetRoutes } from "./routes/asset.js";
import { createOperationRoutes } from "./routes/operations.js";
import { createAccountRoutes } from "./routes/accounts.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: Omit<LedgerServiceConfig, "logger">;
  /** Default: a silent logger */
  readonly logger?: Logger | undefined;
  /** Auth configuration. When provided, API keys are required. */
  readonly auth?: AuthConfig | undefined;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: LedgerService;
}

/**
 * Build an AuthConfig from parsed API key records.
 */
export function authConfigFromKeys(keys: readonly ApiKeyRecord[]): AuthConfig {
  return { apiKeys: new Map(keys.map((k) => [k.key, k] as const)) };
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const logger = options.logger ?? pino({ level: "silent" });
  const service = new LedgerService({ ...options.serviceConfig, logger });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());
  app.use("*", loggerMiddleware(logger));

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    // Unsecured mode (tests, dev): X-Account-Id header or the administrator
    app.use("/api/*", headerIdentityMiddleware(options.serviceConfig.administrator));
  }

  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1", createAssetRoutes());
  app.route("/api/v1", createOperationRoutes());
  app.route("/api/v1/accounts", createAccountRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
