/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps LedgerError and EventStoreError codes to HTTP status codes.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { ZodError } from "zod";
import { LedgerError } from "@tollgate/ledger";
import type { LedgerErrorCode } from "@tollgate/ledger";
import { EventStoreError } from "@tollgate/event-store";
import type { EventStoreErrorCode } from "@tollgate/event-store";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "./validate.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export type ErrorStatus = 400 | 403 | 409 | 422 | 500;

export const LEDGER_STATUS: Record<LedgerErrorCode, ErrorStatus> = {
  // Lifecycle
  ALREADY_INITIALIZED: 409,
  NOT_INITIALIZED: 409,

  // Input
  INVALID_ASSET: 400,
  INVALID_POLICY: 400,
  INVALID_ACCOUNT: 400,
  INVALID_AMOUNT: 400,

  // Authority
  UNAUTHORIZED: 403,

  // Hook gates and balance
  INACTIVE_ACCOUNT: 422,
  CAP_EXCEEDED: 422,
  MINIMUM_BALANCE_NOT_MET: 422,
  INSUFFICIENT_BALANCE: 422,
  OVERFLOW: 422,

  // Internal misuse; never caused by a request
  AMOUNT_ALREADY_CONSUMED: 500,
  INVALID_EVENT: 500,
};

export const EVENT_STORE_STATUS: Record<EventStoreErrorCode, ErrorStatus> = {
  CONCURRENCY_CONFLICT: 409,
  INVALID_STREAM_ID: 500,
  EMPTY_APPEND: 500,
  INVALID_VERSION: 400,
};

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context<AppEnv>): Response {
  if (err instanceof LedgerError) {
    const status = LEDGER_STATUS[err.code];
    const details =
      err.failure !== undefined ? { hook: err.failure.hook, gate: err.failure.gate } : undefined;
    return c.json(createErrorEnvelope(err.code, err.message, details), status);
  }

  if (err instanceof EventStoreError) {
    const status = EVENT_STORE_STATUS[err.code];
    logUnexpected(c, err, status);
    const message = status === 500 ? "Internal server error" : err.message;
    return c.json(createErrorEnvelope(err.code, message), status);
  }

  if (err instanceof ZodError) {
    return c.json(
      createErrorEnvelope("VALIDATION_ERROR", "Validation failed", {
        issues: formatZodErrors(err),
      }),
      400,
    );
  }

  if (err instanceof HTTPException && err.status < 500) {
    const notFound = err.status === 404;
    return c.json(
      createErrorEnvelope(notFound ? "NOT_FOUND" : "VALIDATION_ERROR", err.message),
      notFound ? 404 : 400,
    );
  }

  logUnexpected(c, err, 500);
  // Don't leak internal details
  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}

function logUnexpected(c: Context<AppEnv>, err: Error, status: number): void {
  if (status < 500) return;
  c.get("log")?.error({ err }, "Unhandled error");
}
