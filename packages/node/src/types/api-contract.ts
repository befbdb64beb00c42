/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Logger } from "pino";
import type { LedgerService } from "../services/ledger-service.js";
import type { AuthContext } from "./auth.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Request-scoped logger carrying the request ID (set by logger middleware) */
    log: Logger;

    /** The ledger host service */
    service: LedgerService;

    /** Resolved caller (set by auth middleware) */
    auth: AuthContext;
  };
}
