/**
 * Authentication middleware.
 *
 * Resolves the ledger account a request acts as:
 * - Secured mode: X-Api-Key header → looked up in the configured key registry
 * - Unsecured mode (no keys configured): X-Account-Id header, or the
 *   configured default account, with the admin role
 *
 * On success, sets `c.set("auth", authContext)`.
 * On failure, returns 401 or 403.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, AuthContext, Permission } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const ACCOUNT_ID_HEADER = "X-Account-Id";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

/**
 * Require a known API key.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(
        createErrorEnvelope("AUTHENTICATION_REQUIRED", "Authentication required"),
        401,
      );
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(createErrorEnvelope("AUTHENTICATION_REQUIRED", "Invalid API key"), 401);
    }

    const auth: AuthContext = {
      type: "api-key",
      role: record.role,
      accountId: record.accountId,
    };
    c.set("auth", auth);
    return next();
  };
}

/**
 * Unsecured mode: trust the X-Account-Id header.
 */
export function headerIdentityMiddleware(defaultAccountId: string): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const header = c.req.header(ACCOUNT_ID_HEADER)?.trim();
    const auth: AuthContext = {
      type: "header",
      role: "admin",
      accountId: header !== undefined && header !== "" ? header : defaultAccountId,
    };
    c.set("auth", auth);
    return next();
  };
}

// =============================================================================
// Permission Guard
// =============================================================================

/**
 * Create a permission guard middleware.
 *
 * Must run AFTER an identity middleware. Returns 403 if the resolved
 * role lacks the required permission.
 */
export function requirePermission(permission: Permission): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (!hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope("FORBIDDEN", `Role '${auth.role}' lacks '${permission}' permission`),
        403,
      );
    }
    return next();
  };
}
