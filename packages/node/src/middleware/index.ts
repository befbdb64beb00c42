/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, LEDGER_STATUS, EVENT_STORE_STATUS } from "./error-handler.js";
export type { ErrorStatus } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, validateQuery, formatZodErrors } from "./validate.js";
export {
  authMiddleware,
  headerIdentityMiddleware,
  requirePermission,
  API_KEY_HEADER,
  ACCOUNT_ID_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
