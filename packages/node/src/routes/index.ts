/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createAssetRoutes } from "./asset.js";
export { createOperationRoutes } from "./operations.js";
export { createAccountRoutes } from "./accounts.js";
export { createEventRoutes } from "./events.js";
export { amountView, assetView, ledgerEventView, eventView } from "./views.js";
