/**
 * @tollgate/node — Reference host for the gated ledger.
 *
 * Public API of the package; the server bootstrap lives in main.ts.
 *
 * @packageDocumentation
 */

export { LedgerService } from "./services/ledger-service.js";
export type {
  LedgerServiceConfig,
  LedgerOperation,
  HealthReport,
} from "./services/ledger-service.js";
export {
  ORACLE_EVENT_TYPES,
  oracleStreamId,
  toOracleEvent,
  fromOracleEvent,
  readOracleUpdates,
} from "./services/oracle-stream.js";
export type { OracleUpdate, OracleEventContext } from "./services/oracle-stream.js";
export {
  loadConfig,
  parseApiKeys,
  assetFromConfig,
  policyFromConfig,
  ConfigSchema,
} from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp, authConfigFromKeys } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
