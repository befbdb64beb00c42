/**
 * @tollgate/types — Shared domain types for the Tollgate stack.
 *
 * These types are used across all Tollgate packages:
 * - Asset primitives (account identity, descriptor, holdings)
 * - Ledger events and their persisted form
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Asset types
export type {
  AccountId,
  AssetDescriptor,
  Holding,
} from "./asset.js";

// Event types
export type {
  LedgerEvent,
  LedgerEventKind,
  DomainEvent,
  EventMetadata,
} from "./event.js";

// Runtime type guards
export {
  U64_MAX,
  isU64,
  isAccountId,
  isAssetDescriptor,
  isLedgerEventKind,
  isLedgerEvent,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
