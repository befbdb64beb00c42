/**
 * Runtime Type Guards
 *
 * Narrowing functions for Tollgate domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized data, host integrations).
 */

import type { AccountId, AssetDescriptor } from "./asset.js";
import type { DomainEvent, EventMetadata, LedgerEvent, LedgerEventKind } from "./event.js";

/** Largest value representable as an unsigned 64-bit integer. */
export const U64_MAX = 0xffff_ffff_ffff_ffffn;

// =============================================================================
// Asset guards
// =============================================================================

export function isU64(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n && value <= U64_MAX;
}

export function isAccountId(value: unknown): value is AccountId {
  return typeof value === "string" && value.trim().length > 0;
}

export function isAssetDescriptor(value: unknown): value is AssetDescriptor {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.name === "string" &&
    v.name.length > 0 &&
    typeof v.symbol === "string" &&
    v.symbol.length > 0 &&
    typeof v.decimals === "number" &&
    Number.isInteger(v.decimals) &&
    v.decimals >= 0 &&
    v.decimals <= 255 &&
    (v.maxSupply === undefined || isU64(v.maxSupply)) &&
    (v.iconUri === undefined || typeof v.iconUri === "string") &&
    (v.projectUri === undefined || typeof v.projectUri === "string")
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_KINDS = new Set<string>(["Mint", "Burn", "Transfer"]);
const EVENT_SOURCES = new Set<string>(["ledger", "host"]);

export function isLedgerEventKind(value: unknown): value is LedgerEventKind {
  return typeof value === "string" && EVENT_KINDS.has(value);
}

export function isLedgerEvent(value: unknown): value is LedgerEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isLedgerEventKind(v.kind) &&
    isAccountId(v.actor) &&
    isAccountId(v.counterparty) &&
    isU64(v.amount) &&
    typeof v.asset === "string" &&
    typeof v.sequence === "number" &&
    Number.isInteger(v.sequence) &&
    v.sequence >= 1
  );
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
