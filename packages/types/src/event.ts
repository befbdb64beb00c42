/**
 * Event Types
 *
 * Append-only event architecture.
 * Every committed supply or ownership change is captured as an event.
 *
 * Rules:
 * - Events are immutable after creation
 * - Ordering is emission order
 * - No UPDATE, no DELETE — only new events
 */

import type { AccountId } from "./asset.js";

// =============================================================================
// Ledger events
// =============================================================================

/** What happened to the asset. */
export type LedgerEventKind = "Mint" | "Burn" | "Transfer";

/**
 * A record emitted by the ledger core after an operation commits.
 *
 * - Mint: actor = administrator, counterparty = recipient
 * - Burn: actor = administrator, counterparty = account debited
 * - Transfer: actor = sender, counterparty = recipient
 */
export interface LedgerEvent {
  readonly kind: LedgerEventKind;
  readonly actor: AccountId;
  readonly counterparty: AccountId;
  readonly amount: bigint;

  /** Symbol of the asset the event belongs to */
  readonly asset: string;

  /** Emission sequence (1-based, contiguous per ledger) */
  readonly sequence: number;
}

// =============================================================================
// Persisted events
// =============================================================================

/**
 * Metadata common to all persisted domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who or what caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** ID for grouping related events across systems */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: "ledger" | "host";
}

/**
 * A JSON-safe domain event, as written to an event store.
 * Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "asset.minted") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
