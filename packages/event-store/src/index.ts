/**
 * @tollgate/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only, hash-chained event streams
 * - InMemoryEventStore for tests and development
 * - JsonlEventStore for durable file-based persistence
 * - EventStoreSink, which writes ledger events to an asset stream
 *
 * @packageDocumentation
 */

// Core types
export type {
  UnhashedEvent,
  StoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, sealEvent, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { IndexedEventStore } from "./indexed-store.js";
export { InMemoryEventStore } from "./in-memory-store.js";
export { JsonlEventStore, isStoredEvent } from "./jsonl-store.js";
export type { JsonlEventStoreOptions } from "./jsonl-store.js";

// Ledger events
export {
  LEDGER_EVENT_TYPES,
  assetStreamId,
  toDomainEvent,
  fromDomainEvent,
  EventStoreSink,
  readLedgerEvents,
} from "./ledger-stream.js";
export type {
  LedgerEventType,
  EventContext,
  LedgerStreamOptions,
  RecordedLedgerEvent,
} from "./ledger-stream.js";
