/**
 * @tollgate/event-store — Ledger event stream.
 *
 * Adapts an EventStore to the ledger's EventSink port. Every committed
 * Mint/Burn/Transfer becomes one DomainEvent on the stream
 * `asset:<SYMBOL>`, with the amount written as a base-unit string.
 *
 * The stream version of each event equals its ledger sequence. Appends
 * use that as the expected version, so a stream that diverges from the
 * ledger fails the append (and with it, the ledger operation).
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, LedgerEvent, LedgerEventKind } from "@tollgate/types";
import type { EventSink } from "@tollgate/ledger";
import type { EventStore, ReadOptions, StoredEvent } from "./types.js";

// =============================================================================
// Event types
// =============================================================================

export const LEDGER_EVENT_TYPES = {
  Mint: "asset.minted",
  Burn: "asset.burned",
  Transfer: "asset.transferred",
} as const satisfies Record<LedgerEventKind, string>;

export type LedgerEventType = (typeof LEDGER_EVENT_TYPES)[LedgerEventKind];

const KIND_BY_TYPE: ReadonlyMap<string, LedgerEventKind> = new Map<string, LedgerEventKind>([
  [LEDGER_EVENT_TYPES.Mint, "Mint"],
  [LEDGER_EVENT_TYPES.Burn, "Burn"],
  [LEDGER_EVENT_TYPES.Transfer, "Transfer"],
]);

/**
 * Stream that holds every event of the asset with `symbol`.
 */
export function assetStreamId(symbol: string): string {
  return `asset:${symbol}`;
}

// =============================================================================
// Mapping
// =============================================================================

export interface EventContext {
  readonly eventId: string;
  readonly timestamp: string;
  readonly correlationId: string;
  readonly causationId?: string;
}

/**
 * JSON-safe form of a ledger event.
 */
export function toDomainEvent(event: LedgerEvent, context: EventContext): DomainEvent {
  return {
    type: LEDGER_EVENT_TYPES[event.kind],
    metadata: {
      eventId: context.eventId,
      timestamp: context.timestamp,
      actor: event.actor,
      correlationId: context.correlationId,
      ...(context.causationId !== undefined ? { causationId: context.causationId } : {}),
      source: "ledger",
    },
    payload: {
      asset: event.asset,
      actor: event.actor,
      counterparty: event.counterparty,
      amount: event.amount.toString(),
      sequence: event.sequence,
    },
  };
}

/**
 * Decode a stored ledger event. Returns undefined for anything that is
 * not a well-formed ledger event.
 */
export function fromDomainEvent(event: DomainEvent): LedgerEvent | undefined {
  const kind = KIND_BY_TYPE.get(event.type);
  if (kind === undefined) return undefined;

  const { asset, actor, counterparty, amount, sequence } = event.payload;
  if (
    typeof asset !== "string" ||
    typeof actor !== "string" ||
    typeof counterparty !== "string" ||
    typeof amount !== "string" ||
    !/^\d+$/.test(amount) ||
    typeof sequence !== "number"
  ) {
    return undefined;
  }

  return { kind, asset, actor, counterparty, amount: BigInt(amount), sequence };
}

// =============================================================================
// Sink
// =============================================================================

export interface LedgerStreamOptions {
  readonly store: EventStore;

  /** Symbol of the asset whose events this sink accepts */
  readonly symbol: string;

  /** Correlation ID for the event being written. Default: the event ID */
  readonly correlationId?: () => string | undefined;

  /** Default: `() => new Date()` */
  readonly clock?: () => Date;

  /** Default: `randomUUID` */
  readonly idGenerator?: () => string;
}

/**
 * EventSink that writes ledger events to an EventStore.
 */
export class EventStoreSink implements EventSink {
  private readonly _store: EventStore;
  private readonly _symbol: string;
  private readonly _streamId: string;
  private readonly _correlationId: () => string | undefined;
  private readonly _clock: () => Date;
  private readonly _idGenerator: () => string;

  constructor(options: LedgerStreamOptions) {
    this._store = options.store;
    this._symbol = options.symbol;
    this._streamId = assetStreamId(options.symbol);
    this._correlationId = options.correlationId ?? (() => undefined);
    this._clock = options.clock ?? (() => new Date());
    this._idGenerator = options.idGenerator ?? randomUUID;
  }

  get streamId(): string {
    return this._streamId;
  }

  append(event: LedgerEvent): void {
    if (event.asset !== this._symbol) {
      throw new Error(
        `Event for asset "${event.asset}" cannot be written to stream "${this._streamId}"`,
      );
    }

    const eventId = this._idGenerator();
    const domainEvent = toDomainEvent(event, {
      eventId,
      timestamp: this._clock().toISOString(),
      correlationId: this._correlationId() ?? eventId,
    });

    this._store.append(this._streamId, [domainEvent], {
      expectedVersion: event.sequence - 1,
    });
  }
}

// =============================================================================
// Reading
// =============================================================================

/**
 * A decoded ledger event with its stored position.
 */
export interface RecordedLedgerEvent {
  readonly event: LedgerEvent;
  readonly eventId: string;
  readonly timestamp: string;
  readonly correlationId: string;
  readonly version: number;
  readonly hash: string;
}

/**
 * Read the ledger events of `symbol`, skipping anything on the stream
 * that does not decode as one.
 */
export function readLedgerEvents(
  store: EventStore,
  symbol: string,
  options?: ReadOptions,
): RecordedLedgerEvent[] {
  return store.read(assetStreamId(symbol), options).flatMap((stored: StoredEvent) => {
    const event = fromDomainEvent(stored.event);
    if (event === undefined) return [];
    return [
      {
        event,
        eventId: stored.event.metadata.eventId,
        timestamp: stored.event.metadata.timestamp,
        correlationId: stored.event.metadata.correlationId,
        version: stored.version,
        hash: stored.hash,
      },
    ];
  });
}
