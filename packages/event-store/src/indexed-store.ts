/**
 * @tollgate/event-store — Shared in-memory index for EventStore implementations.
 *
 * Keeps two views of the same events:
 * - Per-stream arrays (indexed by streamId) for stream reads
 * - A global array for readAll and chain verification
 *
 * Subclasses decide where sealed events go before they are indexed.
 * If `persist` throws, nothing is indexed and positions are not consumed.
 */

import type { DomainEvent } from "@tollgate/types";
import { GENESIS_HASH, sealEvent, verifyHashChain } from "./hash-chain.js";
import type {
  AppendOptions,
  AppendResult,
  EventStore,
  EventStoreIntegrityResult,
  ExpectedVersion,
  ReadAllOptions,
  ReadDirection,
  ReadOptions,
  StoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";

export abstract class IndexedEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];

  /**
   * Write sealed events to the backing medium.
   */
  protected abstract persist(events: readonly StoredEvent[]): void;

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const currentVersion = this.streamVersion(streamId);
    checkExpectedVersion(streamId, currentVersion, options?.expectedVersion);

    const fromVersion = currentVersion + 1;
    const appendedAt = new Date().toISOString();
    let previousHash = this._lastHash();
    let position = this.globalPosition();

    const sealed: StoredEvent[] = events.map((event, i) => {
      position += 1;
      const stored = sealEvent(
        {
          event: { type: event.type, metadata: event.metadata, payload: event.payload },
          streamId,
          version: fromVersion + i,
          globalPosition: position,
          appendedAt,
        },
        previousHash,
      );
      previousHash = stored.hash;
      return stored;
    });

    this.persist(sealed);
    for (const stored of sealed) {
      this.index(stored);
    }

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    validateStreamId(streamId);

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const stream = this._streams.get(streamId) ?? [];
    return slice(
      stream,
      (e) => e.version,
      fromVersion,
      options?.direction ?? "forward",
      options?.maxCount,
    );
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    return slice(
      this._globalLog,
      (e) => e.globalPosition,
      options?.fromPosition ?? 1,
      options?.direction ?? "forward",
      options?.maxCount,
    );
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * Add an already-sealed event to both views.
   */
  protected index(stored: StoredEvent): void {
    let stream = this._streams.get(stored.streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(stored.streamId, stream);
    }
    stream.push(stored);
    this._globalLog.push(stored);
  }

  private _lastHash(): string {
    return this._globalLog.at(-1)?.hash ?? GENESIS_HASH;
  }
}

function validateStreamId(streamId: string): void {
  if (streamId.length === 0) {
    throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
  }
}

function checkExpectedVersion(
  streamId: string,
  currentVersion: number,
  expected: ExpectedVersion | undefined,
): void {
  if (expected === undefined || expected === "any") return;

  if (expected === "no_stream") {
    if (currentVersion !== 0) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" already exists (version ${currentVersion}), expected no_stream`,
        streamId,
      );
    }
    return;
  }

  if (currentVersion !== expected) {
    throw new EventStoreError(
      "CONCURRENCY_CONFLICT",
      `Stream "${streamId}" is at version ${currentVersion}, expected ${expected}`,
      streamId,
    );
  }
}

/**
 * Forward: positions >= from. Backward: positions <= from, newest first.
 */
function slice(
  events: readonly StoredEvent[],
  positionOf: (e: StoredEvent) => number,
  from: number,
  direction: ReadDirection,
  maxCount: number | undefined,
): StoredEvent[] {
  const result =
    direction === "forward"
      ? events.filter((e) => positionOf(e) >= from)
      : events.filter((e) => positionOf(e) <= from).reverse();

  return maxCount !== undefined && maxCount >= 0 ? result.slice(0, maxCount) : result;
}
