/**
 * @tollgate/ledger — Event emitter.
 *
 * Numbers committed Mint/Burn/Transfer records and hands them to the
 * host's event sink once the surrounding operation commits. A rolled-back
 * operation emits nothing and consumes no sequence number.
 */

import type { AccountId, LedgerEvent, LedgerEventKind } from "@tollgate/types";
import type { Journal } from "./journal.js";
import type { EventSink } from "./types.js";

export class EventEmitter {
  private _sequence = 0;

  constructor(
    private readonly _sink: EventSink,
    private readonly _journal: Journal,
  ) {}

  /**
   * Queue an event for delivery at commit. Returns the event as it will
   * be delivered.
   */
  emit(
    kind: LedgerEventKind,
    asset: string,
    actor: AccountId,
    counterparty: AccountId,
    amount: bigint,
  ): LedgerEvent {
    const previous = this._sequence;
    this._journal.record(() => {
      this._sequence = previous;
    });
    this._sequence = previous + 1;

    const event: LedgerEvent = Object.freeze({
      kind,
      actor,
      counterparty,
      amount,
      asset,
      sequence: this._sequence,
    });

    this._journal.onCommit(() => {
      this._sink.append(event);
    });
    return event;
  }

  /**
   * Account for an event committed in an earlier run: the sequence moves
   * to the event's, and nothing is delivered to the sink.
   */
  replayed(event: LedgerEvent): void {
    const previous = this._sequence;
    this._journal.record(() => {
      this._sequence = previous;
    });
    this._sequence = event.sequence;
  }

  /**
   * Number of events committed so far.
   */
  get emitted(): number {
    return this._sequence;
  }
}

/**
 * Event sink that keeps every event in memory, in emission order.
 */
export class MemoryEventSink implements EventSink {
  private readonly _events: LedgerEvent[] = [];

  append(event: LedgerEvent): void {
    this._events.push(event);
  }

  all(): readonly LedgerEvent[] {
    return [...this._events];
  }

  get count(): number {
    return this._events.length;
  }
}
