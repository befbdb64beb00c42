/**
 * Oracle stream — host-side oracle updates, persisted beside the ledger.
 *
 * Reference-balance settings and explicitly recorded activity go to the
 * stream `oracles:<SYMBOL>` so a restarted node sees the same oracle
 * state the ledger's hooks saw. Activity raised by committed operations
 * is not written here; it is recomputed from the asset stream.
 */

import type { AccountId, DomainEvent } from "@tollgate/types";
import type { EventStore } from "@tollgate/event-store";

export const ORACLE_EVENT_TYPES = {
  activity: "host.activity-recorded",
  reference: "host.reference-balance-set",
} as const;

export type OracleUpdate =
  | { readonly kind: "activity"; readonly account: AccountId; readonly count: bigint }
  | { readonly kind: "reference"; readonly account: AccountId; readonly amount: bigint };

export function oracleStreamId(symbol: string): string {
  return `oracles:${symbol}`;
}

export interface OracleEventContext {
  readonly eventId: string;
  readonly timestamp: string;
  readonly correlationId: string;
}

export function toOracleEvent(update: OracleUpdate, context: OracleEventContext): DomainEvent {
  const payload =
    update.kind === "activity"
      ? { account: update.account, count: update.count.toString() }
      : { account: update.account, amount: update.amount.toString() };

  return {
    type: ORACLE_EVENT_TYPES[update.kind],
    metadata: {
      eventId: context.eventId,
      timestamp: context.timestamp,
      actor: "host",
      correlationId: context.correlationId,
      source: "host",
    },
    payload,
  };
}

/**
 * Decode a stored oracle update; undefined for anything else.
 */
export function fromOracleEvent(event: DomainEvent): OracleUpdate | undefined {
  const { account, count, amount } = event.payload;
  if (typeof account !== "string" || account.length === 0) return undefined;

  if (event.type === ORACLE_EVENT_TYPES.activity && isBaseUnits(count)) {
    return { kind: "activity", account, count: BigInt(count) };
  }
  if (event.type === ORACLE_EVENT_TYPES.reference && isBaseUnits(amount)) {
    return { kind: "reference", account, amount: BigInt(amount) };
  }
  return undefined;
}

/**
 * Every decodable oracle update of `symbol`, oldest first.
 */
export function readOracleUpdates(store: EventStore, symbol: string): OracleUpdate[] {
  return store.read(oracleStreamId(symbol)).flatMap((stored) => {
    const update = fromOracleEvent(stored.event);
    return update === undefined ? [] : [update];
  });
}

function isBaseUnits(value: unknown): value is string {
  return typeof value === "string" && /^\d+$/.test(value);
}
