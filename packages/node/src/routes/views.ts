/**
 * Response shaping: bigint amounts become base-unit strings plus a
 * display string in the asset's decimals.
 */

import { formatUnits } from "@tollgate/ledger";
import type { AssetInfo } from "@tollgate/ledger";
import type { RecordedLedgerEvent } from "@tollgate/event-store";
import type { LedgerEvent } from "@tollgate/types";
import type { AmountView, AssetView, EventView, LedgerEventView } from "../types/dto.js";

export function amountView(amount: bigint, decimals: number): AmountView {
  return { amount: amount.toString(), display: formatUnits(amount, decimals) };
}

export function assetView(info: AssetInfo): AssetView {
  const { descriptor } = info;
  return {
    name: descriptor.name,
    symbol: descriptor.symbol,
    decimals: descriptor.decimals,
    maxSupply: descriptor.maxSupply?.toString() ?? null,
    iconUri: descriptor.iconUri ?? null,
    projectUri: descriptor.projectUri ?? null,
    administrator: info.administrator,
    totalSupply: amountView(info.totalSupply, descriptor.decimals),
  };
}

export function ledgerEventView(event: LedgerEvent, decimals: number): LedgerEventView {
  return {
    sequence: event.sequence,
    kind: event.kind,
    actor: event.actor,
    counterparty: event.counterparty,
    ...amountView(event.amount, decimals),
    asset: event.asset,
  };
}

export function eventView(recorded: RecordedLedgerEvent, decimals: number): EventView {
  return {
    ...ledgerEventView(recorded.event, decimals),
    eventId: recorded.eventId,
    timestamp: recorded.timestamp,
    correlationId: recorded.correlationId,
    hash: recorded.hash,
  };
}
