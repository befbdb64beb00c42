/**
 * LedgerService — Host-side composition of the ledger.
 *
 * Wires together:
 * - Ledger (capability-gated balances, withdraw/deposit hooks)
 * - In-process activity counters and reference-currency balances
 *   (the oracles the standard hooks read)
 * - EventStore + EventStoreSink (hash-chained event log)
 *
 * The core never logs; this service logs every committed and rejected
 * operation. After each commit the caller's activity counter goes up.
 *
 * On startup the service replays whatever the event store already holds
 * for its asset: ledger events through Ledger.replay(), then the oracle
 * updates from the oracle stream.
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import type { AccountId, AssetDescriptor, Holding, LedgerEvent } from "@tollgate/types";
import { U64_MAX, isAccountId } from "@tollgate/types";
import { Ledger, LedgerError, checkedAdd, toU64 } from "@tollgate/ledger";
import type { AssetInfo, HookPolicy, InvariantReport } from "@tollgate/ledger";
import {
  EventStoreSink,
  InMemoryEventStore,
  assetStreamId,
  readLedgerEvents,
} from "@tollgate/event-store";
import type {
  EventStore,
  EventStoreIntegrityResult,
  RecordedLedgerEvent,
} from "@tollgate/event-store";
import { oracleStreamId, readOracleUpdates, toOracleEvent } from "./oracle-stream.js";
import type { OracleUpdate } from "./oracle-stream.js";

// =============================================================================
// Config
// =============================================================================

export interface LedgerServiceConfig {
  readonly asset: AssetDescriptor;

  /** Account that initializes the asset and may mint and burn */
  readonly administrator: AccountId;

  readonly policy?: Partial<HookPolicy> | undefined;

  /** Default: a fresh InMemoryEventStore */
  readonly eventStore?: EventStore | undefined;

  /** Default: a silent logger */
  readonly logger?: Logger | undefined;
}

export type LedgerOperation = "mint" | "burn" | "transfer";

export interface HealthReport {
  readonly invariants: InvariantReport;
  readonly integrity: EventStoreIntegrityResult;
  readonly ready: boolean;
}

// =============================================================================
// Service
// =============================================================================

export class LedgerService {
  private readonly _activity = new Map<AccountId, bigint>();
  private readonly _references = new Map<AccountId, bigint>();
  private readonly _ledger: Ledger;
  private readonly _store: EventStore;
  private readonly _logger: Logger;
  private readonly _symbol: string;

  /** Correlation ID of the operation in flight, read by the event sink */
  private _correlationId: string | undefined;

  constructor(config: LedgerServiceConfig) {
    this._logger = config.logger ?? pino({ level: "silent" });
    this._store = config.eventStore ?? new InMemoryEventStore();
    this._symbol = config.asset.symbol;

    this._ledger = new Ledger({
      activity: { activityCounter: (account) => this._activity.get(account) ?? 0n },
      referenceBalances: { referenceBalance: (account) => this._references.get(account) ?? 0n },
      events: new EventStoreSink({
        store: this._store,
        symbol: this._symbol,
        correlationId: () => this._correlationId,
      }),
    });

    this._ledger.initialize(config.administrator, config.asset, { policy: config.policy });
    this._logger.info(
      { asset: this._symbol, administrator: config.administrator },
      "Asset initialized",
    );
    this._restore();
  }

  // ─── Operations ──────────────────────────────────────────────────

  mint(caller: AccountId, to: AccountId, amount: bigint, correlationId?: string): LedgerEvent {
    return this._run("mint", caller, correlationId, () => this._ledger.mint(caller, to, amount));
  }

  burn(caller: AccountId, from: AccountId, amount: bigint, correlationId?: string): LedgerEvent {
    return this._run("burn", caller, correlationId, () => this._ledger.burn(caller, from, amount));
  }

  transfer(caller: AccountId, to: AccountId, amount: bigint, correlationId?: string): LedgerEvent {
    return this._run("transfer", caller, correlationId, () =>
      this._ledger.transfer(caller, to, amount),
    );
  }

  // ─── Reads ───────────────────────────────────────────────────────

  info(): AssetInfo {
    return this._ledger.info();
  }

  balanceOf(account: AccountId): bigint {
    return this._ledger.balanceOf(account);
  }

  totalSupply(): bigint {
    return this._ledger.totalSupply();
  }

  holders(): readonly Holding[] {
    return this._ledger.holders();
  }

  /**
   * Recorded ledger events after `afterSequence`, oldest first.
   */
  events(afterSequence = 0): readonly RecordedLedgerEvent[] {
    return readLedgerEvents(this._store, this._symbol, { fromVersion: afterSequence + 1 });
  }

  // ─── Host oracles ────────────────────────────────────────────────

  activityOf(account: AccountId): bigint {
    return this._activity.get(account) ?? 0n;
  }

  referenceBalanceOf(account: AccountId): bigint {
    return this._references.get(account) ?? 0n;
  }

  /**
   * Set the reference-currency balance the solvency gate reads.
   */
  setReferenceBalance(account: AccountId, amount: bigint): void {
    assertAccount(account);
    const value = toU64(amount);
    this._recordOracleUpdate({ kind: "reference", account, amount: value });
    this._references.set(account, value);
    this._logger.info({ account, referenceBalance: value.toString() }, "Reference balance set");
  }

  /**
   * Raise the account's activity counter by `count`. Returns the new value.
   */
  recordActivity(account: AccountId, count = 1n): bigint {
    assertAccount(account);
    const increment = toU64(count, "count");
    const next = checkedAdd(this.activityOf(account), increment);
    this._recordOracleUpdate({ kind: "activity", account, count: increment });
    this._activity.set(account, next);
    this._logger.debug({ account, activityCounter: next.toString() }, "Activity recorded");
    return next;
  }

  // ─── Health ──────────────────────────────────────────────────────

  checkHealth(): HealthReport {
    const invariants = this._ledger.checkInvariants();
    const integrity = this._store.verifyIntegrity();
    return { invariants, integrity, ready: invariants.holds && integrity.valid };
  }

  // ─── Internal ────────────────────────────────────────────────────

  private _restore(): void {
    const streamId = assetStreamId(this._symbol);
    const recorded = readLedgerEvents(this._store, this._symbol);
    const version = this._store.streamVersion(streamId);
    if (recorded.length !== version) {
      throw new Error(
        `Stream "${streamId}" holds ${version} events, of which ${recorded.length} decode as ledger events`,
      );
    }

    const events = recorded.map((r) => r.event);
    this._ledger.replay(events);
    for (const event of events) {
      this._raiseActivity(event.actor);
    }

    const updates = readOracleUpdates(this._store, this._symbol);
    for (const update of updates) {
      if (update.kind === "activity") {
        this._raiseActivity(update.account, update.count);
      } else {
        this._references.set(update.account, update.amount);
      }
    }

    if (events.length > 0 || updates.length > 0) {
      this._logger.info(
        {
          asset: this._symbol,
          events: events.length,
          oracleUpdates: updates.length,
          totalSupply: this._ledger.totalSupply().toString(),
        },
        "Ledger restored",
      );
    }
  }

  private _recordOracleUpdate(update: OracleUpdate): void {
    const eventId = randomUUID();
    this._store.append(oracleStreamId(this._symbol), [
      toOracleEvent(update, {
        eventId,
        timestamp: new Date().toISOString(),
        correlationId: eventId,
      }),
    ]);
  }

  private _raiseActivity(account: AccountId, count = 1n): void {
    this._activity.set(account, saturatingAdd(this.activityOf(account), count));
  }

  private _run(
    op: LedgerOperation,
    caller: AccountId,
    correlationId: string | undefined,
    work: () => LedgerEvent,
  ): LedgerEvent {
    this._correlationId = correlationId;
    try {
      const event = work();
      this._raiseActivity(caller);
      this._logger.info(
        { op, caller, counterparty: event.counterparty, amount: event.amount.toString(), sequence: event.sequence },
        `${op} committed`,
      );
      return event;
    } catch (err) {
      if (err instanceof LedgerError) {
        this._logger.warn({ op, caller, code: err.code, failure: err.failure }, `${op} rejected`);
      } else {
        this._logger.error({ op, caller, err }, `${op} failed`);
      }
      throw err;
    } finally {
      this._correlationId = undefined;
    }
  }
}

/**
 * Raise a counter without failing: an operation that has already
 * committed must not be reported as rejected.
 */
function saturatingAdd(a: bigint, b: bigint): bigint {
  const sum = a + b;
  return sum > U64_MAX ? U64_MAX : sum;
}

function assertAccount(account: unknown): asserts account is AccountId {
  if (!isAccountId(account)) {
    throw new LedgerError("INVALID_ACCOUNT", `Invalid account identity: "${String(account)}"`);
  }
}
