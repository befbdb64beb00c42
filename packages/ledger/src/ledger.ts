/**
 * @tollgate/ledger — Core Ledger class.
 *
 * Owns all state of one deployed asset: the registry (descriptor, supply,
 * capability bundle), the account stores, the hook dispatcher and the
 * event emitter. Nothing here is ambient; every operation goes through
 * an instance.
 *
 * API surface:
 * - initialize() — Register the asset, bind hooks, issue capabilities
 * - mint() — Administrator creates units in an account (no deposit hook)
 * - burn() — Administrator destroys units from an account (withdraw hook)
 * - transfer() — Move units between accounts (withdraw + deposit hooks)
 * - balanceOf(), totalSupply(), assetDescriptor() — Read accessors
 * - holders(), checkInvariants() — Audit accessors
 * - replay() — Rebuild state from events committed in an earlier run
 *
 * Each mutating operation is all-or-nothing: it either commits every
 * balance, supply and event change, or throws and leaves no trace.
 */

import type { AccountId, AssetDescriptor, Holding, LedgerEvent } from "@tollgate/types";
import { AssetRegistry } from "./asset-registry.js";
import { assertAccountId, StoreRegistry } from "./balance-store.js";
import type { CapabilityBundle } from "./capabilities.js";
import { HookDispatcher } from "./dispatcher.js";
import { EventEmitter, MemoryEventSink } from "./events.js";
import { resolvePolicy, standardHooks } from "./hooks.js";
import { Journal } from "./journal.js";
import { toU64 } from "./amount-math.js";
import type {
  AssetInfo,
  InitializeOptions,
  InvariantReport,
  LedgerHost,
} from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Everything that exists only after initialize().
 */
interface Deployment {
  readonly administrator: AccountId;
  readonly capabilities: CapabilityBundle;
  readonly dispatcher: HookDispatcher;
  readonly stores: StoreRegistry;
}

/**
 * A single fungible-asset ledger with hooked transfers.
 */
export class Ledger {
  private readonly _journal: Journal = new Journal();
  private readonly _registry: AssetRegistry = new AssetRegistry(this._journal);
  private readonly _events: EventEmitter;
  private readonly _host: LedgerHost;
  private _deployment: Deployment | undefined;

  constructor(host: LedgerHost) {
    this._host = host;
    this._events = new EventEmitter(host.events ?? new MemoryEventSink(), this._journal);
  }

  // ─── Initialization ──────────────────────────────────────────────────

  /**
   * Register the asset and bind its hooks. Callable exactly once.
   * The caller becomes the asset's administrator.
   */
  initialize(
    caller: AccountId,
    asset: AssetDescriptor,
    options?: InitializeOptions,
  ): AssetDescriptor {
    assertAccountId(caller);
    if (this._registry.initialized) {
      throw new LedgerError(
        "ALREADY_INITIALIZED",
        `Asset "${this._registry.descriptor.symbol}" is already initialized`,
      );
    }

    const hooks =
      options?.hooks ??
      standardHooks(
        this._host.activity,
        this._host.referenceBalances,
        resolvePolicy(options?.policy),
      );

    // Everything that can reject the hooks runs before the registry commits.
    const guard = this._registry.guard;
    const dispatcher = new HookDispatcher(hooks, guard);
    const stores = new StoreRegistry(guard, this._journal);

    const { descriptor, capabilities } = this._registry.initialize(asset);
    this._deployment = { administrator: caller, capabilities, dispatcher, stores };

    return descriptor;
  }

  isInitialized(): boolean {
    return this._deployment !== undefined;
  }

  // ─── Operations ──────────────────────────────────────────────────────

  /**
   * Create `amount` new units in `to`'s store.
   *
   * Only the administrator may mint. The deposit hook is not consulted.
   * An amount of zero is allowed and still emits a Mint event.
   */
  mint(caller: AccountId, to: AccountId, amount: bigint): LedgerEvent {
    const d = this._require();
    this._assertAdministrator(d, caller, "mint");

    return this._journal.atomically(() => {
      const value = toU64(amount);
      const store = d.stores.resolve(to, d.capabilities.extend);
      const minted = this._registry.mint(value, d.capabilities.mint);
      store.credit(minted, d.capabilities.transfer);
      return this._events.emit("Mint", this._symbol(), caller, to, value);
    });
  }

  /**
   * Destroy `amount` units held by `from`.
   *
   * Only the administrator may burn. The debit goes through the withdraw
   * hook, so the activity and cap gates apply to `from`.
   */
  burn(caller: AccountId, from: AccountId, amount: bigint): LedgerEvent {
    const d = this._require();
    this._assertAdministrator(d, caller, "burn");

    return this._journal.atomically(() => {
      const value = toU64(amount);
      const store = d.stores.resolve(from, d.capabilities.extend);
      const withdrawn = d.dispatcher.withdraw(store, value, d.capabilities.transfer);
      this._registry.burn(withdrawn, d.capabilities.burn);
      return this._events.emit("Burn", this._symbol(), caller, from, value);
    });
  }

  /**
   * Move `amount` units from the caller to `to`.
   *
   * The caller's debit passes the withdraw hook, then the recipient's
   * credit passes the deposit hook. If the deposit is rejected the debit
   * is rolled back with it.
   */
  transfer(caller: AccountId, to: AccountId, amount: bigint): LedgerEvent {
    const d = this._require();
    assertAccountId(caller);

    return this._journal.atomically(() => {
      const value = toU64(amount);
      const source = d.stores.resolve(caller, d.capabilities.extend);
      const withdrawn = d.dispatcher.withdraw(source, value, d.capabilities.transfer);
      const destination = d.stores.resolve(to, d.capabilities.extend);
      d.dispatcher.deposit(destination, withdrawn, d.capabilities.transfer);
      return this._events.emit("Transfer", this._symbol(), caller, to, value);
    });
  }

  /**
   * Rebuild balances, supply and the event sequence from events this
   * asset committed earlier, oldest first.
   *
   * Hooks are not evaluated (they held when the events were committed)
   * and nothing reaches the event sink. Only a ledger that has not
   * emitted any event may replay. All events apply or none do.
   */
  replay(events: readonly LedgerEvent[]): void {
    const d = this._require();
    if (this._events.emitted > 0) {
      throw new LedgerError(
        "INVALID_EVENT",
        `Cannot replay into a ledger that has already emitted ${this._events.emitted} events`,
      );
    }

    this._journal.atomically(() => {
      for (const event of events) {
        this._apply(d, event);
      }
    });
  }

  // ─── Read Accessors ──────────────────────────────────────────────────

  /**
   * Balance of `account`. Zero for accounts the ledger has never touched.
   */
  balanceOf(account: AccountId): bigint {
    return this._require().stores.balanceOf(account);
  }

  totalSupply(): bigint {
    this._require();
    return this._registry.supply;
  }

  assetDescriptor(): AssetDescriptor {
    return this._registry.descriptor;
  }

  administrator(): AccountId {
    return this._require().administrator;
  }

  /**
   * Descriptor, administrator and supply in one read.
   */
  info(): AssetInfo {
    const d = this._require();
    return {
      descriptor: this._registry.descriptor,
      administrator: d.administrator,
      totalSupply: this._registry.supply,
    };
  }

  /**
   * Every account store created so far, in creation order.
   */
  holders(): readonly Holding[] {
    return this._require().stores.holdings();
  }

  /**
   * Recompute Σ balances and compare it with the supply counter.
   */
  checkInvariants(): InvariantReport {
    const d = this._require();
    const sumOfBalances = d.stores.sum();
    const totalSupply = this._registry.supply;
    return {
      holds: sumOfBalances === totalSupply,
      totalSupply,
      sumOfBalances,
      holderCount: d.stores.count,
    };
  }

  /**
   * Number of events committed so far.
   */
  get eventCount(): number {
    return this._events.emitted;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _require(): Deployment {
    if (this._deployment === undefined) {
      throw new LedgerError("NOT_INITIALIZED", "Asset has not been initialized");
    }
    return this._deployment;
  }

  private _assertAdministrator(d: Deployment, caller: AccountId, op: string): void {
    assertAccountId(caller);
    if (caller !== d.administrator) {
      throw new LedgerError(
        "UNAUTHORIZED",
        `Account "${caller}" does not hold the ${op} capability`,
      );
    }
  }

  private _apply(d: Deployment, event: LedgerEvent): void {
    const expected = this._events.emitted + 1;
    if (event.asset !== this._symbol() || event.sequence !== expected) {
      throw new LedgerError(
        "INVALID_EVENT",
        `Expected event ${expected} of "${this._symbol()}", got event ${event.sequence} of "${event.asset}"`,
      );
    }
    if (event.kind !== "Transfer" && event.actor !== d.administrator) {
      throw new LedgerError(
        "INVALID_EVENT",
        `${event.kind} ${event.sequence} was issued by "${event.actor}", not the administrator`,
      );
    }

    const value = toU64(event.amount);
    const { extend, transfer } = d.capabilities;
    switch (event.kind) {
      case "Mint": {
        const minted = this._registry.mint(value, d.capabilities.mint);
        d.stores.resolve(event.counterparty, extend).credit(minted, transfer);
        break;
      }
      case "Burn": {
        const store = d.stores.resolve(event.counterparty, extend);
        this._registry.burn(store.debit(value, transfer), d.capabilities.burn);
        break;
      }
      case "Transfer": {
        const withdrawn = d.stores.resolve(event.actor, extend).debit(value, transfer);
        d.stores.resolve(event.counterparty, extend).credit(withdrawn, transfer);
        break;
      }
    }
    this._events.replayed(event);
  }

  private _symbol(): string {
    return this._registry.descriptor.symbol;
  }
}
