/**
 * @tollgate/ledger — Account balance stores.
 *
 * One BalanceStore per owner, created lazily the first time the ledger
 * touches that owner. Stores are never removed; a zero balance is a
 * valid terminal state.
 *
 * Rules:
 * - Balance is never negative
 * - Balance changes only through debit()/credit(), which demand the
 *   transfer capability
 * - Store creation demands the extend capability
 * - Every change is journaled so a failed operation leaves no trace
 */

import type { AccountId, Holding } from "@tollgate/types";
import { isAccountId } from "@tollgate/types";
import { checkedAdd, checkedSub, toU64 } from "./amount-math.js";
import type { Capability, CapabilityGuard } from "./capabilities.js";
import { FungibleAmount } from "./fungible-amount.js";
import type { Journal } from "./journal.js";
import { LedgerError } from "./types.js";

/**
 * Balance cell for a single owner.
 */
export class BalanceStore {
  private _balance = 0n;

  constructor(
    readonly owner: AccountId,
    private readonly _guard: CapabilityGuard,
    private readonly _journal: Journal,
  ) {}

  get balance(): bigint {
    return this._balance;
  }

  /**
   * Remove `amount` from this store and hand it back detached.
   * Fails with INSUFFICIENT_BALANCE when the balance is too low.
   */
  debit(amount: bigint, capability: Capability<"transfer">): FungibleAmount {
    this._guard.assert(capability, "transfer");
    const value = toU64(amount);
    const before = this._balance;

    const after = checkedSub(before, value);
    this._journal.record(() => {
      this._balance = before;
    });
    this._balance = after;

    return new FungibleAmount(value);
  }

  /**
   * Add a detached amount to this store, consuming it.
   */
  credit(amount: FungibleAmount, capability: Capability<"transfer">): void {
    this._guard.assert(capability, "transfer");
    const before = this._balance;

    const next = checkedAdd(before, amount.value);
    this._journal.record(() => {
      this._balance = before;
    });
    amount.consume();
    this._balance = next;
  }
}

/**
 * Resolves owners to their stores, creating them on demand.
 * Append-only: stores can be added but never removed (except by rollback).
 */
export class StoreRegistry {
  private readonly _stores: Map<AccountId, BalanceStore> = new Map();

  constructor(
    private readonly _guard: CapabilityGuard,
    private readonly _journal: Journal,
  ) {}

  /**
   * Get the store for `owner`, creating it if absent.
   */
  resolve(owner: AccountId, capability: Capability<"extend">): BalanceStore {
    this._guard.assert(capability, "extend");
    assertAccountId(owner);

    const existing = this._stores.get(owner);
    if (existing !== undefined) {
      return existing;
    }

    const store = new BalanceStore(owner, this._guard, this._journal);
    this._journal.record(() => {
      this._stores.delete(owner);
    });
    this._stores.set(owner, store);
    return store;
  }

  /**
   * Get a store without creating it.
   */
  get(owner: AccountId): BalanceStore | undefined {
    return this._stores.get(owner);
  }

  /**
   * Balance of `owner`, or zero when no store exists.
   */
  balanceOf(owner: AccountId): bigint {
    return this._stores.get(owner)?.balance ?? 0n;
  }

  /**
   * All stores as holdings, in creation order.
   */
  holdings(): readonly Holding[] {
    return [...this._stores.values()].map((s) => ({
      owner: s.owner,
      balance: s.balance,
    }));
  }

  /**
   * Sum of every store's balance.
   */
  sum(): bigint {
    let total = 0n;
    for (const store of this._stores.values()) {
      total += store.balance;
    }
    return total;
  }

  get count(): number {
    return this._stores.size;
  }
}

/**
 * Throw INVALID_ACCOUNT unless `owner` is a usable account identity.
 */
export function assertAccountId(owner: unknown): asserts owner is AccountId {
  if (!isAccountId(owner)) {
    throw new LedgerError("INVALID_ACCOUNT", `Invalid account identity: "${String(owner)}"`);
  }
}
