/**
 * @tollgate/ledger — Hook dispatcher.
 *
 * Every peer-to-peer debit and credit of the asset passes through here.
 * The dispatcher evaluates the bound hook's gates in order, stops at the
 * first one that fails, and only then touches the store.
 *
 * withdraw(): gates → balance check → debit → detached amount
 * deposit():  gates → credit (consumes the detached amount)
 *
 * The hooks are bound once in the constructor and never replaced.
 */

import type { Capability, CapabilityGuard } from "./capabilities.js";
import type { BalanceStore } from "./balance-store.js";
import type { FungibleAmount } from "./fungible-amount.js";
import { freezeHooks } from "./hooks.js";
import { toU64 } from "./amount-math.js";
import type { GateRequest, HookName, HookPredicates } from "./types.js";
import { LedgerError } from "./types.js";

export class HookDispatcher {
  private readonly _hooks: HookPredicates;

  constructor(
    hooks: HookPredicates,
    private readonly _guard: CapabilityGuard,
  ) {
    this._hooks = freezeHooks(hooks);
  }

  /**
   * Debit `amount` from `store` after the withdraw hook passes.
   */
  withdraw(
    store: BalanceStore,
    amount: bigint,
    capability: Capability<"transfer">,
  ): FungibleAmount {
    this._guard.assert(capability, "transfer");
    const value = toU64(amount);

    this._evaluate("withdraw", {
      owner: store.owner,
      amount: value,
      balance: store.balance,
    });

    if (value > store.balance) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Account "${store.owner}" holds ${store.balance.toString()}, cannot withdraw ${value.toString()}`,
      );
    }

    return store.debit(value, capability);
  }

  /**
   * Credit a detached amount to `store` after the deposit hook passes.
   */
  deposit(
    store: BalanceStore,
    amount: FungibleAmount,
    capability: Capability<"transfer">,
  ): void {
    this._guard.assert(capability, "transfer");
    if (amount.consumed) {
      throw new LedgerError(
        "AMOUNT_ALREADY_CONSUMED",
        "Detached amount has already been consumed",
      );
    }

    this._evaluate("deposit", {
      owner: store.owner,
      amount: amount.value,
      balance: store.balance,
    });

    store.credit(amount, capability);
  }

  private _evaluate(hook: HookName, request: GateRequest): void {
    for (const gate of this._hooks[hook]) {
      if (!gate.check(request)) {
        throw new LedgerError(
          gate.code,
          `${hook} rejected by ${gate.name} gate for account "${request.owner}" (amount ${request.amount.toString()})`,
          { hook, gate: gate.name },
        );
      }
    }
  }
}
