/**
 * @tollgate/ledger — Standard hook gates.
 *
 * Withdraw hook: account-activity gate, then proportional cap gate.
 * Deposit hook:  account-activity gate, then counterparty solvency gate.
 *
 * Each gate is a pure read of ledger or host state.
 */

import type {
  ActivityOracle,
  Gate,
  HookName,
  HookPolicy,
  HookPredicates,
  ReferenceBalanceOracle,
} from "./types.js";
import { DEFAULT_HOOK_POLICY, LedgerError } from "./types.js";

/**
 * Passes only for owners the host has seen commit at least one transaction.
 */
export function activityGate(activity: ActivityOracle): Gate {
  return {
    name: "account-activity",
    code: "INACTIVE_ACCOUNT",
    check: ({ owner }) => activity.activityCounter(owner) > 0n,
  };
}

/**
 * Passes only when `balance > amount * capRate / scaleFactor`.
 *
 * The cap is taken relative to the requested amount and compared against
 * the balance before the withdrawal. Integer division truncates.
 */
export function proportionalCapGate(policy: HookPolicy): Gate {
  const { capRate, scaleFactor } = policy;
  return {
    name: "proportional-cap",
    code: "CAP_EXCEEDED",
    check: ({ amount, balance }) => balance > (amount * capRate) / scaleFactor,
  };
}

/**
 * Passes only when the owner's reference-currency balance is strictly
 * above the policy floor.
 */
export function solvencyGate(
  referenceBalances: ReferenceBalanceOracle,
  policy: HookPolicy,
): Gate {
  const floor = policy.minimumReferenceBalance;
  return {
    name: "counterparty-solvency",
    code: "MINIMUM_BALANCE_NOT_MET",
    check: ({ owner }) => referenceBalances.referenceBalance(owner) > floor,
  };
}

/**
 * Fill in and validate a hook policy.
 */
export function resolvePolicy(overrides?: Partial<HookPolicy>): HookPolicy {
  const policy: HookPolicy = { ...DEFAULT_HOOK_POLICY, ...overrides };

  if (policy.scaleFactor <= 0n) {
    throw new LedgerError("INVALID_POLICY", "scaleFactor must be positive");
  }
  if (policy.capRate < 0n) {
    throw new LedgerError("INVALID_POLICY", "capRate must not be negative");
  }
  if (policy.minimumReferenceBalance < 0n) {
    throw new LedgerError("INVALID_POLICY", "minimumReferenceBalance must not be negative");
  }

  return Object.freeze(policy);
}

/**
 * Build the standard withdraw/deposit hook pair.
 */
export function standardHooks(
  activity: ActivityOracle,
  referenceBalances: ReferenceBalanceOracle,
  policy: HookPolicy = DEFAULT_HOOK_POLICY,
): HookPredicates {
  const gateActivity = activityGate(activity);
  return {
    withdraw: [gateActivity, proportionalCapGate(policy)],
    deposit: [gateActivity, solvencyGate(referenceBalances, policy)],
  };
}

/**
 * Copy and freeze a hook pair so it cannot be altered after binding.
 */
export function freezeHooks(hooks: HookPredicates): HookPredicates {
  return Object.freeze({
    withdraw: Object.freeze(gatesOf(hooks, "withdraw").map(freezeGate)),
    deposit: Object.freeze(gatesOf(hooks, "deposit").map(freezeGate)),
  });
}

function gatesOf(hooks: HookPredicates, hook: HookName): readonly Gate[] {
  const gates: unknown = hooks[hook];
  if (!Array.isArray(gates)) {
    throw new LedgerError("INVALID_POLICY", `The ${hook} hook must be a list of gates`);
  }
  return hooks[hook];
}

function freezeGate(gate: Gate): Gate {
  if (typeof gate.name !== "string" || typeof gate.check !== "function") {
    throw new LedgerError("INVALID_POLICY", "Every gate needs a name and a check function");
  }
  const check = gate.check.bind(gate);
  return Object.freeze({ name: gate.name, code: gate.code, check });
}
