/**
 * @tollgate/ledger — Internal types for the ledger core.
 *
 * These extend the shared @tollgate/types with structures used only
 * by the balance-management and hook-dispatch core.
 *
 * Rules:
 * - All types are readonly
 * - Amounts are bigint base units in the u64 range
 * - Fail-closed: every rejected operation throws, never silently succeeds
 */

import type { AccountId, AssetDescriptor, LedgerEvent } from "@tollgate/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "ALREADY_INITIALIZED"
  | "NOT_INITIALIZED"
  | "INVALID_ASSET"
  | "INVALID_POLICY"
  | "INVALID_ACCOUNT"
  | "INVALID_AMOUNT"
  | "UNAUTHORIZED"
  | "INACTIVE_ACCOUNT"
  | "CAP_EXCEEDED"
  | "MINIMUM_BALANCE_NOT_MET"
  | "INSUFFICIENT_BALANCE"
  | "OVERFLOW"
  | "AMOUNT_ALREADY_CONSUMED"
  | "INVALID_EVENT";

/** Which side of a balance change a hook guards. */
export type HookName = "withdraw" | "deposit";

/**
 * Where a gate failure happened. Present only on errors raised by a gate.
 */
export interface GateFailure {
  readonly hook: HookName;
  readonly gate: string;
}

/**
 * Structured error from the ledger core.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly failure: GateFailure | undefined;

  constructor(code: LedgerErrorCode, message: string, failure?: GateFailure) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
    this.failure = failure;
  }
}

// ─── Hook Types ──────────────────────────────────────────────────────────

/**
 * What a gate sees when it is evaluated.
 * `balance` is the owner's balance before the pending change.
 */
export interface GateRequest {
  readonly owner: AccountId;
  readonly amount: bigint;
  readonly balance: bigint;
}

/**
 * A single validation predicate.
 *
 * `check` must be a pure read of ledger or host state. Returning false
 * aborts the operation with `code`.
 */
export interface Gate {
  readonly name: string;
  readonly code: LedgerErrorCode;
  check(request: GateRequest): boolean;
}

/**
 * The withdraw and deposit hooks bound at initialization.
 * Gates run in array order; the first failure aborts.
 */
export interface HookPredicates {
  readonly withdraw: readonly Gate[];
  readonly deposit: readonly Gate[];
}

/**
 * Constants for the standard hooks.
 *
 * - Proportional cap: a withdraw of `amount` passes only when
 *   `balance > amount * capRate / scaleFactor`
 * - Solvency: a deposit passes only when the recipient's reference-currency
 *   balance is strictly greater than `minimumReferenceBalance`
 */
export interface HookPolicy {
  readonly capRate: bigint;
  readonly scaleFactor: bigint;
  readonly minimumReferenceBalance: bigint;
}

export const DEFAULT_HOOK_POLICY: HookPolicy = {
  capRate: 200n,
  scaleFactor: 100n,
  minimumReferenceBalance: 1000n,
} as const;

// ─── Host Ports ──────────────────────────────────────────────────────────

/**
 * Host-tracked count of an account's committed transactions.
 * Monotonically non-decreasing; zero means the account was never active.
 */
export interface ActivityOracle {
  activityCounter(account: AccountId): bigint;
}

/**
 * Balance of an account in the host's reference currency.
 */
export interface ReferenceBalanceOracle {
  referenceBalance(account: AccountId): bigint;
}

/**
 * Append-only destination for committed ledger events.
 * The core never reads from it.
 */
export interface EventSink {
  append(event: LedgerEvent): void;
}

/**
 * Everything the ledger consumes from its host.
 */
export interface LedgerHost {
  readonly activity: ActivityOracle;
  readonly referenceBalances: ReferenceBalanceOracle;
  /** Defaults to an in-memory sink when absent */
  readonly events?: EventSink | undefined;
}

// ─── Initialization ──────────────────────────────────────────────────────

/**
 * Options for initializing a ledger.
 *
 * `hooks` replaces the standard hooks entirely; `policy` tunes the
 * standard hooks and is ignored when `hooks` is given.
 */
export interface InitializeOptions {
  readonly hooks?: HookPredicates | undefined;
  readonly policy?: Partial<HookPolicy> | undefined;
}

// ─── Query Types ─────────────────────────────────────────────────────────

/**
 * Result of recomputing the supply invariant.
 */
export interface InvariantReport {
  readonly holds: boolean;
  readonly totalSupply: bigint;
  readonly sumOfBalances: bigint;
  readonly holderCount: number;
}

/**
 * Read-only view of the asset after initialization.
 */
export interface AssetInfo {
  readonly descriptor: AssetDescriptor;
  readonly administrator: AccountId;
  readonly totalSupply: bigint;
}
