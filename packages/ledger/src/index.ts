/**
 * @tollgate/ledger — Hooked fungible-asset ledger core.
 *
 * A pure TypeScript core with zero runtime dependencies.
 * Enforces:
 * - total supply == Σ account balances after every operation
 * - no negative balance, no u64 overflow
 * - every transfer and burn debit passes the withdraw hook
 * - every transfer credit passes the deposit hook
 * - all-or-nothing commitment of every operation
 *
 * Capabilities, stores and the dispatcher stay inside the package;
 * hosts see only the Ledger and the types below.
 */

// Core engine
export { Ledger } from "./ledger.js";

// Standard hooks
export {
  activityGate,
  proportionalCapGate,
  solvencyGate,
  standardHooks,
  resolvePolicy,
} from "./hooks.js";

// Event sink
export { MemoryEventSink } from "./events.js";

// Amount arithmetic
export {
  toU64,
  checkedAdd,
  checkedSub,
  parseBaseUnits,
  parseUnits,
  formatUnits,
} from "./amount-math.js";

// Types
export type {
  LedgerErrorCode,
  HookName,
  GateFailure,
  GateRequest,
  Gate,
  HookPredicates,
  HookPolicy,
  ActivityOracle,
  ReferenceBalanceOracle,
  EventSink,
  LedgerHost,
  InitializeOptions,
  InvariantReport,
  AssetInfo,
} from "./types.js";

export { LedgerError, DEFAULT_HOOK_POLICY } from "./types.js";
