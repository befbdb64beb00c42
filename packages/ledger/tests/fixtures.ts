/**
 * Shared fixtures for @tollgate/ledger tests.
 *
 * An in-process host: activity counters and reference-currency balances
 * live in plain maps the tests set directly.
 */

import type { AccountId, AssetDescriptor } from "@tollgate/types";
import type { LedgerErrorCode, LedgerHost } from "../src/types.js";
import { LedgerError } from "../src/types.js";
import { MemoryEventSink } from "../src/events.js";
import { Ledger } from "../src/ledger.js";

export const ADMIN = "admin";
export const ALICE = "alice";
export const BOB = "bob";
export const CAROL = "carol";

export const GUSD: AssetDescriptor = {
  name: "Gated Dollar",
  symbol: "GUSD",
  decimals: 8,
};

export interface TestHost extends LedgerHost {
  readonly events: MemoryEventSink;
  readonly activityOf: Map<AccountId, bigint>;
  readonly referenceOf: Map<AccountId, bigint>;
}

export function createTestHost(): TestHost {
  const activityOf = new Map<AccountId, bigint>();
  const referenceOf = new Map<AccountId, bigint>();
  return {
    activityOf,
    referenceOf,
    events: new MemoryEventSink(),
    activity: {
      activityCounter: (account) => activityOf.get(account) ?? 0n,
    },
    referenceBalances: {
      referenceBalance: (account) => referenceOf.get(account) ?? 0n,
    },
  };
}

/**
 * A host where every listed account is active and solvent.
 */
export function createActiveHost(accounts: readonly AccountId[]): TestHost {
  const host = createTestHost();
  for (const account of accounts) {
    host.activityOf.set(account, 1n);
    host.referenceOf.set(account, 1001n);
  }
  return host;
}

/**
 * An initialized GUSD ledger administered by ADMIN.
 */
export function createLedger(host: TestHost): Ledger {
  const ledger = new Ledger(host);
  ledger.initialize(ADMIN, GUSD);
  return ledger;
}

/**
 * Run `fn` and return the LedgerError code it throws, or undefined.
 * Non-ledger errors are rethrown.
 */
export function codeOf(fn: () => unknown): LedgerErrorCode | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof LedgerError) return err.code;
    throw err;
  }
  return undefined;
}
