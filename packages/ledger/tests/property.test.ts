/**
 * Property-Based Tests for @tollgate/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY sequence
 * of operations:
 *
 * 1. Supply conservation: totalSupply == Σ balances after every operation
 * 2. Non-negativity: no balance ever drops below zero
 * 3. Rejection is side-effect free: a failed operation changes nothing
 * 4. Hooks cannot be bypassed: an inactive account is never debited
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { Ledger } from "../src/ledger.js";
import { LedgerError } from "../src/types.js";
import { ADMIN, GUSD, createTestHost } from "./fixtures.js";
import type { TestHost } from "./fixtures.js";

// =============================================================================
// Arbitraries
// =============================================================================

const ACCOUNTS = ["a1", "a2", "a3", "a4"] as const;

const arbAccount = fc.constantFrom(...ACCOUNTS);
const arbAmount = fc.bigInt({ min: 0n, max: 1_000n });

type Op =
  | { readonly kind: "mint"; readonly to: string; readonly amount: bigint }
  | { readonly kind: "burn"; readonly from: string; readonly amount: bigint }
  | { readonly kind: "transfer"; readonly from: string; readonly to: string; readonly amount: bigint };

const arbOp: fc.Arbitrary<Op> = fc.oneof(
  fc.record({ kind: fc.constant("mint" as const), to: arbAccount, amount: arbAmount }),
  fc.record({ kind: fc.constant("burn" as const), from: arbAccount, amount: arbAmount }),
  fc.record({
    kind: fc.constant("transfer" as const),
    from: arbAccount,
    to: arbAccount,
    amount: arbAmount,
  }),
);

/** Per-account host state: activity counter and reference balance. */
const arbHostState = fc.array(
  fc.record({
    activity: fc.bigInt({ min: 0n, max: 2n }),
    reference: fc.bigInt({ min: 900n, max: 1100n }),
  }),
  { minLength: ACCOUNTS.length, maxLength: ACCOUNTS.length },
);

// =============================================================================
// Helpers
// =============================================================================

function setup(state: readonly { activity: bigint; reference: bigint }[]): {
  host: TestHost;
  ledger: Ledger;
} {
  const host = createTestHost();
  ACCOUNTS.forEach((account, i) => {
    const s = state[i];
    if (s !== undefined) {
      host.activityOf.set(account, s.activity);
      host.referenceOf.set(account, s.reference);
    }
  });
  const ledger = new Ledger(host);
  ledger.initialize(ADMIN, GUSD);
  return { host, ledger };
}

function apply(ledger: Ledger, op: Op): void {
  switch (op.kind) {
    case "mint":
      ledger.mint(ADMIN, op.to, op.amount);
      return;
    case "burn":
      ledger.burn(ADMIN, op.from, op.amount);
      return;
    case "transfer":
      ledger.transfer(op.from, op.to, op.amount);
      return;
  }
}

function snapshot(ledger: Ledger): string {
  const holders = ledger.holders().map((h) => `${h.owner}=${h.balance.toString()}`);
  return `${ledger.totalSupply().toString()}|${holders.join(",")}|${String(ledger.eventCount)}`;
}

// =============================================================================
// Properties
// =============================================================================

describe("property: supply conservation", () => {
  it("totalSupply equals the sum of balances after every operation", () => {
    fc.assert(
      fc.property(arbHostState, fc.array(arbOp, { maxLength: 30 }), (state, ops) => {
        const { ledger } = setup(state);

        for (const op of ops) {
          try {
            apply(ledger, op);
          } catch (err) {
            if (!(err instanceof LedgerError)) throw err;
          }
          const report = ledger.checkInvariants();
          expect(report.holds).toBe(true);
          for (const holder of ledger.holders()) {
            expect(holder.balance >= 0n).toBe(true);
          }
        }
      }),
      { numRuns: 200 },
    );
  });
});

describe("property: rejection is side-effect free", () => {
  it("a rejected operation leaves supply, balances, holders and events unchanged", () => {
    fc.assert(
      fc.property(arbHostState, fc.array(arbOp, { maxLength: 30 }), (state, ops) => {
        const { host, ledger } = setup(state);

        for (const op of ops) {
          const before = snapshot(ledger);
          const eventsBefore = host.events.count;
          let rejected = false;
          try {
            apply(ledger, op);
          } catch (err) {
            if (!(err instanceof LedgerError)) throw err;
            rejected = true;
          }
          if (rejected) {
            expect(snapshot(ledger)).toBe(before);
            expect(host.events.count).toBe(eventsBefore);
          } else {
            expect(host.events.count).toBe(eventsBefore + 1);
          }
        }
      }),
      { numRuns: 200 },
    );
  });
});

describe("property: hooks cannot be bypassed", () => {
  it("an account with zero activity is never debited", () => {
    fc.assert(
      fc.property(arbHostState, fc.array(arbOp, { maxLength: 30 }), (state, ops) => {
        const { host, ledger } = setup(state);

        for (const op of ops) {
          const source = op.kind === "mint" ? undefined : op.from;
          const before = source !== undefined ? ledger.balanceOf(source) : 0n;
          try {
            apply(ledger, op);
          } catch (err) {
            if (!(err instanceof LedgerError)) throw err;
          }
          if (source !== undefined && host.activity.activityCounter(source) === 0n) {
            const after = ledger.balanceOf(source);
            const selfTransfer = op.kind === "transfer" && op.to === source;
            if (!selfTransfer) {
              expect(after).toBe(before);
            }
          }
        }
      }),
      { numRuns: 200 },
    );
  });

  it("a withdrawal never succeeds unless the balance exceeds twice the amount", () => {
    fc.assert(
      fc.property(arbHostState, fc.array(arbOp, { maxLength: 30 }), (state, ops) => {
        const { ledger } = setup(state);

        for (const op of ops) {
          if (op.kind === "mint") {
            apply(ledger, op);
            continue;
          }
          const before = ledger.balanceOf(op.from);
          try {
            apply(ledger, op);
          } catch (err) {
            if (!(err instanceof LedgerError)) throw err;
            continue;
          }
          expect(before > op.amount * 2n).toBe(true);
        }
      }),
      { numRuns: 200 },
    );
  });
});
