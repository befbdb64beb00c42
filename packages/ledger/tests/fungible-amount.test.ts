/**
 * Tests for detached amounts.
 */

import { describe, it, expect } from "vitest";
import { FungibleAmount } from "../src/fungible-amount.js";
import { LedgerError } from "../src/types.js";

describe("FungibleAmount", () => {
  it("consumes exactly once", () => {
    const amount = new FungibleAmount(10n);
    expect(amount.consume()).toBe(10n);
    expect(amount.consumed).toBe(true);
    expect(amount.value).toBe(0n);
    expect(() => amount.consume()).toThrow("Detached amount has already been consumed");
  });

  it("rejects a negative value", () => {
    expect(() => new FungibleAmount(-1n)).toThrow(LedgerError);
  });
});
