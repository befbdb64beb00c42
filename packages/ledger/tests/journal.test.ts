/**
 * Tests for the atomic scope.
 */

import { describe, it, expect } from "vitest";
import { Journal } from "../src/journal.js";

describe("Journal", () => {
  it("returns the work's result and runs commit actions in order", () => {
    const journal = new Journal();
    const order: string[] = [];

    const result = journal.atomically(() => {
      journal.onCommit(() => order.push("first"));
      journal.onCommit(() => order.push("second"));
      return 42;
    });

    expect(result).toBe(42);
    expect(order).toEqual(["first", "second"]);
  });

  it("replays undo actions in reverse on failure and skips commits", () => {
    const journal = new Journal();
    const order: string[] = [];

    expect(() =>
      journal.atomically(() => {
        journal.record(() => order.push("undo-1"));
        journal.record(() => order.push("undo-2"));
        journal.onCommit(() => order.push("commit"));
        throw new Error("boom");
      }),
    ).toThrow("boom");

    expect(order).toEqual(["undo-2", "undo-1"]);
  });

  it("rolls back when a commit action throws", () => {
    const journal = new Journal();
    let value = 0;

    expect(() =>
      journal.atomically(() => {
        value = 1;
        journal.record(() => {
          value = 0;
        });
        journal.onCommit(() => {
          throw new Error("sink down");
        });
      }),
    ).toThrow("sink down");

    expect(value).toBe(0);
  });

  it("refuses to record outside a scope", () => {
    const journal = new Journal();
    expect(() => journal.record(() => undefined)).toThrow(
      "Ledger state can only change inside an atomic scope",
    );
  });

  it("refuses to nest scopes", () => {
    const journal = new Journal();
    expect(() =>
      journal.atomically(() => journal.atomically(() => 1)),
    ).toThrow("Atomic scopes do not nest");
  });

  it("closes the scope after success and after failure", () => {
    const journal = new Journal();
    journal.atomically(() => 1);
    expect(() => journal.record(() => undefined)).toThrow(
      "Ledger state can only change inside an atomic scope",
    );

    expect(() =>
      journal.atomically(() => {
        throw new Error("x");
      }),
    ).toThrow("x");
    expect(journal.atomically(() => 2)).toBe(2);
  });
});
