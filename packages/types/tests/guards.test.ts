/**
 * Runtime type guard tests for @tollgate/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  U64_MAX,
  isU64,
  isAccountId,
  isAssetDescriptor,
  isLedgerEventKind,
  isLedgerEvent,
  isEventMetadata,
  isDomainEvent,
} from "../src/guards.js";

// =============================================================================
// Asset guards
// =============================================================================

describe("isU64", () => {
  it("accepts zero and the maximum", () => {
    expect(isU64(0n)).toBe(true);
    expect(isU64(U64_MAX)).toBe(true);
  });

  it("rejects values outside the range", () => {
    expect(isU64(-1n)).toBe(false);
    expect(isU64(U64_MAX + 1n)).toBe(false);
  });

  it("rejects numbers (must be bigint)", () => {
    expect(isU64(5)).toBe(false);
    expect(isU64("5")).toBe(false);
  });
});

describe("isAccountId", () => {
  it("accepts a non-empty string", () => {
    expect(isAccountId("alice")).toBe(true);
  });

  it("rejects blank strings and non-strings", () => {
    expect(isAccountId("")).toBe(false);
    expect(isAccountId("   ")).toBe(false);
    expect(isAccountId(42)).toBe(false);
  });
});

describe("isAssetDescriptor", () => {
  const valid = { name: "Gated Dollar", symbol: "GUSD", decimals: 8 };

  it("accepts a minimal descriptor", () => {
    expect(isAssetDescriptor(valid)).toBe(true);
  });

  it("accepts optional fields", () => {
    expect(
      isAssetDescriptor({
        ...valid,
        maxSupply: 1_000_000n,
        iconUri: "https://example.test/icon.png",
        projectUri: "https://example.test",
      }),
    ).toBe(true);
  });

  it("rejects decimals outside the u8 range", () => {
    expect(isAssetDescriptor({ ...valid, decimals: 256 })).toBe(false);
    expect(isAssetDescriptor({ ...valid, decimals: -1 })).toBe(false);
    expect(isAssetDescriptor({ ...valid, decimals: 1.5 })).toBe(false);
  });

  it("rejects empty name or symbol", () => {
    expect(isAssetDescriptor({ ...valid, name: "" })).toBe(false);
    expect(isAssetDescriptor({ ...valid, symbol: "" })).toBe(false);
  });

  it("rejects a non-bigint maxSupply", () => {
    expect(isAssetDescriptor({ ...valid, maxSupply: 100 })).toBe(false);
  });

  it("rejects null", () => {
    expect(isAssetDescriptor(null)).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

describe("isLedgerEventKind", () => {
  it("accepts the three kinds", () => {
    expect(isLedgerEventKind("Mint")).toBe(true);
    expect(isLedgerEventKind("Burn")).toBe(true);
    expect(isLedgerEventKind("Transfer")).toBe(true);
  });

  it("rejects other strings", () => {
    expect(isLedgerEventKind("mint")).toBe(false);
    expect(isLedgerEventKind("Freeze")).toBe(false);
  });
});

describe("isLedgerEvent", () => {
  const valid = {
    kind: "Mint",
    actor: "admin",
    counterparty: "alice",
    amount: 100n,
    asset: "GUSD",
    sequence: 1,
  };

  it("accepts a valid event", () => {
    expect(isLedgerEvent(valid)).toBe(true);
  });

  it("rejects a string amount", () => {
    expect(isLedgerEvent({ ...valid, amount: "100" })).toBe(false);
  });

  it("rejects sequence zero", () => {
    expect(isLedgerEvent({ ...valid, sequence: 0 })).toBe(false);
  });

  it("rejects an unknown kind", () => {
    expect(isLedgerEvent({ ...valid, kind: "Freeze" })).toBe(false);
  });
});

describe("isEventMetadata", () => {
  const valid = {
    eventId: "evt-1",
    timestamp: "2024-01-15T10:00:00.000Z",
    actor: "admin",
    correlationId: "corr-1",
    source: "ledger",
  };

  it("accepts valid metadata", () => {
    expect(isEventMetadata(valid)).toBe(true);
  });

  it("rejects an unknown source", () => {
    expect(isEventMetadata({ ...valid, source: "oracle" })).toBe(false);
  });

  it("rejects missing fields", () => {
    const { correlationId: _omit, ...rest } = valid;
    expect(isEventMetadata(rest)).toBe(false);
  });
});

describe("isDomainEvent", () => {
  it("accepts a valid event", () => {
    expect(
      isDomainEvent({
        type: "asset.minted",
        metadata: {
          eventId: "evt-1",
          timestamp: "2024-01-15T10:00:00.000Z",
          actor: "admin",
          correlationId: "corr-1",
          source: "ledger",
        },
        payload: { amount: "100" },
      }),
    ).toBe(true);
  });

  it("rejects a null payload", () => {
    expect(
      isDomainEvent({
        type: "asset.minted",
        metadata: {
          eventId: "evt-1",
          timestamp: "2024-01-15T10:00:00.000Z",
          actor: "admin",
          correlationId: "corr-1",
          source: "ledger",
        },
        payload: null,
      }),
    ).toBe(false);
  });
});
