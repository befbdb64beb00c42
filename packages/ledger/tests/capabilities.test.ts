/**
 * Tests for capability issuance and verification.
 */

import { describe, it, expect } from "vitest";
import { Capability, CapabilityGuard } from "../src/capabilities.js";
import { LedgerError } from "../src/types.js";
import { codeOf } from "./fixtures.js";

describe("CapabilityGuard", () => {
  it("issues one capability of each kind", () => {
    const bundle = new CapabilityGuard().issueBundle();
    expect(bundle.extend.kind).toBe("extend");
    expect(bundle.mint.kind).toBe("mint");
    expect(bundle.burn.kind).toBe("burn");
    expect(bundle.transfer.kind).toBe("transfer");
  });

  it("issues a bundle only once", () => {
    const guard = new CapabilityGuard();
    guard.issueBundle();
    expect(() => guard.issueBundle()).toThrow(LedgerError);
  });

  it("accepts its own capability of the right kind", () => {
    const guard = new CapabilityGuard();
    const bundle = guard.issueBundle();
    expect(() => guard.assert(bundle.mint, "mint")).not.toThrow();
  });

  it("rejects a missing capability", () => {
    const guard = new CapabilityGuard();
    expect(() => guard.assert(undefined, "burn")).toThrow("Missing burn capability");
  });

  it("rejects a capability constructed outside the guard", () => {
    const guard = new CapabilityGuard();
    guard.issueBundle();
    const forged = new Capability("transfer");
    expect(() => guard.assert(forged, "transfer")).toThrow(
      'Capability presented for "transfer" was not issued for this asset',
    );
  });

  it("rejects a capability issued by another guard", () => {
    const guard = new CapabilityGuard();
    guard.issueBundle();
    const foreign = new CapabilityGuard().issueBundle();
    expect(codeOf(() => guard.assert(foreign.mint, "mint"))).toBe("UNAUTHORIZED");
  });

  it("issues frozen capabilities", () => {
    const bundle = new CapabilityGuard().issueBundle();
    expect(Object.isFrozen(bundle)).toBe(true);
    expect(Object.isFrozen(bundle.transfer)).toBe(true);
  });

  it("refuses to serialize a capability", () => {
    const bundle = new CapabilityGuard().issueBundle();
    expect(() => JSON.stringify(bundle)).toThrow("Capabilities cannot be serialized");
  });
});
