/**
 * @tollgate/ledger — Capability bundle.
 *
 * Four authority tokens gate every privileged path:
 * - extend   — create an account store
 * - mint     — create units from nothing (and raise the supply counter)
 * - burn     — destroy units (and lower the supply counter)
 * - transfer — debit or credit a store directly
 *
 * A capability is only valid if the guard that issued it still holds it
 * in its private WeakSet. A structurally identical object, a capability
 * from another ledger, or one of the wrong kind fails with UNAUTHORIZED.
 * Nothing here is exported from the package entry point.
 */

import { LedgerError } from "./types.js";

export type CapabilityKind = "extend" | "mint" | "burn" | "transfer";

/**
 * An unforgeable authority handle.
 * The private brand makes the type nominal at compile time;
 * the issuing guard's WeakSet makes it nominal at run time.
 */
export class Capability<K extends CapabilityKind = CapabilityKind> {
  private readonly _brand: "capability" = "capability";

  constructor(readonly kind: K) {}

  toJSON(): never {
    throw new LedgerError("UNAUTHORIZED", "Capabilities cannot be serialized");
  }
}

export interface CapabilityBundle {
  readonly extend: Capability<"extend">;
  readonly mint: Capability<"mint">;
  readonly burn: Capability<"burn">;
  readonly transfer: Capability<"transfer">;
}

/**
 * Issues exactly one bundle and verifies capabilities presented back to it.
 */
export class CapabilityGuard {
  private readonly _issued = new WeakSet<Capability>();
  private _bundleIssued = false;

  issueBundle(): CapabilityBundle {
    if (this._bundleIssued) {
      throw new LedgerError(
        "ALREADY_INITIALIZED",
        "A capability bundle has already been issued for this asset",
      );
    }
    this._bundleIssued = true;

    const bundle: CapabilityBundle = {
      extend: this._issue("extend"),
      mint: this._issue("mint"),
      burn: this._issue("burn"),
      transfer: this._issue("transfer"),
    };
    return Object.freeze(bundle);
  }

  /**
   * Throw UNAUTHORIZED unless `capability` was issued here and is of `kind`.
   */
  assert<K extends CapabilityKind>(
    capability: Capability<K> | undefined,
    kind: K,
  ): void {
    if (capability === undefined) {
      throw new LedgerError("UNAUTHORIZED", `Missing ${kind} capability`);
    }
    if (!this._issued.has(capability) || capability.kind !== kind) {
      throw new LedgerError(
        "UNAUTHORIZED",
        `Capability presented for "${kind}" was not issued for this asset`,
      );
    }
  }

  private _issue<K extends CapabilityKind>(kind: K): Capability<K> {
    const capability = new Capability(kind);
    Object.freeze(capability);
    this._issued.add(capability);
    return capability;
  }
}
