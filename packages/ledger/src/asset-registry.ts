/**
 * @tollgate/ledger — Asset registry.
 *
 * Holds the one asset descriptor and the one authoritative supply counter.
 * `initialize()` succeeds exactly once and is the only place a capability
 * bundle is ever issued.
 *
 * Rules:
 * - The descriptor is frozen at initialization
 * - Supply rises only with the mint capability, falls only with burn
 * - Supply never exceeds maxSupply (when set) or U64_MAX
 */

import type { AssetDescriptor } from "@tollgate/types";
import { isAssetDescriptor } from "@tollgate/types";
import { checkedAdd, checkedSub, toU64 } from "./amount-math.js";
import type { Capability, CapabilityBundle } from "./capabilities.js";
import { CapabilityGuard } from "./capabilities.js";
import { FungibleAmount } from "./fungible-amount.js";
import type { Journal } from "./journal.js";
import { LedgerError } from "./types.js";

export interface RegistryInitResult {
  readonly descriptor: AssetDescriptor;
  readonly capabilities: CapabilityBundle;
}

export class AssetRegistry {
  readonly guard: CapabilityGuard = new CapabilityGuard();

  private _descriptor: AssetDescriptor | undefined;
  private _supply = 0n;

  constructor(private readonly _journal: Journal) {}

  /**
   * Register the asset. Throws ALREADY_INITIALIZED on a second call.
   */
  initialize(asset: AssetDescriptor): RegistryInitResult {
    if (this._descriptor !== undefined) {
      throw new LedgerError(
        "ALREADY_INITIALIZED",
        `Asset "${this._descriptor.symbol}" is already initialized`,
      );
    }
    if (!isAssetDescriptor(asset)) {
      throw new LedgerError(
        "INVALID_ASSET",
        "Asset needs a non-empty name and symbol, integer decimals in [0, 255], and a u64 maxSupply if any",
      );
    }

    const descriptor: AssetDescriptor = Object.freeze({
      name: asset.name,
      symbol: asset.symbol,
      decimals: asset.decimals,
      ...(asset.maxSupply !== undefined ? { maxSupply: asset.maxSupply } : {}),
      ...(asset.iconUri !== undefined ? { iconUri: asset.iconUri } : {}),
      ...(asset.projectUri !== undefined ? { projectUri: asset.projectUri } : {}),
    });

    const capabilities = this.guard.issueBundle();
    this._descriptor = descriptor;
    return { descriptor, capabilities };
  }

  get initialized(): boolean {
    return this._descriptor !== undefined;
  }

  /**
   * The asset descriptor. Throws NOT_INITIALIZED before initialize().
   */
  get descriptor(): AssetDescriptor {
    if (this._descriptor === undefined) {
      throw new LedgerError("NOT_INITIALIZED", "Asset has not been initialized");
    }
    return this._descriptor;
  }

  get supply(): bigint {
    return this._supply;
  }

  /**
   * Create `amount` new units, detached, and raise the supply counter.
   */
  mint(amount: bigint, capability: Capability<"mint">): FungibleAmount {
    this.guard.assert(capability, "mint");
    const value = toU64(amount);
    const before = this._supply;
    const after = checkedAdd(before, value);

    const max = this.descriptor.maxSupply;
    if (max !== undefined && after > max) {
      throw new LedgerError(
        "OVERFLOW",
        `Minting ${value.toString()} would raise supply to ${after.toString()}, above the maximum ${max.toString()}`,
      );
    }

    this._journal.record(() => {
      this._supply = before;
    });
    this._supply = after;
    return new FungibleAmount(value);
  }

  /**
   * Destroy a detached amount and lower the supply counter.
   */
  burn(amount: FungibleAmount, capability: Capability<"burn">): bigint {
    this.guard.assert(capability, "burn");
    const before = this._supply;
    const after = checkedSub(before, amount.value);
    this._journal.record(() => {
      this._supply = before;
    });
    const value = amount.consume();
    this._supply = after;
    return value;
  }
}
