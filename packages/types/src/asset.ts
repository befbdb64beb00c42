/**
 * Asset Types
 *
 * Primitives describing the single fungible asset a ledger manages.
 *
 * Rules:
 * - Amounts are unsigned 64-bit integers in base units, carried as bigint
 * - The descriptor is written once at initialization and never changes
 * - Display metadata (icon, project URI) is opaque to the ledger
 */

/**
 * Identity of an account on the host ledger.
 * Resolved by the host's identity provider; the ledger trusts it as given.
 */
export type AccountId = string;

/**
 * Immutable description of the asset.
 */
export interface AssetDescriptor {
  /** Human-readable name (e.g., "Gated Dollar") */
  readonly name: string;

  /** Ticker symbol (e.g., "GUSD") */
  readonly symbol: string;

  /**
   * Number of decimal places in the display unit (0-255).
   * 8 decimals means 1.0 display unit = 100000000 base units.
   */
  readonly decimals: number;

  /** Upper bound on total supply in base units. Unbounded when absent. */
  readonly maxSupply?: bigint | undefined;

  readonly iconUri?: string | undefined;
  readonly projectUri?: string | undefined;
}

/**
 * Balance of a single account, as reported by read accessors.
 */
export interface Holding {
  readonly owner: AccountId;
  readonly balance: bigint;
}
