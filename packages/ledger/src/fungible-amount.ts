/**
 * @tollgate/ledger — Detached amounts.
 *
 * A FungibleAmount is value that has left one store and not yet reached
 * another. It carries no owner. It must be consumed exactly once, by a
 * deposit or a burn.
 */

import { toU64 } from "./amount-math.js";
import { LedgerError } from "./types.js";

export class FungibleAmount {
  private readonly _value: bigint;
  private _consumed = false;

  constructor(value: bigint) {
    this._value = toU64(value);
  }

  /**
   * Remaining value. Zero once consumed.
   */
  get value(): bigint {
    return this._consumed ? 0n : this._value;
  }

  get consumed(): boolean {
    return this._consumed;
  }

  /**
   * Take the value out and retire this amount.
   */
  consume(): bigint {
    this._assertLive();
    this._consumed = true;
    return this._value;
  }

  private _assertLive(): void {
    if (this._consumed) {
      throw new LedgerError(
        "AMOUNT_ALREADY_CONSUMED",
        "Detached amount has already been consumed",
      );
    }
  }
}
