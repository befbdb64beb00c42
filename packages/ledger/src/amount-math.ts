/**
 * @tollgate/ledger — Deterministic u64 amount arithmetic.
 *
 * All arithmetic uses bigint. Every amount the core stores or accepts
 * lies in [0, U64_MAX]; anything else fails closed.
 *
 * Rules:
 * - No floating-point operations
 * - Overflow past U64_MAX is an error, never a wrap
 * - Subtraction below zero is an error, never a negative balance
 */

import { U64_MAX } from "@tollgate/types";
import { LedgerError } from "./types.js";

/**
 * Assert a value is a u64 bigint and return it.
 */
export function toU64(value: unknown, label = "amount"): bigint {
  if (typeof value !== "bigint") {
    throw new LedgerError("INVALID_AMOUNT", `${label} must be a bigint, got ${typeof value}`);
  }
  if (value < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `${label} must not be negative, got ${value.toString()}`);
  }
  if (value > U64_MAX) {
    throw new LedgerError("OVERFLOW", `${label} ${value.toString()} exceeds the u64 range`);
  }
  return value;
}

/**
 * a + b, failing with OVERFLOW past U64_MAX.
 */
export function checkedAdd(a: bigint, b: bigint): bigint {
  const sum = a + b;
  if (sum > U64_MAX) {
    throw new LedgerError(
      "OVERFLOW",
      `${a.toString()} + ${b.toString()} exceeds the u64 range`,
    );
  }
  return sum;
}

/**
 * a - b, failing with INSUFFICIENT_BALANCE below zero.
 */
export function checkedSub(a: bigint, b: bigint): bigint {
  if (b > a) {
    throw new LedgerError(
      "INSUFFICIENT_BALANCE",
      `Cannot subtract ${b.toString()} from ${a.toString()}`,
    );
  }
  return a - b;
}

/**
 * Parse a base-unit integer string ("150000000") into a u64.
 */
export function parseBaseUnits(text: string): bigint {
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid base-unit amount: "${text}"`);
  }
  return toU64(BigInt(trimmed));
}

/**
 * Parse a display-unit decimal string into base units.
 *
 * "1.5" with decimals=8 → 150000000n
 * "100" with decimals=2 → 10000n
 */
export function parseUnits(text: string, decimals: number): bigint {
  const trimmed = text.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the asset allows ${String(decimals)}`,
    );
  }

  return toU64(BigInt(intPart + fracPart.padEnd(decimals, "0")));
}

/**
 * Format base units as a display-unit decimal string.
 *
 * 150000000n with decimals=8 → "1.50000000"
 * 42n with decimals=0 → "42"
 */
export function formatUnits(amount: bigint, decimals: number): string {
  const value = toU64(amount);
  if (decimals === 0) {
    return value.toString();
  }

  const str = value.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  return `${intPart}.${fracPart}`;
}
