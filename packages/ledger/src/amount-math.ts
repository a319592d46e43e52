/**
 * @cadence/ledger — Deterministic integer token arithmetic.
 *
 * Amounts are bigint counts of a token's smallest unit. There are no
 * decimals anywhere in the ledger.
 *
 * Rules:
 * - No floating-point operations
 * - Division truncates toward zero
 * - Every stored amount fits in a signed 128-bit integer
 */

import { I128_MAX } from "@cadence/types";
import { LedgerError } from "./types.js";

/**
 * Assert a transfer amount is strictly positive and within i128.
 */
export function assertPositiveAmount(amount: bigint, context: string): void {
  if (amount <= 0n || amount > I128_MAX) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${context}: amount must be a positive i128, got ${amount.toString()}`,
    );
  }
}

/**
 * `value * numerator / denominator`, truncating.
 *
 * The product is formed at full bigint width before dividing, so no
 * intermediate precision is lost.
 */
export function mulDiv(
  value: bigint,
  numerator: bigint,
  denominator: bigint,
): bigint {
  if (denominator === 0n) {
    throw new LedgerError("INVALID_AMOUNT", "mulDiv: division by zero");
  }
  return (value * numerator) / denominator;
}

export function minAmount(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function maxAmount(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

/** Clamp `value` into `[lo, hi]`. */
export function clampAmount(value: bigint, lo: bigint, hi: bigint): bigint {
  return minAmount(maxAmount(value, lo), hi);
}
