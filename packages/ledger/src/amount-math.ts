/**
 * @roundfeed/ledger — Checked integer arithmetic for token amounts.
 *
 * Token amounts are unsigned 256-bit integers carried as bigint.
 * Every operation checks its bounds and throws instead of wrapping.
 *
 * Rules:
 * - No floating-point operations
 * - Division truncates toward zero (bigint semantics)
 * - Zero runtime dependencies
 */

import { LedgerError } from "./types.js";

/** Largest representable token amount (uint256). */
export const MAX_UINT256 = (1n << 256n) - 1n;

/**
 * Assert that a value is a valid token amount: a bigint in [0, 2^256).
 */
export function assertAmount(value: bigint, label = "amount"): void {
  if (typeof value !== "bigint") {
    throw new LedgerError("INVALID_AMOUNT", `${label} must be a bigint, got ${typeof value}`);
  }
  if (value < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `${label} must not be negative, got ${value.toString()}`);
  }
  if (value > MAX_UINT256) {
    throw new LedgerError("INVALID_AMOUNT", `${label} exceeds uint256`);
  }
}

/**
 * a + b, failing when the sum leaves uint256.
 */
export function checkedAdd(a: bigint, b: bigint): bigint {
  const sum = a + b;
  if (sum > MAX_UINT256) {
    throw new LedgerError(
      "ARITHMETIC_OVERFLOW",
      `${a.toString()} + ${b.toString()} overflows uint256`,
    );
  }
  return sum;
}

/**
 * a − b, failing when the result would be negative.
 */
export function checkedSub(a: bigint, b: bigint): bigint {
  if (b > a) {
    throw new LedgerError(
      "ARITHMETIC_UNDERFLOW",
      `${a.toString()} - ${b.toString()} underflows`,
    );
  }
  return a - b;
}

/**
 * a × b, failing when the product leaves uint256.
 */
export function checkedMul(a: bigint, b: bigint): bigint {
  const product = a * b;
  if (product > MAX_UINT256) {
    throw new LedgerError(
      "ARITHMETIC_OVERFLOW",
      `${a.toString()} * ${b.toString()} overflows uint256`,
    );
  }
  return product;
}

/**
 * (a × b) / d, truncated toward zero.
 */
export function mulDiv(a: bigint, b: bigint, d: bigint): bigint {
  if (d === 0n) {
    throw new LedgerError("INVALID_AMOUNT", "Division by zero");
  }
  return checkedMul(a, b) / d;
}

export function minAmount(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

/**
 * Parse a base-unit decimal string ("1000") into a bigint amount.
 *
 * Only plain non-negative integers are accepted: token amounts are
 * always expressed in the token's smallest unit.
 */
export function parseAmount(amount: string): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const value = BigInt(trimmed);
  assertAmount(value);
  return value;
}

/**
 * Render an amount as a base-unit decimal string.
 */
export function formatAmount(amount: bigint): string {
  return amount.toString();
}
