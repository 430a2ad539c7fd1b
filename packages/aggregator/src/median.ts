/**
 * Median of signed integer observations.
 *
 * Odd length: the middle element of the sorted list.
 * Even length: the mean of the two central elements, truncated toward zero.
 */

import { AggregatorError } from "./types.js";

function compare(a: bigint, b: bigint): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function median(values: readonly bigint[]): bigint {
  if (values.length === 0) {
    throw new AggregatorError("MALFORMED_BATCH", "Cannot take the median of an empty list");
  }

  const sorted = [...values].sort(compare);
  const middle = Math.floor(sorted.length / 2);
  const upper = sorted[middle] ?? 0n;

  if (sorted.length % 2 === 1) {
    return upper;
  }

  const lower = sorted[middle - 1] ?? 0n;
  return (lower + upper) / 2n;
}
