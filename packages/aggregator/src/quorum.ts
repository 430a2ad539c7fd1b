/**
 * Quorum gate.
 *
 * Runs before any signature is recovered: deadline, batch shape and the
 * threshold percentage over the declared batch size.
 */

import type { SubmissionBatch } from "@roundfeed/types";
import { isHex } from "@roundfeed/types";
import { AggregatorError, MIN_THRESHOLD_PERCENT } from "./types.js";

const SIGNATURE_WORD = /^0x[0-9a-fA-F]{64}$/;
const INT256_MAX = 2n ** 255n - 1n;
const INT256_MIN = -(2n ** 255n);

/**
 * Whole-percent share of `signatures` over `enabledOracles`, truncated.
 * Zero enabled oracles yields 0.
 */
export function quorumPercent(signatures: number, enabledOracles: number): number {
  if (enabledOracles <= 0) {
    return 0;
  }
  return Math.trunc((signatures * 100) / enabledOracles);
}

export function meetsQuorum(
  signatures: number,
  enabledOracles: number,
  thresholdPercent: number = MIN_THRESHOLD_PERCENT,
): boolean {
  if (enabledOracles <= 0) {
    return false;
  }
  return quorumPercent(signatures, enabledOracles) >= thresholdPercent;
}

/**
 * Fail unless the four parallel arrays line up and every price, deadline
 * and signature component is well formed.
 */
export function assertBatchShape(batch: SubmissionBatch): void {
  const size = batch.prices.length;
  if (size === 0) {
    throw new AggregatorError("MALFORMED_BATCH", "Batch carries no observations");
  }
  if (batch.r.length !== size || batch.s.length !== size || batch.v.length !== size) {
    throw new AggregatorError(
      "MALFORMED_BATCH",
      `Array lengths differ: prices=${String(size)} r=${String(batch.r.length)} s=${String(batch.s.length)} v=${String(batch.v.length)}`,
    );
  }

  if (!Number.isSafeInteger(batch.deadline) || batch.deadline < 0) {
    throw new AggregatorError("MALFORMED_BATCH", `deadline must be a non-negative integer, got ${String(batch.deadline)}`);
  }

  for (let i = 0; i < size; i++) {
    const price = batch.prices[i];
    if (price === undefined || price > INT256_MAX || price < INT256_MIN) {
      throw new AggregatorError("MALFORMED_BATCH", `prices[${String(i)}] does not fit in int256`);
    }
    const r = batch.r[i];
    const s = batch.s[i];
    const v = batch.v[i];
    if (r === undefined || !isHex(r) || !SIGNATURE_WORD.test(r)) {
      throw new AggregatorError("MALFORMED_BATCH", `r[${String(i)}] is not a 32-byte hex word`);
    }
    if (s === undefined || !isHex(s) || !SIGNATURE_WORD.test(s)) {
      throw new AggregatorError("MALFORMED_BATCH", `s[${String(i)}] is not a 32-byte hex word`);
    }
    if (v === undefined || !Number.isInteger(v) || v < 0 || v > 255) {
      throw new AggregatorError("MALFORMED_BATCH", `v[${String(i)}] is not a byte`);
    }
  }
}

/**
 * The full gate, in order: deadline, shape, threshold.
 */
export function checkQuorum(
  batch: SubmissionBatch,
  enabledOracles: number,
  now: number,
  thresholdPercent: number = MIN_THRESHOLD_PERCENT,
): void {
  if (now > batch.deadline) {
    throw new AggregatorError(
      "EXPIRED_BATCH",
      `Batch deadline ${String(batch.deadline)} has passed (now ${String(now)})`,
    );
  }

  assertBatchShape(batch);

  const size = batch.prices.length;
  if (!meetsQuorum(size, enabledOracles, thresholdPercent)) {
    throw new AggregatorError(
      "QUORUM_NOT_MET",
      `${String(size)} of ${String(enabledOracles)} oracles is ${String(quorumPercent(size, enabledOracles))}%, below ${String(thresholdPercent)}%`,
    );
  }
}
