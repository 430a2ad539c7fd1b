/**
 * Round Types
 *
 * One record per aggregation round. Round ids are 32-bit and strictly
 * sequential; round 0 is the genesis record.
 *
 * Rules:
 * - All types are readonly
 * - Answers and amounts are bigint (signed answers, unsigned amounts)
 * - Timestamps are unix seconds
 */

/** A 20-byte account identifier, 0x-prefixed hex. */
export type Address = `0x${string}`;

/** Arbitrary 0x-prefixed hex data. */
export type Hex = `0x${string}`;

/** Largest representable round id (uint32). */
export const MAX_ROUND_ID = 4_294_967_295;

/**
 * A stored round.
 *
 * `answeredInRound` is the round in which `answer` was computed. A round
 * created but not yet answered carries the previous round's values.
 */
export interface Round {
  readonly answer: bigint;
  readonly startedAt: number;
  readonly updatedAt: number;
  readonly answeredInRound: number;
  /** Raw observations that produced `answer` (audit only). */
  readonly submissions: readonly bigint[];
  /** Per-oracle fee snapshot in effect when the round was created. */
  readonly paymentAmount: bigint;
}

/**
 * Public view of an answered round.
 */
export interface RoundData {
  readonly roundId: number;
  readonly answer: bigint;
  readonly startedAt: number;
  readonly updatedAt: number;
  readonly answeredInRound: number;
}

/**
 * Lifecycle of a round id inside one submission.
 */
export type RoundState = "unreported" | "created" | "answered";

/**
 * A signed batch as presented to the aggregator.
 * `prices`, `r`, `s` and `v` are parallel arrays.
 */
export interface SubmissionBatch {
  readonly roundId: number;
  readonly prices: readonly bigint[];
  /** Unix seconds; the batch is rejected once `now > deadline`. */
  readonly deadline: number;
  readonly r: readonly Hex[];
  readonly s: readonly Hex[];
  readonly v: readonly number[];
}
