/**
 * @roundfeed/ledger — Internal types for the funds and vesting ledgers.
 *
 * Rules:
 * - All exported state is readonly
 * - Amounts are bigint, never negative
 * - Fail-closed: an operation that would break an invariant throws
 *   before touching state
 */

import type { Address, Funds, SubmitterVesting } from "@roundfeed/types";

// ─── Constants ───────────────────────────────────────────────────────────

/** Linear vesting period for submitter rewards: 30 days, in seconds. */
export const VESTING_PERIOD_SECONDS = 30 * 24 * 60 * 60;

/** Reward rates are expressed in tenths of a percent (1000 = 100 %). */
export const REWARD_RATE_DENOMINATOR = 1000n;

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INSUFFICIENT_FUNDS"
  | "INVALID_AMOUNT"
  | "ARITHMETIC_OVERFLOW"
  | "ARITHMETIC_UNDERFLOW"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the ledgers.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Checkpointing ───────────────────────────────────────────────────────

/**
 * A ledger that can mark its state and return to the mark.
 *
 * The aggregator checkpoints every ledger before a commit and rolls all
 * of them back if the commit throws. A checkpoint is only valid until
 * the next rollback or the next commit that succeeds.
 */
export interface Checkpointable<C> {
  checkpoint(): C;
  rollback(checkpoint: C): void;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable funds ledger state.
 */
export interface FundsSnapshot {
  readonly version: 1;
  readonly funds: Funds;
  /** Running per-oracle reward accumulator (bookkeeping only). */
  readonly oracleRewardAccumulator: bigint;
  readonly paidByOracle: readonly OraclePaymentTotal[];
}

/**
 * Total paid to one oracle across all rounds.
 */
export interface OraclePaymentTotal {
  readonly oracle: Address;
  readonly total: bigint;
  readonly payments: number;
  readonly lastPaidRound: number;
}

/**
 * Serializable vesting ledger state.
 */
export interface VestingSnapshot {
  readonly version: 1;
  readonly records: readonly SubmitterVesting[];
}

// ─── Results ─────────────────────────────────────────────────────────────

/**
 * Outcome of one unlock step on a vesting record.
 */
export interface UnlockResult {
  /** Amount moved from remainVesting to releasable by this step. */
  readonly unlocked: bigint;
  readonly releasable: bigint;
  readonly remainVesting: bigint;
  readonly lastUpdated: number;
}
