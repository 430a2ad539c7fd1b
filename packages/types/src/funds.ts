/**
 * Funds Types
 *
 * The prepaid pool is split in two: `available` can still be spent on
 * oracle payments, `allocated` is already owed (submitter rewards that
 * have not been withdrawn).
 */

import type { Address } from "./round.js";

/**
 * Scalar funds ledger.
 * `available` is never negative.
 */
export interface Funds {
  readonly available: bigint;
  readonly allocated: bigint;
}

/**
 * Linearly vesting submitter reward.
 *
 * `releasable + remainVesting` grows only on append and shrinks only on
 * withdrawal; time moves value from `remainVesting` to `releasable`.
 */
export interface VestingRecord {
  readonly lastUpdated: number;
  readonly releasable: bigint;
  readonly remainVesting: bigint;
}

/**
 * A vesting record keyed by its submitter, as exported in snapshots.
 */
export interface SubmitterVesting extends VestingRecord {
  readonly submitter: Address;
}
