/**
 * @roundfeed/ledger — Submitter reward vesting.
 *
 * Each submitter has one record: a `remainVesting` balance that unlocks
 * linearly over VESTING_PERIOD_SECONDS into `releasable`.
 *
 * There is no scheduler. A record is brought up to date only when it is
 * touched: before every append and before every release.
 *
 * API surface:
 * - append() — unlock, then add new locked reward
 * - update() — unlock only
 * - release() — unlock, then take everything releasable
 * - withdrawable() — read-only projection of update() at a given time
 */

import type { Address, SubmitterVesting, VestingRecord } from "@roundfeed/types";
import { assertAmount, checkedAdd, minAmount } from "./amount-math.js";
import type { Checkpointable, UnlockResult, VestingSnapshot } from "./types.js";
import { LedgerError, VESTING_PERIOD_SECONDS } from "./types.js";

const EMPTY_RECORD: VestingRecord = {
  lastUpdated: 0,
  releasable: 0n,
  remainVesting: 0n,
};

/**
 * One unlock step, as a pure function of the record and the time.
 *
 *   unlockable = min(remainVesting, (now − lastUpdated) × remainVesting / period)
 *
 * `lastUpdated` moves forward to `now`, even when nothing is vesting.
 * A clock that reads earlier than `lastUpdated` unlocks nothing and leaves
 * the stamp where it was, so no interval is counted twice.
 */
export function computeUnlock(
  record: VestingRecord,
  now: number,
  period: number = VESTING_PERIOD_SECONDS,
): UnlockResult {
  let unlocked = 0n;

  if (record.remainVesting > 0n) {
    const elapsed = BigInt(Math.max(0, now - record.lastUpdated));
    unlocked = minAmount(
      record.remainVesting,
      (elapsed * record.remainVesting) / BigInt(period),
    );
  }

  return {
    unlocked,
    releasable: record.releasable + unlocked,
    remainVesting: record.remainVesting - unlocked,
    lastUpdated: Math.max(record.lastUpdated, now),
  };
}

export class VestingLedger
  implements Checkpointable<ReadonlyMap<Address, VestingRecord>>
{
  private readonly _records: Map<Address, VestingRecord> = new Map();
  private readonly _period: number;

  constructor(period: number = VESTING_PERIOD_SECONDS) {
    if (!Number.isInteger(period) || period <= 0) {
      throw new LedgerError("INVALID_AMOUNT", `Vesting period must be a positive integer, got ${String(period)}`);
    }
    this._period = period;
  }

  get period(): number {
    return this._period;
  }

  /**
   * The stored record for a submitter, or an all-zero record.
   */
  get(submitter: Address): VestingRecord {
    return this._records.get(submitter) ?? EMPTY_RECORD;
  }

  has(submitter: Address): boolean {
    return this._records.has(submitter);
  }

  /**
   * What a release at `now` would pay, without mutating anything.
   */
  withdrawable(submitter: Address, now: number): bigint {
    return computeUnlock(this.get(submitter), now, this._period).releasable;
  }

  /**
   * Run the unlock step for a submitter and store the result.
   */
  update(submitter: Address, now: number): UnlockResult {
    const result = computeUnlock(this.get(submitter), now, this._period);
    this._records.set(submitter, {
      lastUpdated: result.lastUpdated,
      releasable: result.releasable,
      remainVesting: result.remainVesting,
    });
    return result;
  }

  /**
   * Add newly earned reward to a submitter's locked balance.
   *
   * The unlock step runs first so the new amount does not inherit the
   * elapsed time of the older balance.
   */
  append(submitter: Address, amount: bigint, now: number): VestingRecord {
    assertAmount(amount);
    const current = computeUnlock(this.get(submitter), now, this._period);
    const record: VestingRecord = {
      lastUpdated: current.lastUpdated,
      releasable: current.releasable,
      remainVesting: checkedAdd(current.remainVesting, amount),
    };
    this._records.set(submitter, record);
    return record;
  }

  /**
   * Unlock, then zero and return everything releasable.
   * The caller is responsible for moving the returned amount out of custody.
   */
  release(submitter: Address, now: number): bigint {
    const result = this.update(submitter, now);
    if (result.releasable === 0n) {
      return 0n;
    }
    this._records.set(submitter, {
      lastUpdated: result.lastUpdated,
      releasable: 0n,
      remainVesting: result.remainVesting,
    });
    return result.releasable;
  }

  /**
   * Sum of releasable and still-vesting balances over every submitter.
   */
  totalOutstanding(): bigint {
    let total = 0n;
    for (const record of this._records.values()) {
      total += record.releasable + record.remainVesting;
    }
    return total;
  }

  entries(): readonly SubmitterVesting[] {
    return [...this._records.entries()].map(([submitter, record]) => ({
      submitter,
      ...record,
    }));
  }

  // ─── Checkpoint ──────────────────────────────────────────────────────

  checkpoint(): ReadonlyMap<Address, VestingRecord> {
    return new Map(this._records);
  }

  rollback(checkpoint: ReadonlyMap<Address, VestingRecord>): void {
    this._records.clear();
    for (const [submitter, record] of checkpoint) {
      this._records.set(submitter, record);
    }
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): VestingSnapshot {
    return { version: 1, records: this.entries() };
  }

  restore(snapshot: VestingSnapshot): void {
    if (snapshot.version !== 1) {
      throw new LedgerError("INVALID_SNAPSHOT", `Unsupported vesting snapshot version: ${String(snapshot.version)}`);
    }
    for (const record of snapshot.records) {
      assertAmount(record.releasable, "releasable");
      assertAmount(record.remainVesting, "remainVesting");
    }

    this._records.clear();
    for (const { submitter, lastUpdated, releasable, remainVesting } of snapshot.records) {
      this._records.set(submitter, { lastUpdated, releasable, remainVesting });
    }
  }

  static fromSnapshot(snapshot: VestingSnapshot, period?: number): VestingLedger {
    const ledger = new VestingLedger(period);
    ledger.restore(snapshot);
    return ledger;
  }
}
