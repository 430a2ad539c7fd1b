/**
 * @roundfeed/ledger — Funds ledger.
 *
 * Tracks the prepaid pool as two balances:
 * - available: still spendable on oracle payments
 * - allocated: committed to obligations not yet withdrawn
 *
 * Every oracle payment moves `paymentAmount` from available to allocated.
 * Available funds are recomputed from the custody balance on refresh,
 * so deposits and withdrawals show up without explicit credits.
 *
 * Rules:
 * - available never goes negative
 * - A failing operation leaves every balance untouched
 */

import type { Address, Funds } from "@roundfeed/types";
import {
  assertAmount,
  checkedAdd,
  checkedMul,
  checkedSub,
  mulDiv,
} from "./amount-math.js";
import type {
  Checkpointable,
  FundsSnapshot,
  OraclePaymentTotal,
} from "./types.js";
import { LedgerError, REWARD_RATE_DENOMINATOR } from "./types.js";

// ─── Reward split ────────────────────────────────────────────────────────

/**
 * How one batch's payments divide between oracles and the submitter.
 */
export interface RewardSplit {
  /** Portion of one payment that counts as the oracle's reward. */
  readonly oracleShare: bigint;
  /** Total moved from available to allocated for the batch. */
  readonly totalPaid: bigint;
  /** What is left for the submitter after every oracle share. */
  readonly submitterReward: bigint;
}

/**
 * Split a batch of `signerCount` payments.
 *
 *   oracleShare     = paymentAmount × (1000 − rewardRateX10) / 1000
 *   totalPaid       = signerCount × paymentAmount
 *   submitterReward = totalPaid − signerCount × oracleShare
 *
 * The submitter's reward is the exact remainder, so the truncation in
 * `oracleShare` never creates or destroys value.
 */
export function computeRewardSplit(
  paymentAmount: bigint,
  signerCount: number,
  rewardRateX10: number,
): RewardSplit {
  assertAmount(paymentAmount, "paymentAmount");
  assertRewardRate(rewardRateX10);
  if (!Number.isInteger(signerCount) || signerCount < 0) {
    throw new LedgerError("INVALID_AMOUNT", `signerCount must be a non-negative integer, got ${String(signerCount)}`);
  }

  const count = BigInt(signerCount);
  const oracleShare = mulDiv(
    paymentAmount,
    REWARD_RATE_DENOMINATOR - BigInt(rewardRateX10),
    REWARD_RATE_DENOMINATOR,
  );
  const totalPaid = checkedMul(paymentAmount, count);
  const submitterReward = checkedSub(totalPaid, checkedMul(oracleShare, count));

  return { oracleShare, totalPaid, submitterReward };
}

/**
 * Reward rates are tenths of a percent in [0, 1000].
 */
export function assertRewardRate(rewardRateX10: number): void {
  if (!Number.isInteger(rewardRateX10) || rewardRateX10 < 0 || rewardRateX10 > 1000) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `rewardRateX10 must be an integer in [0, 1000], got ${String(rewardRateX10)}`,
    );
  }
}

// ─── Ledger ──────────────────────────────────────────────────────────────

export class FundsLedger implements Checkpointable<FundsSnapshot> {
  private _available = 0n;
  private _allocated = 0n;
  private _oracleRewardAccumulator = 0n;
  private readonly _paid: Map<Address, OraclePaymentTotal> = new Map();

  constructor(initial?: Funds) {
    if (initial !== undefined) {
      assertAmount(initial.available, "available");
      assertAmount(initial.allocated, "allocated");
      this._available = initial.available;
      this._allocated = initial.allocated;
    }
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  get available(): bigint {
    return this._available;
  }

  get allocated(): bigint {
    return this._allocated;
  }

  /** Running per-oracle reward total. Bookkeeping only. */
  get oracleRewardAccumulator(): bigint {
    return this._oracleRewardAccumulator;
  }

  funds(): Funds {
    return { available: this._available, allocated: this._allocated };
  }

  /**
   * Whether `count` payments of `paymentAmount` fit in available funds.
   */
  canPay(paymentAmount: bigint, count = 1): boolean {
    return this._available >= paymentAmount * BigInt(count);
  }

  /**
   * Totals paid to one oracle, if it was ever paid.
   */
  paidTo(oracle: Address): OraclePaymentTotal | undefined {
    return this._paid.get(oracle);
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  /**
   * Pay one oracle for one signature in `roundId`.
   *
   * Called once per signature, so an address signing twice in a batch is
   * paid twice.
   */
  payOracle(roundId: number, oracle: Address, paymentAmount: bigint): void {
    assertAmount(paymentAmount, "paymentAmount");
    if (this._available < paymentAmount) {
      throw new LedgerError(
        "INSUFFICIENT_FUNDS",
        `Cannot pay ${paymentAmount.toString()} to ${oracle} in round ${String(roundId)}: only ${this._available.toString()} available`,
      );
    }

    const allocated = checkedAdd(this._allocated, paymentAmount);
    this._available -= paymentAmount;
    this._allocated = allocated;

    const previous = this._paid.get(oracle);
    this._paid.set(oracle, {
      oracle,
      total: (previous?.total ?? 0n) + paymentAmount,
      payments: (previous?.payments ?? 0) + 1,
      lastPaidRound: roundId,
    });
  }

  /**
   * Add one oracle share to the running accumulator.
   * Returns the share that was added.
   */
  accrueOracleReward(paymentAmount: bigint, rewardRateX10: number): bigint {
    const { oracleShare } = computeRewardSplit(paymentAmount, 1, rewardRateX10);
    this._oracleRewardAccumulator = checkedAdd(this._oracleRewardAccumulator, oracleShare);
    return oracleShare;
  }

  /**
   * Release an allocated obligation that has just been paid out of custody.
   */
  release(amount: bigint): void {
    assertAmount(amount);
    this._allocated = checkedSub(this._allocated, amount);
  }

  /**
   * Recompute available funds from the custody balance.
   * Returns true when the available balance changed.
   */
  refresh(custodyBalance: bigint): boolean {
    assertAmount(custodyBalance, "custodyBalance");
    const next = checkedSub(custodyBalance, this._allocated);
    if (next === this._available) {
      return false;
    }
    this._available = next;
    return true;
  }

  /**
   * Fail unless `amount` can leave custody without touching allocated funds.
   */
  assertWithdrawable(amount: bigint): void {
    assertAmount(amount);
    if (amount > this._available) {
      throw new LedgerError(
        "INSUFFICIENT_FUNDS",
        `Cannot withdraw ${amount.toString()}: only ${this._available.toString()} available`,
      );
    }
  }

  // ─── Checkpoint ──────────────────────────────────────────────────────

  checkpoint(): FundsSnapshot {
    return this.snapshot();
  }

  rollback(checkpoint: FundsSnapshot): void {
    this.restore(checkpoint);
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): FundsSnapshot {
    return {
      version: 1,
      funds: this.funds(),
      oracleRewardAccumulator: this._oracleRewardAccumulator,
      paidByOracle: [...this._paid.values()],
    };
  }

  restore(snapshot: FundsSnapshot): void {
    if (snapshot.version !== 1) {
      throw new LedgerError("INVALID_SNAPSHOT", `Unsupported funds snapshot version: ${String(snapshot.version)}`);
    }
    assertAmount(snapshot.funds.available, "available");
    assertAmount(snapshot.funds.allocated, "allocated");
    assertAmount(snapshot.oracleRewardAccumulator, "oracleRewardAccumulator");

    this._available = snapshot.funds.available;
    this._allocated = snapshot.funds.allocated;
    this._oracleRewardAccumulator = snapshot.oracleRewardAccumulator;
    this._paid.clear();
    for (const entry of snapshot.paidByOracle) {
      this._paid.set(entry.oracle, entry);
    }
  }

  static fromSnapshot(snapshot: FundsSnapshot): FundsLedger {
    const ledger = new FundsLedger();
    ledger.restore(snapshot);
    return ledger;
  }
}
