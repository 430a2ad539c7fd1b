/**
 * Tests for submitter reward vesting.
 *
 * Covers:
 * - Pure unlock step (linear, truncating, capped)
 * - Append runs the unlock step before adding new reward
 * - Release pays everything releasable and zeroes it
 * - Idempotence at the same instant
 * - Snapshot / restore
 */

import { describe, it, expect, beforeEach } from "vitest";
import { VestingLedger, computeUnlock } from "../src/vesting-ledger.js";
import { LedgerError, VESTING_PERIOD_SECONDS } from "../src/types.js";

const SUBMITTER = "0x00000000000000000000000000000000000000c3";
const OTHER = "0x00000000000000000000000000000000000000d4";
const T0 = 1_700_000_000;
const HALF = VESTING_PERIOD_SECONDS / 2;

// ─── computeUnlock ───────────────────────────────────────────────────────

describe("computeUnlock", () => {
  it("unlocks linearly with elapsed time", () => {
    const result = computeUnlock(
      { lastUpdated: T0, releasable: 0n, remainVesting: 2_592_000n },
      T0 + HALF,
    );

    expect(result).toEqual({
      unlocked: 1_296_000n,
      releasable: 1_296_000n,
      remainVesting: 1_296_000n,
      lastUpdated: T0 + HALF,
    });
  });

  it("truncates toward zero", () => {
    const result = computeUnlock(
      { lastUpdated: T0, releasable: 0n, remainVesting: 100n },
      T0 + 1,
    );
    expect(result.unlocked).toBe(0n);
    expect(result.remainVesting).toBe(100n);
  });

  it("caps the unlock at the remaining balance", () => {
    const result = computeUnlock(
      { lastUpdated: T0, releasable: 5n, remainVesting: 100n },
      T0 + VESTING_PERIOD_SECONDS * 3,
    );
    expect(result.releasable).toBe(105n);
    expect(result.remainVesting).toBe(0n);
  });

  it("stamps lastUpdated even with nothing vesting", () => {
    const result = computeUnlock(
      { lastUpdated: T0, releasable: 7n, remainVesting: 0n },
      T0 + 60,
    );
    expect(result).toEqual({
      unlocked: 0n,
      releasable: 7n,
      remainVesting: 0n,
      lastUpdated: T0 + 60,
    });
  });

  it("unlocks nothing when the clock reads earlier than lastUpdated", () => {
    const result = computeUnlock(
      { lastUpdated: T0, releasable: 0n, remainVesting: 1000n },
      T0 - 100,
    );
    expect(result.unlocked).toBe(0n);
    expect(result.lastUpdated).toBe(T0);
  });
});

// ─── VestingLedger ───────────────────────────────────────────────────────

describe("VestingLedger", () => {
  let ledger: VestingLedger;

  beforeEach(() => {
    ledger = new VestingLedger();
  });

  it("rejects a non-positive period", () => {
    expect(() => new VestingLedger(0)).toThrow(LedgerError);
  });

  it("returns an all-zero record for unknown submitters", () => {
    expect(ledger.has(SUBMITTER)).toBe(false);
    expect(ledger.get(SUBMITTER)).toEqual({
      lastUpdated: 0,
      releasable: 0n,
      remainVesting: 0n,
    });
  });

  describe("append", () => {
    it("creates the record lazily on first append", () => {
      const record = ledger.append(SUBMITTER, 2n, T0);

      expect(ledger.has(SUBMITTER)).toBe(true);
      expect(record).toEqual({ lastUpdated: T0, releasable: 0n, remainVesting: 2n });
    });

    it("unlocks the old balance before adding the new one", () => {
      ledger.append(SUBMITTER, 2_592_000n, T0);
      const record = ledger.append(SUBMITTER, 1000n, T0 + HALF);

      expect(record).toEqual({
        lastUpdated: T0 + HALF,
        releasable: 1_296_000n,
        remainVesting: 1_297_000n,
      });
    });

    it("rejects negative amounts", () => {
      expect(() => ledger.append(SUBMITTER, -1n, T0)).toThrow(LedgerError);
      expect(ledger.has(SUBMITTER)).toBe(false);
    });
  });

  describe("update", () => {
    it("does not count an interval twice after the clock steps back", () => {
      const short = new VestingLedger(1000);
      short.append(SUBMITTER, 1000n, 0);

      expect(short.update(SUBMITTER, 500).unlocked).toBe(500n);
      expect(short.update(SUBMITTER, 250).unlocked).toBe(0n);
      expect(short.update(SUBMITTER, 500).unlocked).toBe(0n);
      expect(short.get(SUBMITTER)).toEqual({
        lastUpdated: 500,
        releasable: 500n,
        remainVesting: 500n,
      });
    });

    it("is idempotent at the same instant", () => {
      ledger.append(SUBMITTER, 2_592_000n, T0);
      const first = ledger.update(SUBMITTER, T0 + HALF);
      const second = ledger.update(SUBMITTER, T0 + HALF);

      expect(first.unlocked).toBe(1_296_000n);
      expect(second.unlocked).toBe(0n);
      expect(ledger.get(SUBMITTER)).toEqual({
        lastUpdated: T0 + HALF,
        releasable: 1_296_000n,
        remainVesting: 1_296_000n,
      });
    });
  });

  describe("release", () => {
    it("pays out everything releasable and zeroes it", () => {
      ledger.append(SUBMITTER, 2_592_000n, T0);
      const paid = ledger.release(SUBMITTER, T0 + HALF);

      expect(paid).toBe(1_296_000n);
      expect(ledger.get(SUBMITTER)).toEqual({
        lastUpdated: T0 + HALF,
        releasable: 0n,
        remainVesting: 1_296_000n,
      });
    });

    it("returns zero and only stamps the time when nothing is releasable", () => {
      ledger.append(SUBMITTER, 100n, T0);
      expect(ledger.release(SUBMITTER, T0)).toBe(0n);
      expect(ledger.get(SUBMITTER).remainVesting).toBe(100n);
    });

    it("a second release at the same instant pays nothing", () => {
      ledger.append(SUBMITTER, 2_592_000n, T0);
      ledger.release(SUBMITTER, T0 + VESTING_PERIOD_SECONDS);
      expect(ledger.release(SUBMITTER, T0 + VESTING_PERIOD_SECONDS)).toBe(0n);
    });
  });

  describe("withdrawable", () => {
    it("projects the unlock without mutating", () => {
      ledger.append(SUBMITTER, 2_592_000n, T0);

      expect(ledger.withdrawable(SUBMITTER, T0 + HALF)).toBe(1_296_000n);
      expect(ledger.get(SUBMITTER).lastUpdated).toBe(T0);
    });
  });

  describe("totalOutstanding", () => {
    it("sums releasable and vesting over all submitters", () => {
      ledger.append(SUBMITTER, 10n, T0);
      ledger.append(OTHER, 5n, T0);
      expect(ledger.totalOutstanding()).toBe(15n);
    });
  });

  describe("checkpoint / rollback", () => {
    it("drops records created and changes made after the checkpoint", () => {
      ledger.append(SUBMITTER, 10n, T0);
      const checkpoint = ledger.checkpoint();

      ledger.append(SUBMITTER, 5n, T0 + 1);
      ledger.append(OTHER, 7n, T0 + 1);
      ledger.rollback(checkpoint);

      expect(ledger.get(SUBMITTER)).toEqual({ lastUpdated: T0, releasable: 0n, remainVesting: 10n });
      expect(ledger.has(OTHER)).toBe(false);
    });
  });

  describe("snapshot / restore", () => {
    it("round-trips every record", () => {
      ledger.append(SUBMITTER, 10n, T0);
      ledger.append(OTHER, 5n, T0 + 1);

      const restored = VestingLedger.fromSnapshot(ledger.snapshot());
      expect(restored.entries()).toEqual([
        { submitter: SUBMITTER, lastUpdated: T0, releasable: 0n, remainVesting: 10n },
        { submitter: OTHER, lastUpdated: T0 + 1, releasable: 0n, remainVesting: 5n },
      ]);
    });

    it("rejects records with negative balances", () => {
      expect(() =>
        ledger.restore({
          version: 1,
          records: [{ submitter: SUBMITTER, lastUpdated: T0, releasable: -1n, remainVesting: 0n }],
        }),
      ).toThrow(LedgerError);
    });
  });
});
