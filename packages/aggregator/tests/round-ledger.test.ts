import { describe, it, expect, beforeEach } from "vitest";
import { MAX_ROUND_ID } from "@roundfeed/types";
import { RoundLedger } from "../src/round-ledger.js";
import { AggregatorError } from "../src/types.js";

const GENESIS = 1_000;

describe("RoundLedger", () => {
  let ledger: RoundLedger;

  beforeEach(() => {
    ledger = new RoundLedger(GENESIS, 10n);
  });

  it("starts with an unanswered genesis round", () => {
    expect(ledger.lastReportedRound).toBe(0);
    expect(ledger.nextRoundId).toBe(1);
    expect(ledger.latestTimestamp()).toBe(GENESIS);
    expect(() => ledger.latestRoundData()).toThrow(AggregatorError);
  });

  describe("createNewRound", () => {
    it("only accepts the next id", () => {
      expect(() => ledger.createNewRound(2, 10n, GENESIS)).toThrow(
        expect.objectContaining({ code: "NON_SEQUENTIAL_ROUND" }),
      );
      expect(() => ledger.createNewRound(0, 10n, GENESIS)).toThrow(
        expect.objectContaining({ code: "NON_SEQUENTIAL_ROUND" }),
      );
      expect(ledger.lastReportedRound).toBe(0);
    });

    it("carries the previous answer forward", () => {
      ledger.createNewRound(1, 10n, 1_100);
      ledger.updateRoundPrice(1, [40n, 60n], 1_100);

      const round = ledger.createNewRound(2, 12n, 1_200);

      expect(round).toEqual({
        answer: 50n,
        startedAt: 1_200,
        updatedAt: 1_200,
        answeredInRound: 1,
        submissions: [],
        paymentAmount: 12n,
      });
    });
  });

  describe("updateRoundPrice", () => {
    it("stores the median, the raw prices and the time", () => {
      ledger.createNewRound(1, 10n, 1_100);
      ledger.updateRoundPrice(1, [3n, 1n, 2n], 1_150);

      expect(ledger.get(1)).toEqual({
        answer: 2n,
        startedAt: 1_100,
        updatedAt: 1_150,
        answeredInRound: 1,
        submissions: [3n, 1n, 2n],
        paymentAmount: 10n,
      });
    });

    it("fails for a round that was never created", () => {
      expect(() => ledger.updateRoundPrice(5, [1n], GENESIS)).toThrow(
        expect.objectContaining({ code: "NO_DATA" }),
      );
    });
  });

  describe("reads", () => {
    beforeEach(() => {
      ledger.createNewRound(1, 10n, 1_100);
      ledger.updateRoundPrice(1, [7n], 1_100);
    });

    it("returns round data for an answered round", () => {
      expect(ledger.getRoundInfo(1)).toEqual({
        roundId: 1,
        answer: 7n,
        startedAt: 1_100,
        updatedAt: 1_100,
        answeredInRound: 1,
      });
      expect(ledger.latestRoundData()).toEqual(ledger.getRoundInfo(1));
    });

    it("fails with NO_DATA past the last round and past the id range", () => {
      expect(() => ledger.getRoundInfo(2)).toThrow(expect.objectContaining({ code: "NO_DATA" }));
      expect(() => ledger.getRoundInfo(MAX_ROUND_ID + 1)).toThrow(
        expect.objectContaining({ code: "NO_DATA" }),
      );
      expect(() => ledger.getRoundInfo(0)).toThrow(expect.objectContaining({ code: "NO_DATA" }));
    });

    it("returns zero answers and timestamps for missing rounds", () => {
      expect(ledger.getAnswer(2)).toBe(0n);
      expect(ledger.getTimestamp(2)).toBe(0);
      expect(ledger.getAnswer(MAX_ROUND_ID + 1)).toBe(0n);
      expect(ledger.getTimestamp(-1)).toBe(0);
    });

    it("reports the latest values", () => {
      expect(ledger.latestRound()).toBe(1);
      expect(ledger.latestAnswer()).toBe(7n);
      expect(ledger.latestTimestamp()).toBe(1_100);
    });
  });

  describe("checkpoint / rollback", () => {
    it("drops rounds created after the checkpoint", () => {
      ledger.createNewRound(1, 10n, 1_100);
      ledger.updateRoundPrice(1, [7n], 1_100);
      const checkpoint = ledger.checkpoint();

      ledger.createNewRound(2, 10n, 1_200);
      ledger.updateRoundPrice(2, [9n], 1_200);
      ledger.rollback(checkpoint);

      expect(ledger.lastReportedRound).toBe(1);
      expect(ledger.get(2)).toBeUndefined();
      expect(ledger.latestAnswer()).toBe(7n);
    });
  });

  describe("snapshot", () => {
    it("round-trips through fromSnapshot", () => {
      ledger.createNewRound(1, 10n, 1_100);
      ledger.updateRoundPrice(1, [7n, 9n], 1_100);

      const restored = RoundLedger.fromSnapshot(ledger.snapshot());

      expect(restored.snapshot()).toEqual(ledger.snapshot());
      expect(restored.nextRoundId).toBe(2);
    });

    it("rejects a snapshot without a genesis round", () => {
      expect(() => RoundLedger.fromSnapshot({ version: 1, lastReportedRound: 0, rounds: [] })).toThrow(
        expect.objectContaining({ code: "INVALID_CONFIG" }),
      );
    });

    it("rejects rounds beyond the last reported round", () => {
      const snapshot = ledger.snapshot();
      const genesis = snapshot.rounds[0];
      expect(genesis).toBeDefined();
      if (genesis === undefined) return;

      expect(() =>
        RoundLedger.fromSnapshot({ ...snapshot, rounds: [genesis, { ...genesis, roundId: 3 }] }),
      ).toThrow(expect.objectContaining({ code: "INVALID_CONFIG" }));
    });
  });
});
