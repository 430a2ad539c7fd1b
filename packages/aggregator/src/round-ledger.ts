/**
 * Round ledger.
 *
 * Sparse map of rounds keyed by id. Round 0 is the genesis record; real
 * rounds are created strictly in order starting at 1 and are immutable
 * once the submission that created them commits.
 */

import type { Round, RoundData } from "@roundfeed/types";
import { MAX_ROUND_ID, isRound, isRoundId } from "@roundfeed/types";
import type { Checkpointable } from "@roundfeed/ledger";
import { median } from "./median.js";
import { AggregatorError } from "./types.js";

export interface StoredRound extends Round {
  readonly roundId: number;
}

export interface RoundLedgerSnapshot {
  readonly version: 1;
  readonly lastReportedRound: number;
  readonly rounds: readonly StoredRound[];
}

export class RoundLedger implements Checkpointable<number> {
  private readonly _rounds = new Map<number, Round>();
  private _lastReportedRound = 0;

  constructor(genesisTimestamp: number, paymentAmount: bigint) {
    this._rounds.set(0, {
      answer: 0n,
      startedAt: genesisTimestamp,
      updatedAt: genesisTimestamp,
      answeredInRound: 0,
      submissions: [],
      paymentAmount,
    });
  }

  get lastReportedRound(): number {
    return this._lastReportedRound;
  }

  /** The id the next batch must carry. */
  get nextRoundId(): number {
    return this._lastReportedRound + 1;
  }

  get(roundId: number): Round | undefined {
    return this._rounds.get(roundId);
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  assertNextRound(roundId: number): void {
    if (roundId !== this._lastReportedRound + 1 || roundId > MAX_ROUND_ID) {
      throw new AggregatorError(
        "NON_SEQUENTIAL_ROUND",
        `Round ${String(roundId)} is not next; expected ${String(this._lastReportedRound + 1)}`,
      );
    }
  }

  /**
   * Open `roundId`, carrying the previous answer forward.
   */
  createNewRound(roundId: number, paymentAmount: bigint, now: number): Round {
    this.assertNextRound(roundId);
    const previous = this._rounds.get(this._lastReportedRound);

    const round: Round = {
      answer: previous?.answer ?? 0n,
      startedAt: now,
      updatedAt: now,
      answeredInRound: previous?.answeredInRound ?? 0,
      submissions: [],
      paymentAmount,
    };
    this._rounds.set(roundId, round);
    this._lastReportedRound = roundId;
    return round;
  }

  /**
   * Answer `roundId` with the median of `prices`.
   */
  updateRoundPrice(roundId: number, prices: readonly bigint[], now: number): Round {
    const current = this._rounds.get(roundId);
    if (current === undefined) {
      throw new AggregatorError("NO_DATA", `Round ${String(roundId)} has not been created`);
    }

    const round: Round = {
      ...current,
      answer: median(prices),
      updatedAt: now,
      answeredInRound: roundId,
      submissions: [...prices],
    };
    this._rounds.set(roundId, round);
    return round;
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  getRoundInfo(roundId: number): RoundData {
    const round = isRoundId(roundId) ? this._rounds.get(roundId) : undefined;
    if (round === undefined || round.answeredInRound === 0) {
      throw new AggregatorError("NO_DATA", `No data present for round ${String(roundId)}`);
    }
    return {
      roundId,
      answer: round.answer,
      startedAt: round.startedAt,
      updatedAt: round.updatedAt,
      answeredInRound: round.answeredInRound,
    };
  }

  getAnswer(roundId: number): bigint {
    if (!isRoundId(roundId)) return 0n;
    return this._rounds.get(roundId)?.answer ?? 0n;
  }

  getTimestamp(roundId: number): number {
    if (!isRoundId(roundId)) return 0;
    return this._rounds.get(roundId)?.updatedAt ?? 0;
  }

  latestAnswer(): bigint {
    return this.getAnswer(this._lastReportedRound);
  }

  latestTimestamp(): number {
    return this.getTimestamp(this._lastReportedRound);
  }

  latestRound(): number {
    return this._lastReportedRound;
  }

  latestRoundData(): RoundData {
    return this.getRoundInfo(this._lastReportedRound);
  }

  // ─── Checkpoint ──────────────────────────────────────────────────────

  // Rounds are only ever added above lastReportedRound, so the id is the
  // whole checkpoint.
  checkpoint(): number {
    return this._lastReportedRound;
  }

  rollback(checkpoint: number): void {
    for (const roundId of [...this._rounds.keys()]) {
      if (roundId > checkpoint) {
        this._rounds.delete(roundId);
      }
    }
    this._lastReportedRound = checkpoint;
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): RoundLedgerSnapshot {
    return {
      version: 1,
      lastReportedRound: this._lastReportedRound,
      rounds: [...this._rounds.entries()]
        .sort(([a], [b]) => a - b)
        .map(([roundId, round]) => ({ roundId, ...round })),
    };
  }

  static fromSnapshot(snapshot: RoundLedgerSnapshot): RoundLedger {
    if (snapshot.version !== 1) {
      throw new AggregatorError("INVALID_CONFIG", `Unsupported round snapshot version: ${String(snapshot.version)}`);
    }
    const genesis = snapshot.rounds.find((r) => r.roundId === 0);
    if (genesis === undefined) {
      throw new AggregatorError("INVALID_CONFIG", "Round snapshot has no genesis round");
    }

    const ledger = new RoundLedger(genesis.startedAt, genesis.paymentAmount);
    for (const { roundId, ...round } of snapshot.rounds) {
      if (!isRoundId(roundId) || roundId > snapshot.lastReportedRound || !isRound(round)) {
        throw new AggregatorError("INVALID_CONFIG", `Round snapshot entry ${String(roundId)} is invalid`);
      }
      ledger._rounds.set(roundId, round);
    }
    ledger._lastReportedRound = snapshot.lastReportedRound;
    return ledger;
  }
}
