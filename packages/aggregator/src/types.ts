/**
 * @roundfeed/aggregator domain types.
 *
 * The aggregator turns a quorum-signed batch of price observations into
 * one answer per round:
 * - Quorum gate (deadline, batch shape, threshold percent)
 * - Signature recovery against the oracle roster
 * - Oracle payments from a prepaid pool
 * - Median aggregation with carry-forward between rounds
 * - Linearly vesting reward for whoever submitted the batch
 */

import type {
  Address,
  Clock,
  DataValidator,
  OracleRoster,
  ReadAccessController,
  RoundData,
  SettlementToken,
} from "@roundfeed/types";
import type { FundsSnapshot, VestingSnapshot } from "@roundfeed/ledger";
import type { Logger } from "pino";
import type { RoundLedgerSnapshot } from "./round-ledger.js";
import type { InMemoryEventLog } from "./event-log.js";

// =============================================================================
// Constants
// =============================================================================

/** Minimum share of enabled oracles, in whole percent, that must sign a batch. */
export const MIN_THRESHOLD_PERCENT = 66;

/** Default submitter reward rate: 5.0 % of every oracle payment. */
export const DEFAULT_REWARD_RATE_X10 = 50;

/** Default time budget for the external validator call. */
export const DEFAULT_VALIDATOR_TIMEOUT_MS = 1_000;

// =============================================================================
// Error
// =============================================================================

export type AggregatorErrorCode =
  | "EXPIRED_BATCH"
  | "MALFORMED_BATCH"
  | "QUORUM_NOT_MET"
  | "NON_SEQUENTIAL_ROUND"
  | "UNAUTHORIZED_SUBMITTER"
  | "INSUFFICIENT_FUNDS"
  | "NO_DATA"
  | "UNAUTHORIZED_READER"
  | "INVALID_CONFIG"
  | "NOT_OWNER"
  | "ORACLE_EXISTS"
  | "ORACLE_NOT_FOUND"
  | "NOT_ADMIN"
  | "TOO_MANY_ORACLES"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE";

export class AggregatorError extends Error {
  public readonly code: AggregatorErrorCode;
  constructor(code: AggregatorErrorCode, message: string) {
    super(message);
    this.name = "AggregatorError";
    this.code = code;
  }
}

// =============================================================================
// Configuration
// =============================================================================

export interface AggregatorConfig {
  /** Identity of this aggregator: part of every signed report and the custody account. */
  readonly address: Address;
  /** May withdraw unallocated funds and change future payment terms. */
  readonly owner: Address;
  /** Fixed string every report commits to (e.g. "ETH / USD"). */
  readonly description: string;
  /** Fee paid per verified signature. */
  readonly paymentAmount: bigint;
  /** Submitter share of each payment in tenths of a percent. Default 50 (5.0 %). */
  readonly rewardRateX10?: number | undefined;
  /** Default 66. */
  readonly minThresholdPercent?: number | undefined;
  /** Default 1000 ms. */
  readonly validatorTimeoutMs?: number | undefined;
  /** Default 30 days. */
  readonly vestingPeriodSeconds?: number | undefined;
}

export interface AggregatorDeps {
  readonly roster: OracleRoster;
  readonly token: SettlementToken;
  readonly clock?: Clock | undefined;
  /** Gates round data reads. Absent means open reads. */
  readonly accessController?: ReadAccessController | undefined;
  readonly validator?: DataValidator | undefined;
  readonly logger?: Logger | undefined;
  readonly eventLog?: InMemoryEventLog | undefined;
}

// =============================================================================
// Results
// =============================================================================

export interface SubmitResult {
  readonly roundId: number;
  readonly answer: bigint;
  readonly updatedAt: number;
  /** Recovered signer per signature, in batch order (duplicates included). */
  readonly signers: readonly Address[];
  /** Total moved from available to allocated. */
  readonly paid: bigint;
  /** Appended to the sender's vesting balance. */
  readonly submitterReward: bigint;
}

/**
 * What an oracle needs to know before reporting.
 */
export interface OracleRoundState {
  readonly eligibleToSubmit: boolean;
  /** The round the next batch must carry. */
  readonly roundId: number;
  readonly latestAnswer: bigint;
  readonly availableFunds: bigint;
  readonly oracleCount: number;
  readonly paymentAmount: bigint;
}

export interface FundsView {
  readonly available: bigint;
  readonly allocated: bigint;
  readonly oracleRewardAccumulator: bigint;
}

export type { RoundData };

// =============================================================================
// Snapshot
// =============================================================================

export interface AggregatorSnapshot {
  readonly version: 1;
  readonly paymentAmount: bigint;
  readonly rewardRateX10: number;
  readonly rounds: RoundLedgerSnapshot;
  readonly funds: FundsSnapshot;
  readonly vesting: VestingSnapshot;
}
