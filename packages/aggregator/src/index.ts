/**
 * @roundfeed/aggregator — Round-based price aggregation: quorum-signed
 * batches, median answers, prepaid oracle payments, vesting submitter
 * rewards.
 */

// Coordinator
export { Aggregator } from "./aggregator.js";

// Components
export { median } from "./median.js";
export { checkQuorum, assertBatchShape, meetsQuorum, quorumPercent } from "./quorum.js";
export { buildReportHash, recoverSigner } from "./signature.js";
export type { ReportPayload, SignatureParts } from "./signature.js";
export { RoundLedger } from "./round-ledger.js";
export type { RoundLedgerSnapshot, StoredRound } from "./round-ledger.js";
export { runValidation } from "./validator.js";
export type { ValidationOutcome, ValidationRequest } from "./validator.js";
export { SerialExecutor } from "./serial.js";
export { InMemoryEventLog } from "./event-log.js";
export type { EventDraft, EventHandler, ReadEventsOptions, Subscription } from "./event-log.js";

// Reference collaborators
export { InMemoryOracleRoster, MAX_ORACLE_COUNT } from "./roster.js";
export type { OracleAddition, OracleChange } from "./roster.js";
export { InMemorySettlementToken } from "./token.js";
export { SimpleReadAccessController } from "./access.js";
export { SystemClock, ManualClock } from "./clock.js";
export { normalizeAddress, sameAddress } from "./address.js";

// Types
export type {
  AggregatorErrorCode,
  AggregatorConfig,
  AggregatorDeps,
  AggregatorSnapshot,
  SubmitResult,
  OracleRoundState,
  FundsView,
} from "./types.js";

export {
  AggregatorError,
  MIN_THRESHOLD_PERCENT,
  DEFAULT_REWARD_RATE_X10,
  DEFAULT_VALIDATOR_TIMEOUT_MS,
} from "./types.js";
