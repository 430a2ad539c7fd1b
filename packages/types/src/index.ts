/**
 * @roundfeed/types — Shared domain types for the roundfeed stack.
 *
 * These types are used across all roundfeed packages:
 * - Rounds and signed submission batches
 * - Funds and reward vesting records
 * - Collaborator interfaces (roster, token, access, validator, clock)
 * - Aggregator events
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Round types
export type {
  Address,
  Hex,
  Round,
  RoundData,
  RoundState,
  SubmissionBatch,
} from "./round.js";
export { MAX_ROUND_ID } from "./round.js";

// Funds types
export type {
  Funds,
  VestingRecord,
  SubmitterVesting,
} from "./funds.js";

// Collaborator interfaces
export type {
  Caller,
  CallerKind,
  OracleStatus,
  OracleRoster,
  SettlementToken,
  ReadAccessController,
  DataValidator,
  Clock,
} from "./collaborators.js";

// Event types
export type {
  EventMetadata,
  AggregatorEvent,
  AggregatorEventType,
  SubmissionReceivedEvent,
  AnswerUpdatedEvent,
  NewRoundEvent,
  AvailableFundsUpdatedEvent,
  RewardsAppendedEvent,
  RewardsUnlockedEvent,
} from "./event.js";

// Runtime type guards
export {
  isAddress,
  isHex,
  isRoundId,
  isRound,
  isFunds,
  isVestingRecord,
  isSubmitterVesting,
  isAggregatorEvent,
} from "./guards.js";
