/**
 * @roundfeed/ledger — Funds and reward-vesting ledgers.
 *
 * A pure TypeScript ledger pair with no runtime dependencies beyond
 * the shared types:
 * - FundsLedger: available vs. allocated pool balances
 * - VestingLedger: per-submitter linearly vesting rewards
 *
 * Design rules:
 * - All arithmetic is checked bigint (no floating point, no wrapping)
 * - Fail-closed: invalid operations throw before mutating
 * - Every ledger can be snapshotted and restored
 */

// Funds
export {
  FundsLedger,
  computeRewardSplit,
  assertRewardRate,
} from "./funds-ledger.js";
export type { RewardSplit } from "./funds-ledger.js";

// Vesting
export { VestingLedger, computeUnlock } from "./vesting-ledger.js";

// Amount arithmetic
export {
  MAX_UINT256,
  assertAmount,
  checkedAdd,
  checkedSub,
  checkedMul,
  mulDiv,
  minAmount,
  parseAmount,
  formatAmount,
} from "./amount-math.js";

// Types
export type {
  LedgerErrorCode,
  Checkpointable,
  FundsSnapshot,
  OraclePaymentTotal,
  VestingSnapshot,
  UnlockResult,
} from "./types.js";

export {
  LedgerError,
  VESTING_PERIOD_SECONDS,
  REWARD_RATE_DENOMINATOR,
} from "./types.js";
