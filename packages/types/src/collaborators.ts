/**
 * Collaborator Interfaces
 *
 * Everything the aggregation engine consumes but does not own:
 * the oracle roster, the settlement token, read access control,
 * the optional data validator and the clock.
 *
 * Implementations live elsewhere; the engine only depends on these shapes.
 */

import type { Address } from "./round.js";

// =============================================================================
// Callers
// =============================================================================

/**
 * Who is calling an engine endpoint.
 *
 * `kind` distinguishes a directly signing account from a contract acting
 * on someone's behalf. Some reads are restricted to accounts.
 */
export interface Caller {
  readonly address: Address;
  readonly kind: CallerKind;
}

export type CallerKind = "account" | "contract";

// =============================================================================
// Oracle roster
// =============================================================================

/**
 * A roster entry as seen by the engine.
 */
export interface OracleStatus {
  readonly address: Address;
  readonly admin: Address;
  readonly enabled: boolean;
  readonly startingRound: number;
  /** Last round this oracle may report for. */
  readonly endingRound: number;
}

/**
 * Read-only roster capability.
 */
export interface OracleRoster {
  isOracleEnabled(address: Address): boolean;
  oracleCount(): number;
  getOracle(address: Address): OracleStatus | undefined;
  getOracles(): readonly Address[];
}

// =============================================================================
// Settlement token
// =============================================================================

/**
 * Transfer primitive for the asset the pool is denominated in.
 * Transfers throw on failure; they never return a status flag.
 */
export interface SettlementToken {
  balanceOf(owner: Address): bigint;
  transfer(from: Address, to: Address, amount: bigint): void;
  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): void;
}

// =============================================================================
// Access control
// =============================================================================

export interface ReadAccessController {
  hasAccess(caller: Address): boolean;
}

// =============================================================================
// Data validator
// =============================================================================

/**
 * Optional external consistency check run after each answer.
 * Its outcome never affects the submission.
 */
export interface DataValidator {
  validate(
    previousRoundId: number,
    previousAnswer: bigint,
    currentRoundId: number,
    currentAnswer: bigint,
  ): boolean | Promise<boolean>;
}

// =============================================================================
// Clock
// =============================================================================

export interface Clock {
  /** Current time in unix seconds. */
  now(): number;
}
