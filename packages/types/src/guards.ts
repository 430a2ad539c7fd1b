/**
 * Runtime Type Guards
 *
 * Narrowing functions for roundfeed domain types.
 * Used at system boundaries: snapshot restore, HTTP inputs,
 * collaborator registration.
 */

import type { Address, Hex, Round } from "./round.js";
import { MAX_ROUND_ID } from "./round.js";
import type { Funds, SubmitterVesting, VestingRecord } from "./funds.js";
import type { AggregatorEvent, AggregatorEventType } from "./event.js";

// =============================================================================
// Primitive guards
// =============================================================================

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const HEX_PATTERN = /^0x[0-9a-fA-F]*$/;

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

export function isHex(value: unknown): value is Hex {
  return typeof value === "string" && HEX_PATTERN.test(value);
}

export function isRoundId(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_ROUND_ID
  );
}

function isTimestamp(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function isNonNegativeBigint(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n;
}

// =============================================================================
// Ledger guards
// =============================================================================

export function isRound(value: unknown): value is Round {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.answer === "bigint" &&
    isTimestamp(v.startedAt) &&
    isTimestamp(v.updatedAt) &&
    isRoundId(v.answeredInRound) &&
    Array.isArray(v.submissions) &&
    v.submissions.every((s) => typeof s === "bigint") &&
    isNonNegativeBigint(v.paymentAmount)
  );
}

export function isFunds(value: unknown): value is Funds {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isNonNegativeBigint(v.available) && isNonNegativeBigint(v.allocated);
}

export function isVestingRecord(value: unknown): value is VestingRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isTimestamp(v.lastUpdated) &&
    isNonNegativeBigint(v.releasable) &&
    isNonNegativeBigint(v.remainVesting)
  );
}

export function isSubmitterVesting(value: unknown): value is SubmitterVesting {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isAddress(v.submitter) && isVestingRecord(value);
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_TYPES = new Set<string>([
  "submission.received",
  "answer.updated",
  "round.started",
  "funds.available-updated",
  "rewards.appended",
  "rewards.unlocked",
] satisfies AggregatorEventType[]);

export function isAggregatorEvent(value: unknown): value is AggregatorEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  if (typeof v.type !== "string" || !EVENT_TYPES.has(v.type)) return false;
  if (v.metadata === null || typeof v.metadata !== "object") return false;
  const m = v.metadata as Record<string, unknown>;
  return (
    typeof m.sequence === "number" &&
    isTimestamp(m.timestamp) &&
    isAddress(m.actor) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
