/**
 * Event Types
 *
 * Notifications emitted by the aggregator. Every committed state change
 * produces one or more events; failed operations produce none.
 *
 * Rules:
 * - Events are immutable after creation
 * - Events are emitted only after the change they describe is committed
 * - Discriminated by `type`
 */

import type { Address } from "./round.js";

/**
 * Metadata common to all aggregator events.
 */
export interface EventMetadata {
  /** Monotonic sequence number assigned by the event log */
  readonly sequence: number;

  /** Unix seconds at emission */
  readonly timestamp: number;

  /** Address whose call caused this event */
  readonly actor: Address;
}

export interface SubmissionReceivedEvent {
  readonly type: "submission.received";
  readonly metadata: EventMetadata;
  readonly payload: {
    readonly price: bigint;
    readonly roundId: number;
  };
}

export interface AnswerUpdatedEvent {
  readonly type: "answer.updated";
  readonly metadata: EventMetadata;
  readonly payload: {
    readonly answer: bigint;
    readonly roundId: number;
    readonly updatedAt: number;
  };
}

export interface NewRoundEvent {
  readonly type: "round.started";
  readonly metadata: EventMetadata;
  readonly payload: {
    readonly roundId: number;
    readonly startedBy: Address;
    readonly startedAt: number;
  };
}

export interface AvailableFundsUpdatedEvent {
  readonly type: "funds.available-updated";
  readonly metadata: EventMetadata;
  readonly payload: {
    readonly available: bigint;
  };
}

export interface RewardsAppendedEvent {
  readonly type: "rewards.appended";
  readonly metadata: EventMetadata;
  readonly payload: {
    readonly submitter: Address;
    readonly amount: bigint;
  };
}

export interface RewardsUnlockedEvent {
  readonly type: "rewards.unlocked";
  readonly metadata: EventMetadata;
  readonly payload: {
    readonly submitter: Address;
    readonly amount: bigint;
  };
}

/**
 * All events the aggregator can emit.
 */
export type AggregatorEvent =
  | SubmissionReceivedEvent
  | AnswerUpdatedEvent
  | NewRoundEvent
  | AvailableFundsUpdatedEvent
  | RewardsAppendedEvent
  | RewardsUnlockedEvent;

export type AggregatorEventType = AggregatorEvent["type"];
