/**
 * In-memory aggregator event log.
 *
 * Append-only, globally sequenced. Subscriptions are dispatched
 * synchronously on append, after the change the events describe has
 * been committed.
 *
 * All state is lost on process exit.
 */

import type { Address, AggregatorEvent, AggregatorEventType } from "@roundfeed/types";
import pino from "pino";
import type { Logger } from "pino";

/**
 * An event before the log has assigned its metadata.
 */
export type EventDraft<E extends AggregatorEvent = AggregatorEvent> = E extends AggregatorEvent
  ? { readonly type: E["type"]; readonly payload: E["payload"] }
  : never;

export type EventHandler = (event: AggregatorEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

export interface ReadEventsOptions {
  /** Inclusive, 1-based. Default 1. */
  readonly fromSequence?: number | undefined;
  readonly maxCount?: number | undefined;
  readonly type?: AggregatorEventType | undefined;
}

export class InMemoryEventLog {
  private readonly _log: AggregatorEvent[] = [];
  private readonly _subscribers = new Set<EventHandler>();
  private readonly _logger: Logger;
  private _nextSequence = 1;

  constructor(logger?: Logger) {
    this._logger = logger ?? pino({ level: "silent" });
  }

  /**
   * Stamp and store a batch of drafts, then notify subscribers.
   */
  append(drafts: readonly EventDraft[], actor: Address, timestamp: number): readonly AggregatorEvent[] {
    const stored: AggregatorEvent[] = drafts.map((draft) => ({
      ...draft,
      metadata: { sequence: this._nextSequence++, timestamp, actor },
    }));
    this._log.push(...stored);

    for (const handler of this._subscribers) {
      for (const event of stored) {
        try {
          handler(event);
        } catch (err) {
          this._logger.warn({ err, sequence: event.metadata.sequence }, "event subscriber threw");
        }
      }
    }
    return stored;
  }

  read(options?: ReadEventsOptions): readonly AggregatorEvent[] {
    const fromSequence = options?.fromSequence ?? 1;
    const type = options?.type;
    let result = this._log.filter(
      (e) => e.metadata.sequence >= fromSequence && (type === undefined || e.type === type),
    );
    const maxCount = options?.maxCount;
    if (maxCount !== undefined && maxCount >= 0) {
      result = result.slice(0, maxCount);
    }
    return result;
  }

  subscribe(handler: EventHandler): Subscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  /** Sequence number of the last stored event, 0 when empty. */
  lastSequence(): number {
    return this._nextSequence - 1;
  }
}
