import type { Clock } from "@roundfeed/types";

export class SystemClock implements Clock {
  now(): number {
    return Math.floor(Date.now() / 1000);
  }
}

/**
 * A clock that only moves when told to.
 */
export class ManualClock implements Clock {
  private _now: number;

  constructor(start = 0) {
    this._now = start;
  }

  now(): number {
    return this._now;
  }

  set(seconds: number): void {
    this._now = seconds;
  }

  advance(seconds: number): number {
    this._now += seconds;
    return this._now;
  }
}
