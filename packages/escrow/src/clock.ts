/**
 * Time sources for window gating. All times are integer seconds.
 */

import { EscrowError } from "./errors.js";

export interface Clock {
  /** Current time in seconds. Never decreases. */
  now(): number;
}

/**
 * Wall-clock time in Unix seconds, clamped so it never runs backwards
 * when the host clock is adjusted.
 */
export class SystemClock implements Clock {
  private _last = 0;

  now(): number {
    const current = Math.floor(Date.now() / 1000);
    this._last = Math.max(this._last, current);
    return this._last;
  }
}

/**
 * Explicitly driven clock for tests, demos and replays.
 */
export class ManualClock implements Clock {
  private _now: number;

  constructor(start = 0) {
    assertTime(start);
    this._now = start;
  }

  now(): number {
    return this._now;
  }

  set(time: number): void {
    assertTime(time);
    if (time < this._now) {
      throw new EscrowError(
        "INVALID_ARGUMENT",
        `Clock cannot move backwards (now ${this._now}, requested ${time})`,
      );
    }
    this._now = time;
  }

  advance(seconds: number): void {
    this.set(this._now + seconds);
  }
}

function assertTime(value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new EscrowError("INVALID_ARGUMENT", `Time must be a non-negative integer, got ${value}`);
  }
}

/** ISO 8601 rendering of a clock reading. */
export function toIsoTimestamp(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}
