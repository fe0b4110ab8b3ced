/**
 * @subledger/billing — Clock capability.
 *
 * Every operation samples the clock once and threads that single `now`
 * through all of its calculations.
 */

import type { UnixSeconds } from "@subledger/types";

export interface Clock {
  now(): UnixSeconds;
}

/** Wall clock, truncated to whole seconds. */
export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/**
 * Hand-driven clock for tests and scripted runs.
 * Never moves backwards.
 */
export class ManualClock implements Clock {
  private _now: UnixSeconds;

  constructor(start: UnixSeconds) {
    this._now = start;
  }

  now(): UnixSeconds {
    return this._now;
  }

  advance(seconds: number): UnixSeconds {
    if (seconds < 0) {
      throw new RangeError(`Cannot move clock backwards by ${String(seconds)}s`);
    }
    this._now += seconds;
    return this._now;
  }

  advanceHours(hours: number): UnixSeconds {
    return this.advance(hours * 3600);
  }
}

/** Calendar month of a timestamp, for reporting only. */
export interface CalendarPeriod {
  readonly year: number;
  readonly month: number;
  /** "YYYY-MM" */
  readonly label: string;
}

export function calendarPeriod(timestamp: UnixSeconds): CalendarPeriod {
  const date = new Date(timestamp * 1000);
  const year = date.getUTCFullYear();
  const month = date.getUTCMonth() + 1;
  return { year, month, label: periodLabel(year, month) };
}

export function periodLabel(year: number, month: number): string {
  return `${String(year)}-${String(month).padStart(2, "0")}`;
}
