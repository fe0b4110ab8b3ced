/**
 * @subledger/billing — Fee schedule.
 *
 * The time-partitioned history of one provider's hourly rate.
 *
 * Rules:
 * - Entries tile time as half-open intervals `[start, end)`
 * - Exactly one entry is open-ended (`end === OPEN_END`), and it is last
 * - History is pruned once every subscriber has been settled past it
 */

import type { Amount, FeeEntry, UnixSeconds } from "@subledger/types";
import { wholeHours } from "./amount-math.js";
import { StateError } from "./types.js";

/** End of the open entry: 9999-12-31T23:59:59Z. */
export const OPEN_END: UnixSeconds = 253_402_300_799;

export class FeeSchedule {
  private _closed: FeeEntry[] = [];
  private _open: FeeEntry;

  /**
   * Seed the schedule with a single open entry starting at `start`.
   */
  constructor(initialRate: Amount, start: UnixSeconds) {
    this._open = { start, end: OPEN_END, amount: initialRate };
  }

  currentRate(): Amount {
    return this._open.amount;
  }

  /**
   * Close the open entry at `now` and open a new one at `newAmount`.
   *
   * A change at the open entry's own start replaces its rate instead,
   * so zero-length intervals never enter the history.
   */
  appendRate(newAmount: Amount, now: UnixSeconds): void {
    if (now < this._open.start) {
      throw new StateError(
        "CLOCK_REGRESSION",
        `Rate change at ${String(now)} precedes the open fee interval starting at ${String(this._open.start)}`,
      );
    }

    if (now === this._open.start) {
      this._open = { ...this._open, amount: newAmount };
      return;
    }

    this._closed.push({ ...this._open, end: now });
    this._open = { start: now, end: OPEN_END, amount: newAmount };
  }

  /**
   * Drop entries that ended at or before `timestamp`.
   * The open entry always survives.
   */
  pruneBefore(timestamp: UnixSeconds): void {
    this._closed = this._closed.filter((entry) => entry.end > timestamp);
  }

  /**
   * Earnings accrued over `[from, until)`.
   *
   * Each entry contributes its rate times the whole hours of its overlap
   * with the range; the partial hour of every slice is dropped.
   */
  earningsFor(from: UnixSeconds, until: UnixSeconds): Amount {
    if (until <= from) {
      return 0n;
    }

    let total = 0n;
    for (const entry of this.entries()) {
      const sliceStart = Math.max(from, entry.start);
      const sliceEnd = Math.min(until, entry.end);
      total += wholeHours(sliceEnd - sliceStart) * entry.amount;
    }
    return total;
  }

  entries(): readonly FeeEntry[] {
    return [...this._closed, this._open];
  }

  get length(): number {
    return this._closed.length + 1;
  }
}
