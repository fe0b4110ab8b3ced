/**
 * @subledger/billing — Provider aggregate.
 *
 * A provider charges an hourly fee to every subscriber on its roster.
 * Its roster may only be changed by its operator (the registry that
 * created it), never directly by its owner.
 */

import type { Amount, EntityId, Principal, UnixSeconds, Withdrawal } from "@subledger/types";
import { calendarPeriod } from "./clock.js";
import { FeeSchedule } from "./fee-schedule.js";
import { SubscriberRoster } from "./roster.js";
import type { Membership } from "./roster.js";
import { AuthorizationError } from "./types.js";
import type { ProviderView } from "./types.js";

export interface ProviderInit {
  readonly id: EntityId;
  readonly owner: Principal;
  readonly operator: Principal;
  readonly fee: Amount;
  readonly registeredAt: UnixSeconds;
}

export class Provider {
  readonly id: EntityId;
  readonly owner: Principal;
  readonly operator: Principal;
  readonly registeredAt: UnixSeconds;
  readonly schedule: FeeSchedule;
  readonly roster: SubscriberRoster = new SubscriberRoster();

  private _active = true;
  private _lastWithdrawal: Withdrawal;
  /** "YYYY-MM" → total withdrawn in that calendar month */
  private readonly _monthly: Map<string, Amount> = new Map();

  constructor(init: ProviderInit) {
    this.id = init.id;
    this.owner = init.owner;
    this.operator = init.operator;
    this.registeredAt = init.registeredAt;
    this.schedule = new FeeSchedule(init.fee, init.registeredAt);
    this._lastWithdrawal = { timestamp: init.registeredAt, amount: 0n };
  }

  get active(): boolean {
    return this._active;
  }

  /**
   * Set the active flag. Returns whether it changed.
   */
  setActive(active: boolean): boolean {
    if (this._active === active) {
      return false;
    }
    this._active = active;
    return true;
  }

  get lastWithdrawal(): Withdrawal {
    return this._lastWithdrawal;
  }

  // ─── Roster (operator only) ──────────────────────────────────────────

  enroll(caller: Principal, subscriberId: EntityId, now: UnixSeconds): Membership {
    this._assertOperator(caller);
    return this.roster.add(subscriberId, now);
  }

  release(caller: Principal, subscriberId: EntityId): void {
    this._assertOperator(caller);
    this.roster.remove(subscriberId);
  }

  // ─── Settlement ──────────────────────────────────────────────────────

  /**
   * Mark everything before `timestamp` as settled and retire the fee
   * history no unsettled accrual can reach any more.
   */
  recordWithdrawal(timestamp: UnixSeconds, amount: Amount): void {
    this._lastWithdrawal = { timestamp, amount };
    this.schedule.pruneBefore(timestamp);

    const { label } = calendarPeriod(timestamp);
    this._monthly.set(label, (this._monthly.get(label) ?? 0n) + amount);
  }

  /**
   * Total withdrawn during a "YYYY-MM" calendar month.
   */
  withdrawnIn(label: string): Amount {
    return this._monthly.get(label) ?? 0n;
  }

  view(): ProviderView {
    return {
      id: this.id,
      owner: this.owner,
      operator: this.operator,
      active: this._active,
      fee: this.schedule.currentRate(),
      feeSchedule: this.schedule.entries(),
      subscribers: this.roster.members(),
      lastWithdrawal: this._lastWithdrawal,
      registeredAt: this.registeredAt,
    };
  }

  private _assertOperator(caller: Principal): void {
    if (caller !== this.operator) {
      throw new AuthorizationError(
        "NOT_OPERATOR",
        `"${caller}" is not the operator of provider "${this.id}"`,
      );
    }
  }
}
