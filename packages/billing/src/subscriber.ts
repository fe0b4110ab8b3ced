/**
 * @subledger/billing — Subscriber account.
 *
 * Holds a prepaid balance and the set of providers it currently
 * consumes. Cancellation empties the set and pauses the account; the
 * record itself is never deleted.
 */

import type { Amount, EntityId, Principal, UnixSeconds } from "@subledger/types";
import type { SubscriberView } from "./types.js";

export interface SubscriberInit {
  readonly id: EntityId;
  readonly owner: Principal;
  readonly balance: Amount;
  readonly plan: string;
  readonly providers: readonly EntityId[];
  readonly registeredAt: UnixSeconds;
}

export class Subscriber {
  readonly id: EntityId;
  readonly owner: Principal;
  /** Opaque label; has no effect on pricing. */
  readonly plan: string;
  readonly registeredAt: UnixSeconds;

  private _balance: Amount;
  private _paused = false;
  private readonly _providers: Set<EntityId>;

  constructor(init: SubscriberInit) {
    this.id = init.id;
    this.owner = init.owner;
    this.plan = init.plan;
    this.registeredAt = init.registeredAt;
    this._balance = init.balance;
    this._providers = new Set(init.providers);
  }

  get balance(): Amount {
    return this._balance;
  }

  get paused(): boolean {
    return this._paused;
  }

  providers(): readonly EntityId[] {
    return [...this._providers];
  }

  isSubscribedTo(providerId: EntityId): boolean {
    return this._providers.has(providerId);
  }

  credit(amount: Amount): void {
    this._balance += amount;
  }

  debit(amount: Amount): void {
    this._balance -= amount;
  }

  setBalance(amount: Amount): void {
    this._balance = amount;
  }

  /** Forget a provider that no longer exists. */
  detach(providerId: EntityId): void {
    this._providers.delete(providerId);
  }

  cancel(): void {
    this._providers.clear();
    this._paused = true;
  }

  view(): SubscriberView {
    return {
      id: this.id,
      owner: this.owner,
      balance: this._balance,
      plan: this.plan,
      paused: this._paused,
      providers: this.providers(),
      registeredAt: this.registeredAt,
    };
  }
}
