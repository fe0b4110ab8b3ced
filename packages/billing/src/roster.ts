/**
 * @subledger/billing — Subscriber roster.
 *
 * The set of a provider's active subscribers, stored as a dense array
 * plus an id → membership map.
 *
 * Rules:
 * - O(1) membership test, add and remove
 * - Removal swaps the last member into the vacated slot
 * - Every membership's `index` equals the member's array position
 * - Member order carries no meaning; it changes on removal
 */

import type { EntityId, UnixSeconds } from "@subledger/types";
import { StateError } from "./types.js";

/** A subscriber's place in one provider's roster. */
export interface Membership {
  readonly index: number;
  readonly joinedAt: UnixSeconds;
}

export class SubscriberRoster {
  private readonly _members: EntityId[] = [];
  private readonly _memberships: Map<EntityId, Membership> = new Map();

  /**
   * Append a subscriber.
   * Throws if the subscriber is already a member.
   */
  add(subscriberId: EntityId, now: UnixSeconds): Membership {
    if (this._memberships.has(subscriberId)) {
      throw new StateError(
        "ALREADY_SUBSCRIBED",
        `Subscriber "${subscriberId}" is already on the roster`,
      );
    }

    this._members.push(subscriberId);
    const membership: Membership = { index: this._members.length - 1, joinedAt: now };
    this._memberships.set(subscriberId, membership);
    return membership;
  }

  /**
   * Remove a subscriber by swapping the last member into its slot.
   * Throws if the subscriber is not a member.
   */
  remove(subscriberId: EntityId): void {
    const membership = this.assertMember(subscriberId);
    const last = this._members.pop();

    if (last !== undefined && last !== subscriberId) {
      this._members[membership.index] = last;
      const moved = this._memberships.get(last);
      if (moved !== undefined) {
        this._memberships.set(last, { ...moved, index: membership.index });
      }
    }

    this._memberships.delete(subscriberId);
  }

  has(subscriberId: EntityId): boolean {
    return this._memberships.has(subscriberId);
  }

  membership(subscriberId: EntityId): Membership | undefined {
    return this._memberships.get(subscriberId);
  }

  /**
   * Get a membership. Throws if not a member.
   */
  assertMember(subscriberId: EntityId): Membership {
    const membership = this._memberships.get(subscriberId);
    if (membership === undefined) {
      throw new StateError(
        "NOT_SUBSCRIBED",
        `Subscriber "${subscriberId}" is not on the roster`,
      );
    }
    return membership;
  }

  members(): readonly EntityId[] {
    return [...this._members];
  }

  get size(): number {
    return this._members.length;
  }
}
