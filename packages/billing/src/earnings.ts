/**
 * @subledger/billing — Earnings calculator.
 *
 * Pure read functions over a provider's fee schedule and roster.
 * A member accrues from the later of its join time and the provider's
 * last withdrawal, so settled time is never counted twice.
 *
 * Same provider state + same `now` → same result.
 */

import type { Amount, EntityId, UnixSeconds } from "@subledger/types";
import { sumAmounts } from "./amount-math.js";
import type { Provider } from "./provider.js";
import type { Membership } from "./roster.js";

function accrualStart(provider: Provider, membership: Membership): UnixSeconds {
  return Math.max(membership.joinedAt, provider.lastWithdrawal.timestamp);
}

/**
 * Earnings owed by each roster member, in roster order.
 */
export function perSubscriberEarnings(
  provider: Provider,
  now: UnixSeconds,
): ReadonlyMap<EntityId, Amount> {
  const result = new Map<EntityId, Amount>();
  for (const subscriberId of provider.roster.members()) {
    result.set(subscriberId, earningsForOne(provider, subscriberId, now));
  }
  return result;
}

/**
 * Total earnings owed across the whole roster.
 */
export function totalEarnings(provider: Provider, now: UnixSeconds): Amount {
  return sumAmounts(perSubscriberEarnings(provider, now).values());
}

/**
 * Earnings owed by a single member.
 * Throws StateError NOT_SUBSCRIBED if the subscriber is not on the roster.
 */
export function earningsForOne(
  provider: Provider,
  subscriberId: EntityId,
  now: UnixSeconds,
): Amount {
  const membership = provider.roster.assertMember(subscriberId);
  return provider.schedule.earningsFor(accrualStart(provider, membership), now);
}
