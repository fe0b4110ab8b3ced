/**
 * @subledger/billing — Billing events.
 *
 * Naming convention: `<subsystem>.<entity>.<action>`.
 * Payload amounts are decimal strings so events stay JSON-safe.
 * Payloads are type aliases (not interfaces) so they remain assignable
 * to the journal's `Record<string, unknown>` payload slot.
 */

import type { EntityId, EventSource, Principal, UnixSeconds } from "@subledger/types";

export const BILLING_EVENTS = {
  PROVIDER_REGISTERED: "registry.provider.registered",
  PROVIDER_REMOVED: "registry.provider.removed",
  PROVIDER_STATUS_CHANGED: "registry.provider.status_changed",
  PROVIDER_FEE_CHANGED: "registry.provider.fee_changed",
  SUBSCRIBER_REGISTERED: "registry.subscriber.registered",
  SUBSCRIBER_TOPPED_UP: "registry.subscriber.topped_up",
  EARNINGS_WITHDRAWN: "settlement.earnings.withdrawn",
  SUBSCRIPTION_CANCELLED: "settlement.subscription.cancelled",
} as const;

export type BillingEventType = (typeof BILLING_EVENTS)[keyof typeof BILLING_EVENTS];

export type ProviderRegisteredPayload = {
  readonly providerId: EntityId;
  readonly owner: Principal;
  readonly fee: string;
  /** Raw registration key bytes, hex-encoded. */
  readonly registrationKey: string;
};

export type ProviderRemovedPayload = {
  readonly providerId: EntityId;
  readonly paidOut: string;
  readonly detachedSubscribers: readonly EntityId[];
};

export type ProviderStatusChangedPayload = {
  readonly providerId: EntityId;
  readonly active: boolean;
};

export type ProviderFeeChangedPayload = {
  readonly providerId: EntityId;
  readonly previousFee: string;
  readonly fee: string;
};

export type SubscriberRegisteredPayload = {
  readonly subscriberId: EntityId;
  readonly owner: Principal;
  readonly deposit: string;
  readonly plan: string;
  readonly providerIds: readonly EntityId[];
};

export type SubscriberToppedUpPayload = {
  readonly subscriberId: EntityId;
  readonly amount: string;
  readonly balance: string;
};

export type EarningsWithdrawnPayload = {
  readonly providerId: EntityId;
  readonly owed: string;
  readonly collected: string;
  readonly uncollected: string;
  readonly subscriberCount: number;
};

export type SubscriptionCancelledPayload = {
  readonly subscriberId: EntityId;
  readonly owed: string;
  readonly shortfall: string;
  readonly providerIds: readonly EntityId[];
};

interface PayloadMap {
  "registry.provider.registered": ProviderRegisteredPayload;
  "registry.provider.removed": ProviderRemovedPayload;
  "registry.provider.status_changed": ProviderStatusChangedPayload;
  "registry.provider.fee_changed": ProviderFeeChangedPayload;
  "registry.subscriber.registered": SubscriberRegisteredPayload;
  "registry.subscriber.topped_up": SubscriberToppedUpPayload;
  "settlement.earnings.withdrawn": EarningsWithdrawnPayload;
  "settlement.subscription.cancelled": SubscriptionCancelledPayload;
}

/**
 * A billing event as emitted by the engine, before the journal
 * assigns it an id and a position.
 */
export type BillingEvent = {
  [T in BillingEventType]: {
    readonly type: T;
    readonly source: EventSource;
    readonly actor: Principal;
    readonly occurredAt: UnixSeconds;
    readonly payload: PayloadMap[T];
  };
}[BillingEventType];

export interface EventSink {
  emit(event: BillingEvent): void;
}

/** Sink that discards events. */
export const nullEventSink: EventSink = {
  emit: () => undefined,
};
