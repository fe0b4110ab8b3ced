/**
 * @subledger/billing — Registry controller.
 *
 * Provider and subscriber lifecycle:
 * - registerProvider() — one-time registration key, minimum fee, optional cap
 * - registerSubscriber() — deposit intake and roster enrolment
 * - setProviderStatus() — administrative batch activation toggle
 * - updateProviderFee() — rate change, prorated from `now` onward
 * - topUp() — add funds to a subscriber balance
 * - removeProvider() — settle residual earnings, then delete
 *
 * All earnings math is delegated to the SettlementLedger and the
 * earnings calculator. Validation happens before any transfer; state
 * is committed only after transfers succeed.
 */

import type { Amount, CallerContext, EntityId } from "@subledger/types";
import { assertNonNegative, formatAmount } from "./amount-math.js";
import type { Clock } from "./clock.js";
import { hashRegistrationKey, registrationKeyHex } from "./dedup.js";
import type { DedupKeyStore } from "./dedup.js";
import { BILLING_EVENTS } from "./events.js";
import type { EventSink } from "./events.js";
import type { IdAllocator } from "./ids.js";
import { Provider } from "./provider.js";
import type { SettlementLedger } from "./settlement.js";
import type { BillingStore } from "./store.js";
import { Subscriber } from "./subscriber.js";
import { executeTransfers } from "./transfers.js";
import type { ValueTransferService } from "./transfers.js";
import { AuthorizationError, StateError, ValidationError } from "./types.js";
import type { BillingConfig, ProviderRemovalReceipt } from "./types.js";

export interface RegistryDeps {
  readonly store: BillingStore;
  readonly clock: Clock;
  readonly providerIds: IdAllocator;
  readonly subscriberIds: IdAllocator;
  readonly transfers: ValueTransferService;
  readonly dedupKeys: DedupKeyStore;
  readonly events: EventSink;
  readonly settlement: SettlementLedger;
  readonly config: BillingConfig;
}

export class RegistryController {
  private readonly _deps: RegistryDeps;

  constructor(deps: RegistryDeps) {
    this._deps = deps;
  }

  // ─── Providers ───────────────────────────────────────────────────────

  /**
   * Register a provider owned by the caller.
   *
   * Validation order (fail-closed):
   * 1. Fee must be at least the configured minimum
   * 2. Provider cap, when configured, must not be reached
   * 3. The registration key must not have been used before
   */
  registerProvider(
    caller: CallerContext,
    registrationKey: Uint8Array | string,
    fee: Amount,
  ): Provider {
    const { store, config } = this._deps;

    if (fee < config.minimalFee) {
      throw new ValidationError(
        "FEE_BELOW_MINIMUM",
        `Fee ${fee.toString()} is below the minimum of ${config.minimalFee.toString()}`,
      );
    }
    if (config.maxProviders !== undefined && store.providerCount >= config.maxProviders) {
      throw new ValidationError(
        "PROVIDER_CAPACITY_REACHED",
        `Provider capacity of ${String(config.maxProviders)} reached`,
      );
    }

    const keyHash = hashRegistrationKey(registrationKey);
    if (this._deps.dedupKeys.contains(keyHash)) {
      throw new ValidationError(
        "DUPLICATE_REGISTRATION_KEY",
        "Registration key has already been used",
      );
    }

    const now = this._deps.clock.now();
    const provider = new Provider({
      id: this._deps.providerIds.next(),
      owner: caller.principal,
      operator: config.operator,
      fee,
      registeredAt: now,
    });

    store.addProvider(provider);
    this._deps.dedupKeys.insert(keyHash);

    this._deps.events.emit({
      type: BILLING_EVENTS.PROVIDER_REGISTERED,
      source: "registry",
      actor: caller.principal,
      occurredAt: now,
      payload: {
        providerId: provider.id,
        owner: provider.owner,
        fee: formatAmount(fee),
        registrationKey: registrationKeyHex(registrationKey),
      },
    });

    return provider;
  }

  /**
   * Change a provider's hourly fee from `now` onward.
   * Accrual before `now` keeps the previous rate.
   */
  updateProviderFee(caller: CallerContext, providerId: EntityId, fee: Amount): Provider {
    const { store, config } = this._deps;
    const provider = store.assertProvider(providerId);

    if (caller.principal !== provider.owner) {
      throw new AuthorizationError(
        "NOT_OWNER",
        `"${caller.principal}" does not own provider "${providerId}"`,
      );
    }
    if (fee < config.minimalFee) {
      throw new ValidationError(
        "FEE_BELOW_MINIMUM",
        `Fee ${fee.toString()} is below the minimum of ${config.minimalFee.toString()}`,
      );
    }

    const now = this._deps.clock.now();
    const previousFee = provider.schedule.currentRate();
    provider.schedule.appendRate(fee, now);

    this._deps.events.emit({
      type: BILLING_EVENTS.PROVIDER_FEE_CHANGED,
      source: "registry",
      actor: caller.principal,
      occurredAt: now,
      payload: {
        providerId,
        previousFee: formatAmount(previousFee),
        fee: formatAmount(fee),
      },
    });

    return provider;
  }

  /**
   * Set the active flag of several providers at once. Administrator only.
   * Every id is validated before any flag changes; unchanged flags are no-ops.
   */
  setProviderStatus(
    caller: CallerContext,
    providerIds: readonly EntityId[],
    flags: readonly boolean[],
  ): readonly EntityId[] {
    this._assertAdmin(caller);

    if (providerIds.length !== flags.length) {
      throw new ValidationError(
        "BATCH_LENGTH_MISMATCH",
        `Got ${String(providerIds.length)} provider ids but ${String(flags.length)} flags`,
      );
    }

    const providers = providerIds.map((id) => this._deps.store.assertProvider(id));
    const now = this._deps.clock.now();
    const changed: EntityId[] = [];

    providers.forEach((provider, i) => {
      const active = flags[i] === true;
      if (!provider.setActive(active)) return;

      changed.push(provider.id);
      this._deps.events.emit({
        type: BILLING_EVENTS.PROVIDER_STATUS_CHANGED,
        source: "registry",
        actor: caller.principal,
        occurredAt: now,
        payload: { providerId: provider.id, active },
      });
    });

    return changed;
  }

  /**
   * Pay out a provider's residual earnings, then delete it and detach
   * it from every subscriber. Administrator only.
   */
  async removeProvider(caller: CallerContext, providerId: EntityId): Promise<ProviderRemovalReceipt> {
    this._assertAdmin(caller);
    const { store } = this._deps;
    const provider = store.assertProvider(providerId);
    const now = this._deps.clock.now();

    const settlement = await this._deps.settlement.settle(provider, now);

    const detachedSubscribers = provider.roster.members();
    for (const subscriberId of detachedSubscribers) {
      store.assertSubscriber(subscriberId).detach(providerId);
    }
    store.deleteProvider(providerId);

    this._deps.events.emit({
      type: BILLING_EVENTS.PROVIDER_REMOVED,
      source: "registry",
      actor: caller.principal,
      occurredAt: now,
      payload: {
        providerId,
        paidOut: formatAmount(settlement.collected),
        detachedSubscribers,
      },
    });

    return { providerId, settlement, detachedSubscribers };
  }

  // ─── Subscribers ─────────────────────────────────────────────────────

  /**
   * Register a subscriber owned by the caller and enrol it with every
   * active provider in `providerIds`.
   *
   * Inactive or unknown providers are skipped. The deposit must cover
   * `depositCoverPeriods` hours of every enrolled provider's fee; the
   * whole deposit becomes the opening balance.
   */
  async registerSubscriber(
    caller: CallerContext,
    deposit: Amount,
    plan: string,
    providerIds: readonly EntityId[],
  ): Promise<Subscriber> {
    const { store, config } = this._deps;
    const now = this._deps.clock.now();
    const count = providerIds.length;

    if (count < config.minProvidersPerSubscriber || count > config.maxProvidersPerSubscriber) {
      throw new ValidationError(
        "INVALID_PROVIDER_COUNT",
        `A subscriber needs between ${String(config.minProvidersPerSubscriber)} and ${String(config.maxProvidersPerSubscriber)} providers, got ${String(count)}`,
      );
    }
    if (new Set(providerIds).size !== count) {
      throw new ValidationError("DUPLICATE_PROVIDER_ID", "Provider ids must be unique");
    }
    assertNonNegative(deposit, "Deposit");

    const periods = BigInt(config.depositCoverPeriods);
    let remaining = deposit;
    const providers: Provider[] = [];
    for (const providerId of providerIds) {
      const provider = store.getProvider(providerId);
      if (provider === undefined || !provider.active) continue;
      remaining -= periods * provider.schedule.currentRate();
      providers.push(provider);
    }

    if (remaining < 0n) {
      throw new ValidationError(
        "INSUFFICIENT_DEPOSIT",
        `Deposit ${deposit.toString()} is ${(-remaining).toString()} short of covering ${String(config.depositCoverPeriods)} periods of fees`,
      );
    }

    await executeTransfers(this._deps.transfers, config.custody, [
      { kind: "transferFrom", from: caller.principal, to: config.custody, amount: deposit },
    ]);

    const subscriber = new Subscriber({
      id: this._deps.subscriberIds.next(),
      owner: caller.principal,
      balance: deposit,
      plan,
      providers: providers.map((p) => p.id),
      registeredAt: now,
    });

    store.addSubscriber(subscriber);
    for (const provider of providers) {
      provider.enroll(config.operator, subscriber.id, now);
    }

    this._deps.events.emit({
      type: BILLING_EVENTS.SUBSCRIBER_REGISTERED,
      source: "registry",
      actor: caller.principal,
      occurredAt: now,
      payload: {
        subscriberId: subscriber.id,
        owner: subscriber.owner,
        deposit: formatAmount(deposit),
        plan,
        providerIds: subscriber.providers(),
      },
    });

    return subscriber;
  }

  /**
   * Add funds to a subscriber's balance.
   */
  async topUp(caller: CallerContext, subscriberId: EntityId, amount: Amount): Promise<Subscriber> {
    const { store, config } = this._deps;
    const subscriber = store.assertSubscriber(subscriberId);
    const now = this._deps.clock.now();

    if (caller.principal !== subscriber.owner) {
      throw new AuthorizationError(
        "NOT_OWNER",
        `"${caller.principal}" does not own subscriber "${subscriberId}"`,
      );
    }
    if (subscriber.paused) {
      throw new StateError(
        "SUBSCRIBER_CANCELLED",
        `Subscriber "${subscriberId}" is cancelled`,
      );
    }
    assertNonNegative(amount, "Top-up amount", true);

    await executeTransfers(this._deps.transfers, config.custody, [
      { kind: "transferFrom", from: subscriber.owner, to: config.custody, amount },
    ]);
    subscriber.credit(amount);

    this._deps.events.emit({
      type: BILLING_EVENTS.SUBSCRIBER_TOPPED_UP,
      source: "registry",
      actor: caller.principal,
      occurredAt: now,
      payload: {
        subscriberId,
        amount: formatAmount(amount),
        balance: formatAmount(subscriber.balance),
      },
    });

    return subscriber;
  }

  private _assertAdmin(caller: CallerContext): void {
    if (caller.principal !== this._deps.config.controllerOwner) {
      throw new AuthorizationError(
        "NOT_ADMIN",
        `"${caller.principal}" is not the controller owner`,
      );
    }
  }
}
