/**
 * @subledger/billing — Engine assembly and read models.
 *
 * Wires one store, settlement ledger and registry controller around a
 * shared set of collaborators. Mutations go through `registry` and
 * `settlement`; the engine itself only adds read-side queries.
 */

import type { Amount, EntityId } from "@subledger/types";
import type { Clock } from "./clock.js";
import { periodLabel } from "./clock.js";
import { InMemoryDedupKeyStore } from "./dedup.js";
import type { DedupKeyStore } from "./dedup.js";
import { totalEarnings } from "./earnings.js";
import { nullEventSink } from "./events.js";
import type { EventSink } from "./events.js";
import { CounterIdAllocator } from "./ids.js";
import type { IdAllocator } from "./ids.js";
import { RegistryController } from "./registry.js";
import { SettlementLedger } from "./settlement.js";
import { BillingStore } from "./store.js";
import type { ValueTransferService } from "./transfers.js";
import { DEFAULT_BILLING_CONFIG } from "./types.js";
import type { BillingConfig, ProviderView, SubscriberView } from "./types.js";

type DefaultedKey = keyof typeof DEFAULT_BILLING_CONFIG;

/** BillingConfig with the defaulted fields made optional. */
export type BillingConfigInput = Omit<BillingConfig, DefaultedKey> &
  Partial<Pick<BillingConfig, DefaultedKey>>;

export function resolveBillingConfig(input: BillingConfigInput): BillingConfig {
  return { ...DEFAULT_BILLING_CONFIG, ...input };
}

export interface BillingEngineOptions {
  readonly config: BillingConfigInput;
  readonly clock: Clock;
  readonly transfers: ValueTransferService;
  readonly providerIds?: IdAllocator;
  readonly subscriberIds?: IdAllocator;
  readonly dedupKeys?: DedupKeyStore;
  readonly events?: EventSink;
}

export class BillingEngine {
  readonly config: BillingConfig;
  readonly store: BillingStore = new BillingStore();
  readonly settlement: SettlementLedger;
  readonly registry: RegistryController;

  private readonly _clock: Clock;

  constructor(options: BillingEngineOptions) {
    this.config = resolveBillingConfig(options.config);
    this._clock = options.clock;
    const events = options.events ?? nullEventSink;

    this.settlement = new SettlementLedger({
      store: this.store,
      clock: options.clock,
      transfers: options.transfers,
      events,
      config: this.config,
    });

    this.registry = new RegistryController({
      store: this.store,
      clock: options.clock,
      providerIds: options.providerIds ?? new CounterIdAllocator(),
      subscriberIds: options.subscriberIds ?? new CounterIdAllocator(),
      transfers: options.transfers,
      dedupKeys: options.dedupKeys ?? new InMemoryDedupKeyStore(),
      events,
      settlement: this.settlement,
      config: this.config,
    });
  }

  // ─── Read Models ─────────────────────────────────────────────────────

  getProvider(id: EntityId): ProviderView {
    return this.store.assertProvider(id).view();
  }

  listProviders(): readonly ProviderView[] {
    return this.store.listProviders().map((p) => p.view());
  }

  getSubscriber(id: EntityId): SubscriberView {
    return this.store.assertSubscriber(id).view();
  }

  /** What the provider's next withdrawal would owe right now. */
  pendingEarnings(providerId: EntityId): Amount {
    return totalEarnings(this.store.assertProvider(providerId), this._clock.now());
  }

  /** What cancelling the subscriber right now would owe. */
  outstandingDues(subscriberId: EntityId): Amount {
    return this.settlement.outstandingDues(subscriberId, this._clock.now());
  }

  /** Total the provider withdrew during a calendar month (1-12). */
  monthlyWithdrawals(providerId: EntityId, year: number, month: number): Amount {
    return this.store.assertProvider(providerId).withdrawnIn(periodLabel(year, month));
  }
}
