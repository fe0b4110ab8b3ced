/**
 * @subledger/billing — In-process entity store.
 *
 * Owns every Provider and Subscriber. Lookups that must succeed go
 * through the `assert*` methods, which throw StateError.
 */

import type { EntityId } from "@subledger/types";
import type { Provider } from "./provider.js";
import type { Subscriber } from "./subscriber.js";
import { StateError } from "./types.js";

export class BillingStore {
  private readonly _providers: Map<EntityId, Provider> = new Map();
  private readonly _subscribers: Map<EntityId, Subscriber> = new Map();

  // ─── Providers ───────────────────────────────────────────────────────

  addProvider(provider: Provider): void {
    this._providers.set(provider.id, provider);
  }

  getProvider(id: EntityId): Provider | undefined {
    return this._providers.get(id);
  }

  assertProvider(id: EntityId): Provider {
    const provider = this._providers.get(id);
    if (provider === undefined) {
      throw new StateError("PROVIDER_NOT_FOUND", `Unknown provider: "${id}"`);
    }
    return provider;
  }

  deleteProvider(id: EntityId): void {
    this._providers.delete(id);
  }

  listProviders(): readonly Provider[] {
    return [...this._providers.values()];
  }

  get providerCount(): number {
    return this._providers.size;
  }

  // ─── Subscribers ─────────────────────────────────────────────────────

  addSubscriber(subscriber: Subscriber): void {
    this._subscribers.set(subscriber.id, subscriber);
  }

  getSubscriber(id: EntityId): Subscriber | undefined {
    return this._subscribers.get(id);
  }

  assertSubscriber(id: EntityId): Subscriber {
    const subscriber = this._subscribers.get(id);
    if (subscriber === undefined) {
      throw new StateError("SUBSCRIBER_NOT_FOUND", `Unknown subscriber: "${id}"`);
    }
    return subscriber;
  }

  listSubscribers(): readonly Subscriber[] {
    return [...this._subscribers.values()];
  }
}
