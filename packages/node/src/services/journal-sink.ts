/**
 * JournalEventSink — records billing events in the event store.
 *
 * Provider events go to `provider-<id>`, subscriber events to
 * `subscriber-<id>`. Every event emitted during one operation shares
 * that operation's correlation id.
 */

import { randomUUID } from "node:crypto";
import type { BillingEvent, EventSink } from "@subledger/billing";
import type { EventStore } from "@subledger/event-store";
import type { DomainEvent } from "@subledger/types";

export function streamFor(event: BillingEvent): string {
  const payload = event.payload;
  return "providerId" in payload
    ? `provider-${payload.providerId}`
    : `subscriber-${payload.subscriberId}`;
}

export function toDomainEvent(event: BillingEvent, correlationId: string): DomainEvent {
  return {
    type: event.type,
    metadata: {
      eventId: randomUUID(),
      timestamp: new Date(event.occurredAt * 1000).toISOString(),
      actor: event.actor,
      correlationId,
      source: event.source,
    },
    payload: event.payload,
  };
}

export class JournalEventSink implements EventSink {
  private readonly _store: EventStore;
  private _correlationId: string = randomUUID();

  constructor(store: EventStore) {
    this._store = store;
  }

  /** Start a new correlation scope and return its id. */
  beginOperation(): string {
    this._correlationId = randomUUID();
    return this._correlationId;
  }

  emit(event: BillingEvent): void {
    this._store.append(streamFor(event), [toDomainEvent(event, this._correlationId)]);
  }
}
