/**
 * Tests for the journal adapter.
 */

import { describe, it, expect } from "vitest";
import type { BillingEvent } from "@subledger/billing";
import { InMemoryEventStore } from "@subledger/event-store";
import { JournalEventSink, streamFor, toDomainEvent } from "../src/services/journal-sink.js";
import { T0 } from "./setup.js";

const withdrawn: BillingEvent = {
  type: "settlement.earnings.withdrawn",
  source: "settlement",
  actor: "p1",
  occurredAt: T0 + 3600,
  payload: { providerId: "7", owed: "100", collected: "100", uncollected: "0", subscriberCount: 1 },
};

const toppedUp: BillingEvent = {
  type: "registry.subscriber.topped_up",
  source: "registry",
  actor: "alice",
  occurredAt: T0,
  payload: { subscriberId: "3", amount: "50", balance: "650" },
};

describe("streamFor", () => {
  it("routes by the entity in the payload", () => {
    expect(streamFor(withdrawn)).toBe("provider-7");
    expect(streamFor(toppedUp)).toBe("subscriber-3");
  });
});

describe("toDomainEvent", () => {
  it("converts the timestamp and keeps the payload", () => {
    const event = toDomainEvent(withdrawn, "corr-1");

    expect(event.type).toBe("settlement.earnings.withdrawn");
    expect(event.metadata).toMatchObject({
      timestamp: "2024-01-01T01:00:00.000Z",
      actor: "p1",
      correlationId: "corr-1",
      source: "settlement",
    });
    expect(event.metadata.eventId).toMatch(/^[0-9a-f-]{36}$/);
    expect(event.payload).toEqual(withdrawn.payload);
  });
});

describe("JournalEventSink", () => {
  it("appends under the current correlation id", () => {
    const store = new InMemoryEventStore();
    const sink = new JournalEventSink(store);

    const first = sink.beginOperation();
    sink.emit(withdrawn);
    sink.emit(toppedUp);
    const second = sink.beginOperation();
    sink.emit(withdrawn);

    expect(first).not.toBe(second);
    expect(store.readAll().map((e) => [e.streamId, e.version, e.event.metadata.correlationId])).toEqual([
      ["provider-7", 1, first],
      ["subscriber-3", 1, first],
      ["provider-7", 2, second],
    ]);
  });
});
