/**
 * Shared fixtures for @subledger/event-store tests.
 */

import type { DomainEvent } from "@subledger/types";

let counter = 0;

export function makeEvent(
  type: string,
  payload: Record<string, unknown> = {},
): DomainEvent {
  counter += 1;
  return {
    type,
    metadata: {
      eventId: `evt-${String(counter)}`,
      timestamp: "2024-01-01T00:00:00.000Z",
      actor: "tester",
      correlationId: "corr-1",
      source: "registry",
    },
    payload,
  };
}

export function makeEvents(count: number, prefix = "registry.test"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`${prefix}.${String(i + 1)}`));
}

/** Fixed `appendedAt` source for reproducible hashes. */
export const fixedNow = (): string => "2024-01-01T00:00:00.000Z";
