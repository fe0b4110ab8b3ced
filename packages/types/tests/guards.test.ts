/**
 * Runtime type guard tests for @subledger/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isAmountString,
  isFeeEntry,
  isWithdrawal,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "../src/guards.js";

// =============================================================================
// Financial guards
// =============================================================================

describe("isAmountString", () => {
  it("accepts decimal integers", () => {
    expect(isAmountString("0")).toBe(true);
    expect(isAmountString("73000")).toBe(true);
  });

  it("rejects leading zeros, signs and fractions", () => {
    expect(isAmountString("007")).toBe(false);
    expect(isAmountString("-5")).toBe(false);
    expect(isAmountString("1.5")).toBe(false);
    expect(isAmountString("")).toBe(false);
  });

  it("rejects numbers", () => {
    expect(isAmountString(100)).toBe(false);
  });
});

describe("isFeeEntry", () => {
  it("accepts a well-formed interval", () => {
    expect(isFeeEntry({ start: 0, end: 3600, amount: 100n })).toBe(true);
  });

  it("rejects an empty interval", () => {
    expect(isFeeEntry({ start: 3600, end: 3600, amount: 100n })).toBe(false);
  });

  it("rejects numeric amount (must be bigint)", () => {
    expect(isFeeEntry({ start: 0, end: 3600, amount: 100 })).toBe(false);
  });

  it("rejects negative rates", () => {
    expect(isFeeEntry({ start: 0, end: 3600, amount: -1n })).toBe(false);
  });

  it("rejects null and arrays", () => {
    expect(isFeeEntry(null)).toBe(false);
    expect(isFeeEntry([0, 3600, 100n])).toBe(false);
  });
});

describe("isWithdrawal", () => {
  it("accepts a withdrawal record", () => {
    expect(isWithdrawal({ timestamp: 1_700_000_000, amount: 0n })).toBe(true);
  });

  it("rejects fractional timestamps", () => {
    expect(isWithdrawal({ timestamp: 1.5, amount: 0n })).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

const METADATA = {
  eventId: "evt-1",
  timestamp: "2024-01-01T00:00:00.000Z",
  actor: "alice",
  correlationId: "corr-1",
  source: "registry",
};

describe("isEventSource", () => {
  it("accepts known sources", () => {
    expect(isEventSource("registry")).toBe(true);
    expect(isEventSource("settlement")).toBe(true);
  });

  it("rejects unknown sources", () => {
    expect(isEventSource("journal")).toBe(false);
  });
});

describe("isEventMetadata", () => {
  it("accepts metadata without causationId", () => {
    expect(isEventMetadata(METADATA)).toBe(true);
  });

  it("accepts metadata with causationId", () => {
    expect(isEventMetadata({ ...METADATA, causationId: "evt-0" })).toBe(true);
  });

  it("rejects non-string causationId", () => {
    expect(isEventMetadata({ ...METADATA, causationId: 7 })).toBe(false);
  });

  it("rejects missing actor", () => {
    const { actor: _actor, ...rest } = METADATA;
    expect(isEventMetadata(rest)).toBe(false);
  });
});

describe("isDomainEvent", () => {
  it("accepts a valid event", () => {
    expect(
      isDomainEvent({
        type: "registry.provider.registered",
        metadata: METADATA,
        payload: { providerId: "1" },
      }),
    ).toBe(true);
  });

  it("rejects an empty type", () => {
    expect(isDomainEvent({ type: "", metadata: METADATA, payload: {} })).toBe(false);
  });

  it("rejects a non-object payload", () => {
    expect(
      isDomainEvent({ type: "x", metadata: METADATA, payload: "nope" }),
    ).toBe(false);
  });
});
