/**
 * Runtime Type Guards
 *
 * Narrowing functions for billing domain types.
 * Used at system boundaries (deserialized events, external input).
 */

import type { FeeEntry, Withdrawal } from "./financial.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isTimestamp(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

// =============================================================================
// Financial guards
// =============================================================================

const AMOUNT_PATTERN = /^(0|[1-9]\d*)$/;

/**
 * A non-negative decimal integer string, the wire form of an Amount.
 */
export function isAmountString(value: unknown): value is string {
  return typeof value === "string" && AMOUNT_PATTERN.test(value);
}

export function isFeeEntry(value: unknown): value is FeeEntry {
  if (!isRecord(value)) return false;
  return (
    isTimestamp(value.start) &&
    isTimestamp(value.end) &&
    value.start < value.end &&
    typeof value.amount === "bigint" &&
    value.amount >= 0n
  );
}

export function isWithdrawal(value: unknown): value is Withdrawal {
  if (!isRecord(value)) return false;
  return isTimestamp(value.timestamp) && typeof value.amount === "bigint";
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["registry", "settlement"]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.actor === "string" &&
    typeof value.correlationId === "string" &&
    isEventSource(value.source) &&
    (value.causationId === undefined || typeof value.causationId === "string")
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.type === "string" &&
    value.type.length > 0 &&
    isEventMetadata(value.metadata) &&
    isRecord(value.payload)
  );
}
