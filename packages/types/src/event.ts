/**
 * Event Types
 *
 * Append-only event architecture.
 * Every state change in the billing ledger is announced as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which subsystem)
 * - Payloads are JSON-safe: amounts travel as decimal strings
 */

/**
 * Which subsystem emitted an event.
 */
export type EventSource = "registry" | "settlement";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who or what caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** ID for grouping related events across systems */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event.
 * Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "registry.provider.registered") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
