/**
 * @subledger/event-store — Journal types.
 *
 * The journal is append-only: events are never updated or deleted.
 * Each stream numbers its events 1, 2, 3, ... and the journal as a
 * whole assigns a global position in append order. Every stored event
 * carries the hash of its predecessor, so any edit breaks the chain.
 */

import type { DomainEvent, EventMetadata } from "@subledger/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * A DomainEvent as recorded in the journal.
 */
export interface StoredEvent {
  readonly event: Readonly<{
    readonly type: string;
    readonly metadata: EventMetadata;
    readonly payload: Readonly<Record<string, unknown>>;
  }>;

  readonly streamId: string;

  /** 1-based, contiguous within the stream */
  readonly version: number;

  /** 1-based, contiguous across the journal */
  readonly globalPosition: number;

  /** ISO 8601 time the journal accepted the event */
  readonly appendedAt: string;

  /** Hash of the preceding event, or GENESIS_HASH */
  readonly previousHash: string;

  /** SHA-256 over the canonical event content and `previousHash` */
  readonly hash: string;
}

/** The part of a stored event that its hash covers. */
export type UnhashedEvent = Omit<StoredEvent, "hash" | "previousHash">;

// =============================================================================
// Append / Read
// =============================================================================

/**
 * Optimistic concurrency guard for an append.
 *
 * - a number: the stream must currently be at this version
 * - "no_stream": the stream must be empty
 * - "any": no check
 */
export type ExpectedVersion = number | "no_stream" | "any";

export interface AppendOptions {
  readonly expectedVersion?: ExpectedVersion;
}

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  readonly toVersion: number;
  readonly count: number;
}

export type ReadDirection = "forward" | "backward";

export interface ReadOptions {
  /** Inclusive start; counts down when reading backward. Default 1 */
  readonly fromVersion?: number;
  readonly maxCount?: number;
  readonly direction?: ReadDirection;
}

export interface ReadAllOptions {
  /** Inclusive start; counts down when reading backward. Default 1 */
  readonly fromPosition?: number;
  readonly maxCount?: number;
  readonly direction?: ReadDirection;
}

// =============================================================================
// Subscriptions
// =============================================================================

export type EventHandler = (event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  /** Global position of the last event checked, 0 for an empty journal */
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event journal.
 *
 * Invariants:
 * - Stream versions and global positions have no gaps
 * - An append is all-or-nothing
 * - Subscribers see events in append order, after the append completes
 */
export interface EventStore {
  /**
   * Append events to a stream in order.
   * @throws EventStoreError on an empty batch, a blank stream id or a version conflict
   */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult;

  /** Events of one stream; empty when the stream does not exist. */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /** Events of every stream in global order. */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  subscribe(streamId: string, handler: EventHandler): Subscription;

  subscribeAll(handler: EventHandler): Subscription;

  streamExists(streamId: string): boolean;

  /** Version of the stream's last event, 0 when empty. */
  streamVersion(streamId: string): number;

  /** Position of the journal's last event, 0 when empty. */
  globalPosition(): number;

  /** Recompute and check the whole hash chain. */
  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
