/**
 * @subledger/event-store — In-memory journal.
 *
 * Keeps every event in process memory; nothing survives a restart.
 * Subscribers are notified synchronously once an append has been
 * fully recorded.
 */

import type { DomainEvent } from "@subledger/types";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";
import { EventStoreError } from "./types.js";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ExpectedVersion,
  ReadAllOptions,
  ReadDirection,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";

export interface InMemoryEventStoreOptions {
  /** Source of `appendedAt`. Defaults to the wall clock. */
  readonly now?: () => string;
}

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _log: StoredEvent[] = [];
  private readonly _streamHandlers = new Map<string, Set<EventHandler>>();
  private readonly _globalHandlers = new Set<EventHandler>();
  private readonly _now: () => string;
  private _lastHash: string = GENESIS_HASH;

  constructor(options: InMemoryEventStoreOptions = {}) {
    this._now = options.now ?? (() => new Date().toISOString());
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    this._validateStreamId(streamId);
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const currentVersion = this.streamVersion(streamId);
    this._checkExpectedVersion(streamId, currentVersion, options?.expectedVersion ?? "any");

    const appendedAt = this._now();
    const batch: StoredEvent[] = [];
    let previousHash = this._lastHash;

    events.forEach((event, i) => {
      const base = {
        event: { type: event.type, metadata: event.metadata, payload: event.payload },
        streamId,
        version: currentVersion + i + 1,
        globalPosition: this._log.length + i + 1,
        appendedAt,
      };
      const hash = computeEventHash(base, previousHash);
      batch.push({ ...base, previousHash, hash });
      previousHash = hash;
    });

    const stream = this._streams.get(streamId) ?? [];
    stream.push(...batch);
    this._streams.set(streamId, stream);
    this._log.push(...batch);
    this._lastHash = previousHash;

    this._dispatch(streamId, batch);

    return {
      streamId,
      fromVersion: currentVersion + 1,
      toVersion: currentVersion + batch.length,
      count: batch.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options: ReadOptions = {}): readonly StoredEvent[] {
    this._validateStreamId(streamId);
    const fromVersion = options.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${String(fromVersion)}`,
        streamId,
      );
    }

    const stream = this._streams.get(streamId) ?? [];
    return window(stream, (e) => e.version, fromVersion, options.direction, options.maxCount);
  }

  readAll(options: ReadAllOptions = {}): readonly StoredEvent[] {
    return window(
      this._log,
      (e) => e.globalPosition,
      options.fromPosition ?? 1,
      options.direction,
      options.maxCount,
    );
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._validateStreamId(streamId);
    const handlers = this._streamHandlers.get(streamId) ?? new Set<EventHandler>();
    handlers.add(handler);
    this._streamHandlers.set(streamId, handlers);

    return {
      unsubscribe: () => {
        handlers.delete(handler);
        if (handlers.size === 0) {
          this._streamHandlers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalHandlers.add(handler);
    return {
      unsubscribe: () => {
        this._globalHandlers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._log.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._log);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.trim().length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _checkExpectedVersion(
    streamId: string,
    currentVersion: number,
    expected: ExpectedVersion,
  ): void {
    if (expected === "any") return;

    if (expected === "no_stream" && currentVersion !== 0) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" already exists (version ${String(currentVersion)}), expected no_stream`,
        streamId,
      );
    }
    if (typeof expected === "number" && expected !== currentVersion) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${String(currentVersion)}, expected ${String(expected)}`,
        streamId,
      );
    }
  }

  private _dispatch(streamId: string, batch: readonly StoredEvent[]): void {
    const streamHandlers = [...(this._streamHandlers.get(streamId) ?? [])];
    const globalHandlers = [...this._globalHandlers];
    for (const event of batch) {
      for (const handler of streamHandlers) handler(event);
      for (const handler of globalHandlers) handler(event);
    }
  }
}

/**
 * Slice a sequence ordered by `key`, starting at `from` (inclusive).
 */
function window(
  events: readonly StoredEvent[],
  key: (event: StoredEvent) => number,
  from: number,
  direction: ReadDirection = "forward",
  maxCount?: number,
): StoredEvent[] {
  const selected = direction === "forward"
    ? events.filter((e) => key(e) >= from)
    : events.filter((e) => key(e) <= from).reverse();
  return maxCount !== undefined && maxCount >= 0 ? selected.slice(0, maxCount) : selected;
}
