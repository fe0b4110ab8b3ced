/**
 * @subledger/event-store — Hash chain.
 *
 * Events are canonicalised with RFC 8785 (JCS) and hashed with SHA-256
 * together with the hash of the event before them:
 *
 *   hash[1] = sha256(jcs(event[1]) + "genesis")
 *   hash[n] = sha256(jcs(event[n]) + hash[n-1])
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  IntegrityError,
  StoredEvent,
  UnhashedEvent,
} from "./types.js";

/** `previousHash` of the first event in a journal. */
export const GENESIS_HASH = "genesis";

function canonicalContent(event: UnhashedEvent): string {
  return canonicalize({
    event: {
      type: event.event.type,
      metadata: event.event.metadata,
      payload: event.event.payload,
    },
    streamId: event.streamId,
    version: event.version,
    globalPosition: event.globalPosition,
    appendedAt: event.appendedAt,
  });
}

/**
 * Hex-encoded SHA-256 of `event` linked to `previousHash`.
 */
export function computeEventHash(event: UnhashedEvent, previousHash: string): string {
  return createHash("sha256")
    .update(canonicalContent(event) + previousHash)
    .digest("hex");
}

/**
 * Check links and hashes of events given in global order.
 * Every broken link and every mismatched hash is reported.
 */
export function verifyHashChain(events: readonly StoredEvent[]): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let expectedPrevious = GENESIS_HASH;
  let lastVerifiedPosition = 0;

  for (const stored of events) {
    const position = stored.globalPosition;

    if (stored.previousHash !== expectedPrevious) {
      errors.push({
        position,
        reason: `previousHash mismatch at position ${String(position)}: expected "${expectedPrevious}", got "${stored.previousHash}"`,
      });
    }

    const recomputed = computeEventHash(stored, stored.previousHash);
    if (stored.hash !== recomputed) {
      errors.push({
        position,
        reason: `Hash mismatch at position ${String(position)}: expected "${recomputed}", got "${stored.hash}"`,
      });
    }

    expectedPrevious = stored.hash;
    lastVerifiedPosition = position;
  }

  return { valid: errors.length === 0, lastVerifiedPosition, errors };
}
