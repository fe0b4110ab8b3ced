/**
 * @subledger/billing — Registration deduplication.
 *
 * A registration key can be used once. The store only ever sees the
 * SHA-256 digest of the key bytes.
 */

import { createHash } from "node:crypto";

export interface DedupKeyStore {
  contains(hash: string): boolean;
  insert(hash: string): void;
}

/**
 * Hex-encoded SHA-256 of the key. Strings are hashed as UTF-8.
 */
export function hashRegistrationKey(key: Uint8Array | string): string {
  return createHash("sha256").update(key).digest("hex");
}

/**
 * Render key bytes as lowercase hex for event payloads.
 */
export function registrationKeyHex(key: Uint8Array | string): string {
  const bytes = typeof key === "string" ? Buffer.from(key, "utf8") : Buffer.from(key);
  return bytes.toString("hex");
}

export class InMemoryDedupKeyStore implements DedupKeyStore {
  private readonly _hashes: Set<string> = new Set();

  contains(hash: string): boolean {
    return this._hashes.has(hash);
  }

  insert(hash: string): void {
    this._hashes.add(hash);
  }

  get size(): number {
    return this._hashes.size;
  }
}
