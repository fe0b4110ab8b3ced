/**
 * @subledger/billing — Deterministic amount arithmetic.
 *
 * All arithmetic uses bigint. Amounts cross system boundaries as
 * decimal integer strings and are converted here.
 *
 * Rules:
 * - No floating-point operations
 * - Durations are counted in whole hours; partial hours count as zero
 */

import type { Amount, UnixSeconds } from "@subledger/types";
import { ValidationError } from "./types.js";

export const SECONDS_PER_HOUR = 3600;

// ─── Conversion ──────────────────────────────────────────────────────────

/**
 * Parse a decimal integer string into an Amount.
 *
 * "73000" → 73000n
 * "-5" → -5n
 */
export function parseAmount(amount: string): Amount {
  const trimmed = amount.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ValidationError("INVALID_AMOUNT", `Invalid amount format: "${amount}"`);
  }
  return BigInt(trimmed);
}

/**
 * Render an Amount as a decimal integer string (the wire form).
 */
export function formatAmount(amount: Amount): string {
  return amount.toString();
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

export function sumAmounts(amounts: Iterable<Amount>): Amount {
  let total = 0n;
  for (const amount of amounts) {
    total += amount;
  }
  return total;
}

export function minAmount(a: Amount, b: Amount): Amount {
  return a < b ? a : b;
}

export function maxAmount(a: Amount, b: Amount): Amount {
  return a > b ? a : b;
}

/**
 * Number of complete hours in a duration, as a bigint multiplier.
 *
 * 7199s → 1n, 3599s → 0n, negative → 0n
 */
export function wholeHours(seconds: UnixSeconds): Amount {
  if (seconds <= 0) {
    return 0n;
  }
  return BigInt(Math.floor(seconds / SECONDS_PER_HOUR));
}

/**
 * Throw unless `amount` is non-negative (or strictly positive).
 */
export function assertNonNegative(amount: Amount, label: string, strict = false): void {
  if (strict ? amount <= 0n : amount < 0n) {
    throw new ValidationError(
      "INVALID_AMOUNT",
      `${label} must be ${strict ? "positive" : "non-negative"}, got ${amount.toString()}`,
    );
  }
}
