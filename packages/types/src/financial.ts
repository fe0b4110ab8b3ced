/**
 * Financial Types
 *
 * Core primitives for deterministic subscription accounting.
 *
 * Rules:
 * - All amounts are bigint integer units (no floating point, no drift)
 * - Time is integral Unix seconds, sampled once per operation
 * - Fee history is a tiling of half-open intervals
 */

/**
 * An exact amount of currency units.
 * Fees are expressed as units per hour.
 */
export type Amount = bigint;

/** Integral seconds since the Unix epoch. */
export type UnixSeconds = number;

/** Opaque identifier of a provider or subscriber. */
export type EntityId = string;

/**
 * Opaque identity of an account holder (owner, operator, custody).
 * Doubles as the address used by the value-transfer service.
 */
export type Principal = string;

/**
 * An already-authenticated caller, supplied by the calling layer.
 * The core never derives identity on its own.
 */
export interface CallerContext {
  readonly principal: Principal;
}

/**
 * One interval of a provider's fee history.
 * `amount` is charged per hour during `[start, end)`.
 */
export interface FeeEntry {
  readonly start: UnixSeconds;
  readonly end: UnixSeconds;
  readonly amount: Amount;
}

/**
 * The point up to which a provider has been paid.
 * Earnings before `timestamp` are settled and never counted again.
 */
export interface Withdrawal {
  readonly timestamp: UnixSeconds;
  readonly amount: Amount;
}
