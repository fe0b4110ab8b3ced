/**
 * @subledger/billing — Types for the accrual and settlement engine.
 *
 * These extend the shared @subledger/types with engine-specific
 * structures: error taxonomy, configuration and receipts.
 *
 * Rules:
 * - Receipts and views are readonly snapshots
 * - Fail-closed: invalid operations throw, never silently succeed
 * - A thrown error means no state was changed
 */

import type { Amount, EntityId, FeeEntry, Principal, UnixSeconds, Withdrawal } from "@subledger/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Caller is not the required owner, operator or administrator. */
export type AuthorizationErrorCode =
  | "NOT_OWNER"
  | "NOT_OPERATOR"
  | "NOT_ADMIN"
  | "UNKNOWN_API_KEY";

/** Input is rejected before any state is read for mutation. */
export type ValidationErrorCode =
  | "FEE_BELOW_MINIMUM"
  | "DUPLICATE_REGISTRATION_KEY"
  | "INVALID_PROVIDER_COUNT"
  | "DUPLICATE_PROVIDER_ID"
  | "BATCH_LENGTH_MISMATCH"
  | "PROVIDER_CAPACITY_REACHED"
  | "INSUFFICIENT_DEPOSIT"
  | "INVALID_AMOUNT"
  | "INVALID_INPUT";

/** The entity is not in a state that permits the operation. */
export type StateErrorCode =
  | "PROVIDER_NOT_FOUND"
  | "PROVIDER_INACTIVE"
  | "SUBSCRIBER_NOT_FOUND"
  | "ALREADY_SUBSCRIBED"
  | "NOT_SUBSCRIBED"
  | "SUBSCRIBER_CANCELLED"
  | "CLOCK_REGRESSION";

export type TransferErrorCode = "TRANSFER_FAILED";

export type BillingErrorCode =
  | AuthorizationErrorCode
  | ValidationErrorCode
  | StateErrorCode
  | TransferErrorCode;

export type BillingErrorKind = "authorization" | "validation" | "state" | "transfer";

/**
 * Structured error from the billing engine.
 * Always thrown, never returned.
 */
export class BillingError extends Error {
  public readonly kind: BillingErrorKind;
  public readonly code: BillingErrorCode;

  constructor(
    kind: BillingErrorKind,
    code: BillingErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "BillingError";
    this.kind = kind;
    this.code = code;
  }
}

export class AuthorizationError extends BillingError {
  constructor(code: AuthorizationErrorCode, message: string) {
    super("authorization", code, message);
    this.name = "AuthorizationError";
  }
}

export class ValidationError extends BillingError {
  constructor(code: ValidationErrorCode, message: string) {
    super("validation", code, message);
    this.name = "ValidationError";
  }
}

export class StateError extends BillingError {
  constructor(code: StateErrorCode, message: string) {
    super("state", code, message);
    this.name = "StateError";
  }
}

/**
 * A value transfer was declined or threw.
 *
 * `unreconciled` lists legs that executed but could not be reversed;
 * it is empty whenever compensation succeeded.
 */
export class TransferError extends BillingError {
  public readonly unreconciled: readonly TransferLeg[];

  constructor(
    message: string,
    unreconciled: readonly TransferLeg[] = [],
    options?: ErrorOptions,
  ) {
    super("transfer", "TRANSFER_FAILED", message, options);
    this.name = "TransferError";
    this.unreconciled = unreconciled;
  }
}

// ─── Transfers ───────────────────────────────────────────────────────────

/**
 * One movement of value through the external transfer service.
 *
 * - "transfer": custody pays `to`
 * - "transferFrom": `from` pays `to`
 */
export type TransferLeg =
  | { readonly kind: "transfer"; readonly to: Principal; readonly amount: Amount }
  | {
      readonly kind: "transferFrom";
      readonly from: Principal;
      readonly to: Principal;
      readonly amount: Amount;
    };

// ─── Configuration ───────────────────────────────────────────────────────

/**
 * What a withdrawal does when a subscriber's balance cannot cover its share.
 *
 * - "clamp": collect at most the remaining balance; the rest is written off
 * - "allow-negative": collect the full share and let the balance go negative
 */
export type OverdraftPolicy = "clamp" | "allow-negative";

export interface BillingConfig {
  /** Principal allowed to run administrative operations. */
  readonly controllerOwner: Principal;
  /** Principal that performs roster mutations on every provider. */
  readonly operator: Principal;
  /** Principal holding subscriber deposits. */
  readonly custody: Principal;
  /** Lowest hourly fee a provider may charge. */
  readonly minimalFee: Amount;
  /** Global provider cap; unlimited when undefined. */
  readonly maxProviders?: number | undefined;
  /** Number of fee periods a new deposit must cover per provider. */
  readonly depositCoverPeriods: number;
  readonly minProvidersPerSubscriber: number;
  readonly maxProvidersPerSubscriber: number;
  readonly overdraftPolicy: OverdraftPolicy;
}

/** 3..14 providers per subscriber, deposits covering two periods, clamped withdrawals. */
export const DEFAULT_BILLING_CONFIG = {
  depositCoverPeriods: 2,
  minProvidersPerSubscriber: 3,
  maxProvidersPerSubscriber: 14,
  overdraftPolicy: "clamp",
} as const satisfies Partial<BillingConfig>;

// ─── Read Models ─────────────────────────────────────────────────────────

export interface ProviderView {
  readonly id: EntityId;
  readonly owner: Principal;
  readonly operator: Principal;
  readonly active: boolean;
  readonly fee: Amount;
  readonly feeSchedule: readonly FeeEntry[];
  readonly subscribers: readonly EntityId[];
  readonly lastWithdrawal: Withdrawal;
  readonly registeredAt: UnixSeconds;
}

export interface SubscriberView {
  readonly id: EntityId;
  readonly owner: Principal;
  readonly balance: Amount;
  readonly plan: string;
  readonly paused: boolean;
  readonly providers: readonly EntityId[];
  readonly registeredAt: UnixSeconds;
}

// ─── Receipts ────────────────────────────────────────────────────────────

/** One subscriber's contribution to a provider withdrawal. */
export interface SubscriberDebit {
  readonly subscriberId: EntityId;
  readonly owed: Amount;
  readonly debited: Amount;
}

export interface WithdrawalReceipt {
  readonly providerId: EntityId;
  readonly timestamp: UnixSeconds;
  /** Sum of accrued earnings across the roster. */
  readonly owed: Amount;
  /** Sum actually debited from balances and paid to the provider owner. */
  readonly collected: Amount;
  /** `owed - collected`; written off under the "clamp" policy. */
  readonly uncollected: Amount;
  readonly debits: readonly SubscriberDebit[];
}

/** One provider's share of a cancellation. */
export interface ProviderPayout {
  readonly providerId: EntityId;
  readonly owner: Principal;
  readonly amount: Amount;
}

export interface CancellationReceipt {
  readonly subscriberId: EntityId;
  readonly timestamp: UnixSeconds;
  readonly owed: Amount;
  /** Amount pulled from the subscriber owner because the balance fell short. */
  readonly shortfall: Amount;
  readonly balanceAfter: Amount;
  readonly payouts: readonly ProviderPayout[];
}

export interface ProviderRemovalReceipt {
  readonly providerId: EntityId;
  readonly settlement: WithdrawalReceipt;
  readonly detachedSubscribers: readonly EntityId[];
}
