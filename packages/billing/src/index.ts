/**
 * @subledger/billing — Time-sliced earnings accrual and settlement.
 *
 * Tracks providers charging an hourly fee, subscribers prepaying a
 * deposit to use several providers at once, and the settlement of
 * what one owes the other.
 *
 * Invariants:
 * - All arithmetic is bigint; durations count whole hours per fee slice
 * - Time before a provider's last withdrawal is never counted again
 * - Roster indices always match positions under swap-removal
 * - Operations commit only after every value transfer succeeded
 */

// Engine assembly
export { BillingEngine, resolveBillingConfig } from "./engine.js";
export type { BillingEngineOptions, BillingConfigInput } from "./engine.js";

// Core components
export { FeeSchedule, OPEN_END } from "./fee-schedule.js";
export { SubscriberRoster } from "./roster.js";
export type { Membership } from "./roster.js";
export {
  perSubscriberEarnings,
  totalEarnings,
  earningsForOne,
} from "./earnings.js";
export { SettlementLedger } from "./settlement.js";
export type { SettlementDeps } from "./settlement.js";
export { RegistryController } from "./registry.js";
export type { RegistryDeps } from "./registry.js";

// Entities
export { Provider } from "./provider.js";
export type { ProviderInit } from "./provider.js";
export { Subscriber } from "./subscriber.js";
export type { SubscriberInit } from "./subscriber.js";
export { BillingStore } from "./store.js";

// Collaborators
export type { Clock, CalendarPeriod } from "./clock.js";
export { systemClock, ManualClock, calendarPeriod, periodLabel } from "./clock.js";
export type { IdAllocator } from "./ids.js";
export { CounterIdAllocator, UuidIdAllocator } from "./ids.js";
export type { DedupKeyStore } from "./dedup.js";
export {
  InMemoryDedupKeyStore,
  hashRegistrationKey,
  registrationKeyHex,
} from "./dedup.js";
export type { ValueTransferService, TransferRecord } from "./transfers.js";
export {
  InMemoryValueTransferService,
  executeTransfers,
  reverseLeg,
} from "./transfers.js";

// Events
export { BILLING_EVENTS, nullEventSink } from "./events.js";
export type {
  BillingEvent,
  BillingEventType,
  EventSink,
  ProviderRegisteredPayload,
  ProviderRemovedPayload,
  ProviderStatusChangedPayload,
  ProviderFeeChangedPayload,
  SubscriberRegisteredPayload,
  SubscriberToppedUpPayload,
  EarningsWithdrawnPayload,
  SubscriptionCancelledPayload,
} from "./events.js";

// Amount arithmetic
export {
  SECONDS_PER_HOUR,
  parseAmount,
  formatAmount,
  sumAmounts,
  minAmount,
  maxAmount,
  wholeHours,
  assertNonNegative,
} from "./amount-math.js";

// Types
export type {
  AuthorizationErrorCode,
  ValidationErrorCode,
  StateErrorCode,
  TransferErrorCode,
  BillingErrorCode,
  BillingErrorKind,
  TransferLeg,
  OverdraftPolicy,
  BillingConfig,
  ProviderView,
  SubscriberView,
  SubscriberDebit,
  WithdrawalReceipt,
  ProviderPayout,
  CancellationReceipt,
  ProviderRemovalReceipt,
} from "./types.js";

export {
  BillingError,
  AuthorizationError,
  ValidationError,
  StateError,
  TransferError,
  DEFAULT_BILLING_CONFIG,
} from "./types.js";
