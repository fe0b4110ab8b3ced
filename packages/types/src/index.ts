/**
 * @subledger/types — Shared domain types for the Subledger stack.
 *
 * These types are used across all Subledger packages:
 * - Financial primitives (Amount, fee entries, withdrawals)
 * - Identity (principals, caller context)
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Financial types
export type {
  Amount,
  UnixSeconds,
  EntityId,
  Principal,
  CallerContext,
  FeeEntry,
  Withdrawal,
} from "./financial.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isAmountString,
  isFeeEntry,
  isWithdrawal,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
