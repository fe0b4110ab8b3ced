/**
 * Error envelope returned to callers of the service.
 *
 * All failures follow the shape:
 * { error: { code: string, kind: string, message: string, details?: ... } }
 */

import type { BillingErrorCode, BillingErrorKind } from "@subledger/billing";
import type { EventStoreErrorCode } from "@subledger/event-store";

// =============================================================================
// Error Codes
// =============================================================================

export type ErrorCode = BillingErrorCode | EventStoreErrorCode | "INTERNAL_ERROR";

export type ErrorKind = BillingErrorKind | "journal" | "internal";

// =============================================================================
// Error Envelope
// =============================================================================

export interface ErrorDetail {
  readonly code: ErrorCode;
  readonly kind: ErrorKind;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: ErrorCode,
  kind: ErrorKind,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, kind, message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}
