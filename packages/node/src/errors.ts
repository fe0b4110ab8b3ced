/**
 * @subledger/node — Error mapping.
 *
 * Turns anything an operation throws into an ErrorEnvelope. Billing
 * errors keep their code and kind, schema failures become INVALID_INPUT,
 * journal failures keep their code, and everything else is reported as
 * INTERNAL_ERROR without its message.
 */

import { ZodError } from "zod";
import { BillingError } from "@subledger/billing";
import { EventStoreError } from "@subledger/event-store";
import { createErrorEnvelope } from "./types/error.js";
import type { ErrorEnvelope } from "./types/error.js";

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function toErrorEnvelope(error: unknown): ErrorEnvelope {
  if (error instanceof BillingError) {
    return createErrorEnvelope(error.code, error.kind, error.message);
  }
  if (error instanceof ZodError) {
    return createErrorEnvelope("INVALID_INPUT", "validation", describeIssues(error), {
      issues: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    });
  }
  if (error instanceof EventStoreError) {
    return createErrorEnvelope(error.code, "journal", error.message);
  }
  return createErrorEnvelope("INTERNAL_ERROR", "internal", "Internal error");
}
