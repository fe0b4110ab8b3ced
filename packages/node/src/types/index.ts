/**
 * Type barrel — re-exports all public types from @subledger/node.
 */

// DTOs
export {
  AmountSchema,
  EntityIdSchema,
  RegisterProviderSchema,
  UpdateProviderFeeSchema,
  SetProviderStatusSchema,
  ProviderRefSchema,
  MonthlyWithdrawalsQuerySchema,
  RegisterSubscriberSchema,
  TopUpSchema,
  SubscriberRefSchema,
} from "./dto.js";
export type {
  RegisterProviderDto,
  UpdateProviderFeeDto,
  SetProviderStatusDto,
  ProviderRefDto,
  MonthlyWithdrawalsQuery,
  RegisterSubscriberDto,
  TopUpDto,
  SubscriberRefDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ErrorCode, ErrorKind, ErrorDetail, ErrorEnvelope } from "./error.js";
