/**
 * Operation input DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Amounts arrive as decimal-integer strings and leave as bigint.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AmountSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, "Amount must be a non-negative decimal integer")
  .transform((v) => BigInt(v));

export const EntityIdSchema = z.string().min(1).max(128);

// =============================================================================
// Provider DTOs
// =============================================================================

export const RegisterProviderSchema = z.object({
  registrationKey: z.string().min(1).max(256),
  fee: AmountSchema,
});

export type RegisterProviderDto = z.infer<typeof RegisterProviderSchema>;

export const UpdateProviderFeeSchema = z.object({
  providerId: EntityIdSchema,
  fee: AmountSchema,
});

export type UpdateProviderFeeDto = z.infer<typeof UpdateProviderFeeSchema>;

export const SetProviderStatusSchema = z.object({
  providerIds: z.array(EntityIdSchema).min(1),
  flags: z.array(z.boolean()).min(1),
});

export type SetProviderStatusDto = z.infer<typeof SetProviderStatusSchema>;

export const ProviderRefSchema = z.object({
  providerId: EntityIdSchema,
});

export type ProviderRefDto = z.infer<typeof ProviderRefSchema>;

export const MonthlyWithdrawalsQuerySchema = z.object({
  providerId: EntityIdSchema,
  year: z.coerce.number().int().min(1970).max(9999),
  month: z.coerce.number().int().min(1).max(12),
});

export type MonthlyWithdrawalsQuery = z.infer<typeof MonthlyWithdrawalsQuerySchema>;

// =============================================================================
// Subscriber DTOs
// =============================================================================

export const RegisterSubscriberSchema = z.object({
  deposit: AmountSchema,
  plan: z.string().min(1).max(64).default("basic"),
  providerIds: z.array(EntityIdSchema),
});

export type RegisterSubscriberDto = z.infer<typeof RegisterSubscriberSchema>;

export const TopUpSchema = z.object({
  subscriberId: EntityIdSchema,
  amount: AmountSchema,
});

export type TopUpDto = z.infer<typeof TopUpSchema>;

export const SubscriberRefSchema = z.object({
  subscriberId: EntityIdSchema,
});

export type SubscriberRefDto = z.infer<typeof SubscriberRefSchema>;
