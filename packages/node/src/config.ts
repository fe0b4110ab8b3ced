/**
 * @subledger/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { BillingConfigInput } from "@subledger/billing";

// =============================================================================
// Schema
// =============================================================================

const IntegerString = z.string().trim().regex(/^\d+$/, "Expected a non-negative integer");

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Principals
  CONTROLLER_OWNER: z.string().min(1).default("admin"),
  OPERATOR_PRINCIPAL: z.string().min(1).default("registry"),
  CUSTODY_ACCOUNT: z.string().min(1).default("custody"),

  // Billing rules
  MINIMAL_FEE: IntegerString.default("1").transform((v) => BigInt(v)),
  MAX_PROVIDERS: z.coerce.number().int().min(1).optional(),
  OVERDRAFT_POLICY: z.enum(["clamp", "allow-negative"]).default("clamp"),
  ID_STRATEGY: z.enum(["counter", "uuid"]).default("counter"),

  // Auth
  API_KEYS: z.string().default(""),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly principal: string;
}

/**
 * Parse the API_KEYS env var into key → principal records.
 *
 * Format: "key1:principal1,key2:principal2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, principal] = parts;
    if (parts.length !== 2 || key === undefined || principal === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:principal`,
      );
    }
    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (principal === "") {
      throw new Error(`Principal cannot be empty for API key "${key}"`);
    }
    if (seen.has(key)) {
      throw new Error(`Duplicate API key "${key}" in API_KEYS`);
    }

    seen.add(key);
    keys.push({ key, principal });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * The engine settings carried by an AppConfig.
 */
export function toBillingConfig(config: AppConfig): BillingConfigInput {
  return {
    controllerOwner: config.CONTROLLER_OWNER,
    operator: config.OPERATOR_PRINCIPAL,
    custody: config.CUSTODY_ACCOUNT,
    minimalFee: config.MINIMAL_FEE,
    maxProviders: config.MAX_PROVIDERS,
    overdraftPolicy: config.OVERDRAFT_POLICY,
  };
}
