/**
 * Tests for config.ts — parseApiKeys, loadConfig, toBillingConfig.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig, parseApiKeys, toBillingConfig } from "../src/config.js";

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns an empty list for a blank string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses comma-separated key:principal pairs", () => {
    expect(parseApiKeys(" k1:admin , k2:alice ")).toEqual([
      { key: "k1", principal: "admin" },
      { key: "k2", principal: "alice" },
    ]);
  });

  it("throws on a malformed entry", () => {
    expect(() => parseApiKeys("badentry")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:b:c")).toThrow("Invalid API_KEYS entry");
  });

  it("throws on empty parts", () => {
    expect(() => parseApiKeys(":admin")).toThrow("API key cannot be empty");
    expect(() => parseApiKeys("k1:")).toThrow('Principal cannot be empty for API key "k1"');
  });

  it("throws on a repeated key", () => {
    expect(() => parseApiKeys("k1:admin,k1:alice")).toThrow('Duplicate API key "k1" in API_KEYS');
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("returns defaults when env is empty", () => {
    expect(loadConfig({})).toEqual({
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      CONTROLLER_OWNER: "admin",
      OPERATOR_PRINCIPAL: "registry",
      CUSTODY_ACCOUNT: "custody",
      MINIMAL_FEE: 1n,
      OVERDRAFT_POLICY: "clamp",
      ID_STRATEGY: "counter",
      API_KEYS: "",
    });
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      LOG_LEVEL: "debug",
      NODE_ENV: "production",
      CONTROLLER_OWNER: "ops",
      MINIMAL_FEE: " 250 ",
      MAX_PROVIDERS: "10",
      OVERDRAFT_POLICY: "allow-negative",
      ID_STRATEGY: "uuid",
    });

    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("production");
    expect(config.CONTROLLER_OWNER).toBe("ops");
    expect(config.MINIMAL_FEE).toBe(250n);
    expect(config.MAX_PROVIDERS).toBe(10);
    expect(config.OVERDRAFT_POLICY).toBe("allow-negative");
    expect(config.ID_STRATEGY).toBe("uuid");
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ MINIMAL_FEE: "-1" })).toThrow(ZodError);
    expect(() => loadConfig({ MINIMAL_FEE: "1.5" })).toThrow(ZodError);
    expect(() => loadConfig({ MAX_PROVIDERS: "0" })).toThrow(ZodError);
    expect(() => loadConfig({ OVERDRAFT_POLICY: "refund" })).toThrow(ZodError);
    expect(() => loadConfig({ CUSTODY_ACCOUNT: "" })).toThrow(ZodError);
  });
});

// =============================================================================
// toBillingConfig
// =============================================================================

describe("toBillingConfig", () => {
  it("carries the engine settings", () => {
    const config = loadConfig({ MINIMAL_FEE: "50", MAX_PROVIDERS: "3" });

    expect(toBillingConfig(config)).toEqual({
      controllerOwner: "admin",
      operator: "registry",
      custody: "custody",
      minimalFee: 50n,
      maxProviders: 3,
      overdraftPolicy: "clamp",
    });
  });
});
