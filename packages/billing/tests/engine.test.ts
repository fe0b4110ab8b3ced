/**
 * Tests for engine assembly and read models.
 */

import { describe, it, expect } from "vitest";
import { BillingEngine, resolveBillingConfig } from "../src/engine.js";
import { ManualClock } from "../src/clock.js";
import { UuidIdAllocator } from "../src/ids.js";
import { InMemoryValueTransferService } from "../src/transfers.js";
import { ADMIN, CUSTODY, HOUR, OPERATOR, T0, as, registerProviders, setup, subscribe, thrown } from "./helpers.js";

describe("resolveBillingConfig", () => {
  it("fills in the defaults", () => {
    expect(
      resolveBillingConfig({ controllerOwner: ADMIN, operator: OPERATOR, custody: CUSTODY, minimalFee: 1n }),
    ).toEqual({
      controllerOwner: ADMIN,
      operator: OPERATOR,
      custody: CUSTODY,
      minimalFee: 1n,
      depositCoverPeriods: 2,
      minProvidersPerSubscriber: 3,
      maxProvidersPerSubscriber: 14,
      overdraftPolicy: "clamp",
    });
  });

  it("keeps explicit overrides", () => {
    const config = resolveBillingConfig({
      controllerOwner: ADMIN,
      operator: OPERATOR,
      custody: CUSTODY,
      minimalFee: 1n,
      depositCoverPeriods: 5,
      overdraftPolicy: "allow-negative",
    });
    expect(config.depositCoverPeriods).toBe(5);
    expect(config.overdraftPolicy).toBe("allow-negative");
  });
});

describe("BillingEngine read models", () => {
  it("keeps provider and subscriber id sequences apart", async () => {
    const bed = setup();
    registerProviders(bed, [100n, 100n, 100n]);

    expect(await subscribe(bed, "alice", 1000n, ["1", "2", "3"])).toBe("1");
    expect(await subscribe(bed, "bob", 1000n, ["1", "2", "3"])).toBe("2");
    expect(bed.engine.listProviders().map((p) => p.id)).toEqual(["1", "2", "3"]);
    expect(bed.engine.getProvider("2").subscribers).toEqual(["1", "2"]);
  });

  it("accepts injected id allocators", () => {
    const engine = new BillingEngine({
      config: { controllerOwner: ADMIN, operator: OPERATOR, custody: CUSTODY, minimalFee: 1n },
      clock: new ManualClock(T0),
      transfers: new InMemoryValueTransferService(CUSTODY),
      providerIds: new UuidIdAllocator(),
    });

    const provider = engine.registry.registerProvider(as("p1"), "key-1", 10n);
    expect(provider.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("reports pending earnings and outstanding dues at the current time", async () => {
    const bed = setup();
    registerProviders(bed, [100n, 200n, 300n]);
    await subscribe(bed, "alice", 5000n, ["1", "2", "3"]);

    bed.clock.advance(3 * HOUR + 1800);

    expect(bed.engine.pendingEarnings("2")).toBe(600n);
    expect(bed.engine.outstandingDues("1")).toBe(1800n);
  });

  it("totals withdrawals per calendar month", async () => {
    const bed = setup();
    registerProviders(bed, [100n, 100n, 100n]);
    await subscribe(bed, "alice", 100_000n, ["1", "2", "3"]);

    bed.clock.advanceHours(10);
    await bed.engine.settlement.withdraw(as("p1"), "1");
    // 2024-02-01T06:00:00Z
    bed.clock.advanceHours(740);
    await bed.engine.settlement.withdraw(as("p1"), "1");

    expect(bed.engine.monthlyWithdrawals("1", 2024, 1)).toBe(1000n);
    expect(bed.engine.monthlyWithdrawals("1", 2024, 2)).toBe(74_000n);
    expect(bed.engine.monthlyWithdrawals("1", 2024, 3)).toBe(0n);
  });

  it("throws for unknown entities", () => {
    const bed = setup();
    expect(thrown(() => bed.engine.getProvider("1"))).toMatchObject({ code: "PROVIDER_NOT_FOUND" });
    expect(thrown(() => bed.engine.getSubscriber("1"))).toMatchObject({ code: "SUBSCRIBER_NOT_FOUND" });
  });
});
