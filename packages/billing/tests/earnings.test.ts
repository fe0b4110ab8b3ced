/**
 * Tests for the earnings calculator and the Provider aggregate it reads.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { earningsForOne, perSubscriberEarnings, totalEarnings } from "../src/earnings.js";
import { Provider } from "../src/provider.js";
import { AuthorizationError, StateError } from "../src/types.js";
import { HOUR, OPERATOR, T0, thrown } from "./helpers.js";

describe("earnings calculator", () => {
  let provider: Provider;

  beforeEach(() => {
    provider = new Provider({ id: "1", owner: "p1", operator: OPERATOR, fee: 100n, registeredAt: T0 });
    provider.enroll(OPERATOR, "s1", T0);
    provider.enroll(OPERATOR, "s2", T0 + 5 * HOUR);
  });

  it("computes each member's share from its join time", () => {
    const shares = perSubscriberEarnings(provider, T0 + 10 * HOUR);
    expect([...shares.entries()]).toEqual([
      ["s1", 1000n],
      ["s2", 500n],
    ]);
  });

  it("totals the roster", () => {
    expect(totalEarnings(provider, T0 + 10 * HOUR)).toBe(1500n);
  });

  it("prorates members across a fee change", () => {
    provider.schedule.appendRate(200n, T0 + 10 * HOUR);
    const now = T0 + 20 * HOUR;

    expect(earningsForOne(provider, "s1", now)).toBe(3000n);
    expect(earningsForOne(provider, "s2", now)).toBe(2500n);
  });

  it("never counts time before the last withdrawal", () => {
    provider.recordWithdrawal(T0 + 10 * HOUR, 1500n);

    expect(totalEarnings(provider, T0 + 10 * HOUR)).toBe(0n);
    expect(earningsForOne(provider, "s1", T0 + 12 * HOUR)).toBe(200n);
    expect(earningsForOne(provider, "s2", T0 + 12 * HOUR)).toBe(200n);
  });

  it("is a pure read", () => {
    provider.schedule.appendRate(200n, T0 + 10 * HOUR);
    const first = totalEarnings(provider, T0 + 30 * HOUR);
    const second = totalEarnings(provider, T0 + 30 * HOUR);

    expect(second).toBe(first);
    expect(provider.schedule.length).toBe(2);
    expect(provider.roster.members()).toEqual(["s1", "s2"]);
  });

  it("rejects a non-member", () => {
    const error = thrown(() => earningsForOne(provider, "s9", T0 + HOUR));
    expect(error).toBeInstanceOf(StateError);
    expect(error).toMatchObject({ code: "NOT_SUBSCRIBED" });
  });
});

describe("Provider", () => {
  let provider: Provider;

  beforeEach(() => {
    provider = new Provider({ id: "7", owner: "p7", operator: OPERATOR, fee: 60n, registeredAt: T0 });
  });

  it("starts active with an empty settlement point at registration", () => {
    expect(provider.active).toBe(true);
    expect(provider.lastWithdrawal).toEqual({ timestamp: T0, amount: 0n });
  });

  it("reports whether the active flag changed", () => {
    expect(provider.setActive(true)).toBe(false);
    expect(provider.setActive(false)).toBe(true);
    expect(provider.active).toBe(false);
  });

  it("only lets the operator change the roster", () => {
    const error = thrown(() => provider.enroll("p7", "s1", T0));
    expect(error).toBeInstanceOf(AuthorizationError);
    expect(error).toMatchObject({ code: "NOT_OPERATOR" });
    expect(() => provider.release("p7", "s1")).toThrow(AuthorizationError);
  });

  it("records withdrawals per calendar month and prunes history", () => {
    provider.schedule.appendRate(80n, T0 + HOUR);
    provider.recordWithdrawal(T0 + 2 * HOUR, 500n);
    provider.recordWithdrawal(T0 + 3 * HOUR, 250n);

    expect(provider.withdrawnIn("2024-01")).toBe(750n);
    expect(provider.withdrawnIn("2024-02")).toBe(0n);
    expect(provider.lastWithdrawal).toEqual({ timestamp: T0 + 3 * HOUR, amount: 250n });
    expect(provider.schedule.length).toBe(1);
  });

  it("exposes a read-only view", () => {
    provider.enroll(OPERATOR, "s1", T0);
    expect(provider.view()).toMatchObject({
      id: "7",
      owner: "p7",
      operator: OPERATOR,
      active: true,
      fee: 60n,
      subscribers: ["s1"],
      registeredAt: T0,
    });
  });
});
