/**
 * Property-Based Tests for @subledger/billing
 *
 * Uses fast-check to verify invariants that must hold for ANY valid input:
 *
 * 1. Roster index stays consistent under any add/remove sequence
 * 2. Hour-aligned fee changes prorate exactly
 * 3. Repeated withdrawals never count an hour twice
 * 4. Value is conserved between balances, custody and payouts
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { FeeSchedule } from "../src/fee-schedule.js";
import { SubscriberRoster } from "../src/roster.js";
import { CUSTODY, HOUR, T0, as, registerProviders, setup, subscribe } from "./helpers.js";

// =============================================================================
// Arbitraries
// =============================================================================

/** Add or remove one of a small pool of subscriber ids. */
const arbRosterOp = fc.record({
  add: fc.boolean(),
  id: fc.integer({ min: 1, max: 8 }).map(String),
});

/** A rate change some whole hours after the previous one. */
const arbRateStep = fc.record({
  hours: fc.integer({ min: 1, max: 200 }),
  rate: fc.bigInt({ min: 0n, max: 10_000n }),
});

/** Advance some whole hours, then let one provider withdraw. */
const arbWithdrawStep = fc.record({
  hours: fc.integer({ min: 0, max: 48 }),
  provider: fc.integer({ min: 1, max: 3 }).map(String),
});

// =============================================================================
// Properties
// =============================================================================

describe("roster properties", () => {
  it("membership indices always match member positions", () => {
    fc.assert(
      fc.property(fc.array(arbRosterOp, { maxLength: 60 }), (ops) => {
        const roster = new SubscriberRoster();
        const model = new Set<string>();

        for (const op of ops) {
          if (op.add && !model.has(op.id)) {
            roster.add(op.id, T0);
            model.add(op.id);
          } else if (!op.add && model.has(op.id)) {
            roster.remove(op.id);
            model.delete(op.id);
          }
        }

        const members = roster.members();
        expect(new Set(members)).toEqual(model);
        expect(roster.size).toBe(model.size);
        members.forEach((id, index) => {
          expect(roster.membership(id)?.index).toBe(index);
        });
      }),
    );
  });
});

describe("fee schedule properties", () => {
  it("hour-aligned changes prorate to the exact weighted sum", () => {
    fc.assert(
      fc.property(
        fc.bigInt({ min: 0n, max: 10_000n }),
        fc.array(arbRateStep, { maxLength: 10 }),
        fc.integer({ min: 0, max: 200 }),
        (initial, steps, tailHours) => {
          const schedule = new FeeSchedule(initial, T0);
          let at = T0;
          let rate = initial;
          let expected = 0n;

          for (const step of steps) {
            expected += BigInt(step.hours) * rate;
            at += step.hours * HOUR;
            schedule.appendRate(step.rate, at);
            rate = step.rate;
          }
          expected += BigInt(tailHours) * rate;

          expect(schedule.earningsFor(T0, at + tailHours * HOUR)).toBe(expected);
        },
      ),
    );
  });

  it("earnings never decrease as the range grows", () => {
    fc.assert(
      fc.property(
        fc.array(arbRateStep, { maxLength: 6 }),
        fc.integer({ min: 0, max: 500 * HOUR }),
        fc.integer({ min: 0, max: 500 * HOUR }),
        (steps, a, b) => {
          const schedule = new FeeSchedule(100n, T0);
          let at = T0;
          for (const step of steps) {
            at += step.hours * HOUR;
            schedule.appendRate(step.rate, at);
          }
          const shorter = Math.min(a, b);
          const longer = Math.max(a, b);
          expect(schedule.earningsFor(T0, T0 + longer)).toBeGreaterThanOrEqual(
            schedule.earningsFor(T0, T0 + shorter),
          );
        },
      ),
    );
  });
});

describe("settlement properties", () => {
  it("collects each subscribed hour exactly once", async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(arbWithdrawStep, { maxLength: 20 }), async (steps) => {
        const bed = setup();
        registerProviders(bed, [100n, 100n, 100n]);
        await subscribe(bed, "alice", 1_000_000n, ["1", "2", "3"]);

        const collected = new Map<string, bigint>();
        for (const step of steps) {
          bed.clock.advanceHours(step.hours);
          const receipt = await bed.engine.settlement.withdraw(as(`p${step.provider}`), step.provider);
          collected.set(step.provider, (collected.get(step.provider) ?? 0n) + receipt.collected);
        }

        const elapsedHours = BigInt((bed.clock.now() - T0) / HOUR);
        for (const id of ["1", "2", "3"]) {
          expect((collected.get(id) ?? 0n) + bed.engine.pendingEarnings(id)).toBe(100n * elapsedHours);
        }
      }),
      { numRuns: 50 },
    );
  });

  it("custody always holds exactly the sum of balances", async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.bigInt({ min: 600n, max: 20_000n }),
        fc.bigInt({ min: 600n, max: 20_000n }),
        fc.array(arbWithdrawStep, { maxLength: 20 }),
        async (depositA, depositB, steps) => {
          const bed = setup();
          registerProviders(bed, [100n, 100n, 100n]);
          await subscribe(bed, "alice", depositA, ["1", "2", "3"]);
          await subscribe(bed, "bob", depositB, ["1", "2", "3"]);

          for (const step of steps) {
            bed.clock.advanceHours(step.hours);
            const receipt = await bed.engine.settlement.withdraw(as(`p${step.provider}`), step.provider);
            expect(receipt.uncollected).toBeGreaterThanOrEqual(0n);
          }

          const balances = ["1", "2"].map((id) => bed.engine.getSubscriber(id).balance);
          for (const balance of balances) {
            expect(balance).toBeGreaterThanOrEqual(0n);
          }
          const held = balances.reduce((sum, b) => sum + b, 0n);
          const paid = ["p1", "p2", "p3"].reduce((sum, p) => sum + bed.transfers.balanceOf(p), 0n);

          expect(bed.transfers.balanceOf(CUSTODY)).toBe(held);
          expect(held + paid).toBe(depositA + depositB);
        },
      ),
      { numRuns: 50 },
    );
  });
});
