/**
 * Shared fixtures for @subledger/billing tests.
 */

import type { Amount, CallerContext, EntityId } from "@subledger/types";
import { BillingEngine } from "../src/engine.js";
import type { BillingConfigInput } from "../src/engine.js";
import { ManualClock } from "../src/clock.js";
import type { BillingEvent } from "../src/events.js";
import { InMemoryValueTransferService } from "../src/transfers.js";

/** 2024-01-01T00:00:00Z */
export const T0 = 1_704_067_200;
export const HOUR = 3600;

export const ADMIN = "admin";
export const OPERATOR = "registry";
export const CUSTODY = "custody";

export function as(principal: string): CallerContext {
  return { principal };
}

export interface TestBed {
  readonly engine: BillingEngine;
  readonly clock: ManualClock;
  readonly transfers: InMemoryValueTransferService;
  readonly events: BillingEvent[];
}

export function setup(overrides: Partial<BillingConfigInput> = {}): TestBed {
  const clock = new ManualClock(T0);
  const transfers = new InMemoryValueTransferService(CUSTODY);
  const events: BillingEvent[] = [];
  const engine = new BillingEngine({
    config: {
      controllerOwner: ADMIN,
      operator: OPERATOR,
      custody: CUSTODY,
      minimalFee: 50n,
      ...overrides,
    },
    clock,
    transfers,
    events: { emit: (event) => { events.push(event); } },
  });
  return { engine, clock, transfers, events };
}

/**
 * Register providers owned by "p1", "p2", ... with the given fees.
 */
export function registerProviders(bed: TestBed, fees: readonly Amount[]): EntityId[] {
  return fees.map((fee, i) =>
    bed.engine.registry.registerProvider(as(`p${String(i + 1)}`), `key-${String(i + 1)}`, fee).id,
  );
}

/**
 * Mint `deposit` for `owner` and register a subscriber with it.
 */
export async function subscribe(
  bed: TestBed,
  owner: string,
  deposit: Amount,
  providerIds: readonly EntityId[],
): Promise<EntityId> {
  bed.transfers.mint(owner, deposit);
  const subscriber = await bed.engine.registry.registerSubscriber(as(owner), deposit, "basic", providerIds);
  return subscriber.id;
}

/**
 * Run `fn` and return what it threw. Fails the test if nothing was thrown.
 */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error: unknown) {
    return error;
  }
  throw new Error("Expected function to throw");
}
