/**
 * Scripted billing lifecycle for the demo CLI.
 *
 * Drives a BillingService on a manual clock: three providers, one
 * subscriber, a withdrawal, a fee change, a top-up and a cancellation
 * that has to pull a shortfall from the subscriber's wallet.
 */

import { InMemoryValueTransferService, ManualClock } from "@subledger/billing";
import type {
  CancellationReceipt,
  ProviderView,
  SubscriberView,
  WithdrawalReceipt,
} from "@subledger/billing";
import type { EventStoreIntegrityResult, StoredEvent } from "@subledger/event-store";
import { BillingService, createLogger, loadConfig } from "@subledger/node";
import type { Amount } from "@subledger/types";

/** 2024-03-01T00:00:00Z */
export const DEMO_START = 1_709_251_200;

export const DEMO_API_KEYS =
  "demo-admin:admin,demo-p1:studio-one,demo-p2:studio-two,demo-p3:studio-three,demo-alice:alice";

export interface ScenarioOptions {
  /** Extra environment on top of the demo defaults. */
  readonly env?: Record<string, string>;
  /** Funds credited to the subscriber's wallet before registration. */
  readonly walletFunds?: Amount;
}

export interface ScenarioResult {
  readonly providers: readonly ProviderView[];
  readonly subscriber: SubscriberView;
  readonly accruedAfterFourHours: { readonly pending: Amount; readonly outstanding: Amount };
  readonly withdrawal: WithdrawalReceipt;
  readonly feeChange: ProviderView;
  readonly pendingAfterFeeChange: Amount;
  readonly toppedUp: SubscriberView;
  readonly cancellation: CancellationReceipt;
  readonly walletAfter: Amount;
  readonly custodyAfter: Amount;
  readonly events: readonly StoredEvent[];
  readonly integrity: EventStoreIntegrityResult;
}

export async function runScenario(options: ScenarioOptions = {}): Promise<ScenarioResult> {
  const config = loadConfig({
    NODE_ENV: "production",
    LOG_LEVEL: "silent",
    MINIMAL_FEE: "10",
    API_KEYS: DEMO_API_KEYS,
    ...options.env,
  });

  const clock = new ManualClock(DEMO_START);
  const transfers = new InMemoryValueTransferService(config.CUSTODY_ACCOUNT);
  const service = new BillingService({
    config,
    logger: createLogger(config),
    clock,
    transfers,
  });

  const studios = [
    { apiKey: "demo-p1", registrationKey: "studio-one", fee: "100" },
    { apiKey: "demo-p2", registrationKey: "studio-two", fee: "200" },
    { apiKey: "demo-p3", registrationKey: "studio-three", fee: "300" },
  ];

  const providers: ProviderView[] = [];
  for (const studio of studios) {
    providers.push(
      await service.registerProvider(service.resolveCaller(studio.apiKey), {
        registrationKey: studio.registrationKey,
        fee: studio.fee,
      }),
    );
  }

  const alice = service.resolveCaller("demo-alice");
  transfers.mint(alice.principal, options.walletFunds ?? 10_000n);

  const subscriber = await service.registerSubscriber(alice, {
    deposit: "1500",
    plan: "pro",
    providerIds: providers.map((p) => p.id),
  });

  clock.advanceHours(4);
  const [first, second] = providers;
  if (first === undefined || second === undefined) {
    throw new Error("Demo providers were not registered");
  }
  const accruedAfterFourHours = {
    pending: service.pendingEarnings(first.id),
    outstanding: service.outstandingDues(subscriber.id),
  };

  const withdrawal = await service.withdraw(service.resolveCaller("demo-p2"), {
    providerId: second.id,
  });

  const feeChange = await service.updateProviderFee(service.resolveCaller("demo-p1"), {
    providerId: first.id,
    fee: "150",
  });

  clock.advanceHours(2);
  const pendingAfterFeeChange = service.pendingEarnings(first.id);

  const toppedUp = await service.topUp(alice, { subscriberId: subscriber.id, amount: "1000" });

  clock.advanceHours(3);
  const cancellation = await service.cancel(alice, { subscriberId: subscriber.id });

  return {
    providers,
    subscriber,
    accruedAfterFourHours,
    withdrawal,
    feeChange,
    pendingAfterFeeChange,
    toppedUp,
    cancellation,
    walletAfter: transfers.balanceOf(alice.principal),
    custodyAfter: transfers.balanceOf(config.CUSTODY_ACCOUNT),
    events: service.readAllEvents(),
    integrity: service.verifyIntegrity(),
  };
}
