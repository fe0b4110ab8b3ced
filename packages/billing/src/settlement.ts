/**
 * @subledger/billing — Settlement ledger.
 *
 * Turns accrued earnings into actual value movements:
 * - withdraw() — a provider pulls everything its roster owes
 * - cancel() — a subscriber settles all outstanding dues and leaves
 *
 * Every operation samples the clock once, plans its debits and
 * transfers against that instant, executes the transfers, and only
 * then commits balance, roster and withdrawal changes. A thrown error
 * leaves the state untouched.
 *
 * Callers must serialise mutating operations; nothing here interleaves
 * safely with another mutation while a transfer is in flight.
 */

import type { Amount, CallerContext, EntityId, UnixSeconds } from "@subledger/types";
import { formatAmount, maxAmount, minAmount, sumAmounts } from "./amount-math.js";
import type { Clock } from "./clock.js";
import { earningsForOne, perSubscriberEarnings } from "./earnings.js";
import { BILLING_EVENTS } from "./events.js";
import type { EventSink } from "./events.js";
import type { Provider } from "./provider.js";
import type { BillingStore } from "./store.js";
import { executeTransfers } from "./transfers.js";
import type { ValueTransferService } from "./transfers.js";
import { AuthorizationError, StateError } from "./types.js";
import type {
  BillingConfig,
  CancellationReceipt,
  ProviderPayout,
  SubscriberDebit,
  TransferLeg,
  WithdrawalReceipt,
} from "./types.js";

export interface SettlementDeps {
  readonly store: BillingStore;
  readonly clock: Clock;
  readonly transfers: ValueTransferService;
  readonly events: EventSink;
  readonly config: Pick<BillingConfig, "custody" | "operator" | "overdraftPolicy">;
}

export class SettlementLedger {
  private readonly _deps: SettlementDeps;

  constructor(deps: SettlementDeps) {
    this._deps = deps;
  }

  // ─── Provider Withdrawal ─────────────────────────────────────────────

  /**
   * Pay a provider's owner everything its roster has accrued since the
   * last withdrawal, debiting each subscriber's share.
   */
  async withdraw(caller: CallerContext, providerId: EntityId): Promise<WithdrawalReceipt> {
    const provider = this._deps.store.assertProvider(providerId);
    if (caller.principal !== provider.owner) {
      throw new AuthorizationError(
        "NOT_OWNER",
        `"${caller.principal}" does not own provider "${providerId}"`,
      );
    }
    if (!provider.active) {
      throw new StateError("PROVIDER_INACTIVE", `Provider "${providerId}" is inactive`);
    }

    const receipt = await this.settle(provider, this._deps.clock.now());

    this._deps.events.emit({
      type: BILLING_EVENTS.EARNINGS_WITHDRAWN,
      source: "settlement",
      actor: caller.principal,
      occurredAt: receipt.timestamp,
      payload: {
        providerId,
        owed: formatAmount(receipt.owed),
        collected: formatAmount(receipt.collected),
        uncollected: formatAmount(receipt.uncollected),
        subscriberCount: receipt.debits.length,
      },
    });

    return receipt;
  }

  /**
   * Settle a provider at `now` with no authorization or activity check.
   * Shared by withdrawal and provider removal.
   */
  async settle(provider: Provider, now: UnixSeconds): Promise<WithdrawalReceipt> {
    const receipt = this.planWithdrawal(provider, now);

    await executeTransfers(this._deps.transfers, this._deps.config.custody, [
      { kind: "transfer", to: provider.owner, amount: receipt.collected },
    ]);

    for (const debit of receipt.debits) {
      this._deps.store.assertSubscriber(debit.subscriberId).debit(debit.debited);
    }
    if (receipt.owed > 0n) {
      provider.recordWithdrawal(now, receipt.collected);
    }

    return receipt;
  }

  /**
   * Compute what a withdrawal at `now` would debit and pay. Read-only.
   */
  planWithdrawal(provider: Provider, now: UnixSeconds): WithdrawalReceipt {
    const debits: SubscriberDebit[] = [];

    for (const [subscriberId, owed] of perSubscriberEarnings(provider, now)) {
      const subscriber = this._deps.store.assertSubscriber(subscriberId);
      const debited = this._deps.config.overdraftPolicy === "clamp"
        ? minAmount(owed, maxAmount(subscriber.balance, 0n))
        : owed;
      debits.push({ subscriberId, owed, debited });
    }

    const owed = sumAmounts(debits.map((d) => d.owed));
    const collected = sumAmounts(debits.map((d) => d.debited));

    return {
      providerId: provider.id,
      timestamp: now,
      owed,
      collected,
      uncollected: owed - collected,
      debits,
    };
  }

  // ─── Subscriber Cancellation ─────────────────────────────────────────

  /**
   * Settle a subscriber's dues with every provider it uses, pay each
   * provider's owner directly, and leave every roster.
   *
   * A balance that cannot cover the dues is topped up from the owner;
   * a surplus balance is kept, not refunded.
   */
  async cancel(caller: CallerContext, subscriberId: EntityId): Promise<CancellationReceipt> {
    const { store, config } = this._deps;
    const subscriber = store.assertSubscriber(subscriberId);

    if (caller.principal !== subscriber.owner) {
      throw new AuthorizationError(
        "NOT_OWNER",
        `"${caller.principal}" does not own subscriber "${subscriberId}"`,
      );
    }
    if (subscriber.paused) {
      throw new StateError(
        "SUBSCRIBER_CANCELLED",
        `Subscriber "${subscriberId}" is already cancelled`,
      );
    }

    const now = this._deps.clock.now();

    // Each share is computed once and reused for both the total and the payouts.
    const payouts: ProviderPayout[] = subscriber.providers().map((providerId) => {
      const provider = store.assertProvider(providerId);
      return {
        providerId,
        owner: provider.owner,
        amount: earningsForOne(provider, subscriberId, now),
      };
    });

    const owed = sumAmounts(payouts.map((p) => p.amount));
    const balance = subscriber.balance;
    const shortfall = owed > balance ? owed - balance : 0n;
    const balanceAfter: Amount = shortfall > 0n ? 0n : balance - owed;

    const legs: TransferLeg[] = [
      { kind: "transferFrom", from: subscriber.owner, to: config.custody, amount: shortfall },
      ...payouts.map((p): TransferLeg => ({ kind: "transfer", to: p.owner, amount: p.amount })),
    ];
    await executeTransfers(this._deps.transfers, config.custody, legs);

    subscriber.setBalance(balanceAfter);
    for (const payout of payouts) {
      store.assertProvider(payout.providerId).release(config.operator, subscriberId);
    }
    subscriber.cancel();

    this._deps.events.emit({
      type: BILLING_EVENTS.SUBSCRIPTION_CANCELLED,
      source: "settlement",
      actor: caller.principal,
      occurredAt: now,
      payload: {
        subscriberId,
        owed: formatAmount(owed),
        shortfall: formatAmount(shortfall),
        providerIds: payouts.map((p) => p.providerId),
      },
    });

    return { subscriberId, timestamp: now, owed, shortfall, balanceAfter, payouts };
  }

  /**
   * What a cancellation at `now` would owe in total. Read-only.
   */
  outstandingDues(subscriberId: EntityId, now: UnixSeconds): Amount {
    const subscriber = this._deps.store.assertSubscriber(subscriberId);
    return sumAmounts(
      subscriber.providers().map((providerId) =>
        earningsForOne(this._deps.store.assertProvider(providerId), subscriberId, now),
      ),
    );
  }
}
