/**
 * BillingService — Composition root for the billing stack.
 *
 * Callers go through this service, never through the engine directly.
 * It resolves API keys to principals, validates raw input against the
 * DTO schemas, serialises every mutation through one OperationQueue,
 * journals billing events and logs each operation's outcome.
 */

import {
  BillingEngine,
  CounterIdAllocator,
  UuidIdAllocator,
  AuthorizationError,
  systemClock,
} from "@subledger/billing";
import type {
  CancellationReceipt,
  Clock,
  DedupKeyStore,
  IdAllocator,
  ProviderRemovalReceipt,
  ProviderView,
  SubscriberView,
  ValueTransferService,
  WithdrawalReceipt,
} from "@subledger/billing";
import { InMemoryEventStore } from "@subledger/event-store";
import type {
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "@subledger/event-store";
import type { Amount, CallerContext, EntityId } from "@subledger/types";
import { parseApiKeys, toBillingConfig } from "../config.js";
import type { AppConfig } from "../config.js";
import { toErrorEnvelope } from "../errors.js";
import type { Logger } from "../logger.js";
import {
  MonthlyWithdrawalsQuerySchema,
  ProviderRefSchema,
  RegisterProviderSchema,
  RegisterSubscriberSchema,
  SetProviderStatusSchema,
  SubscriberRefSchema,
  TopUpSchema,
  UpdateProviderFeeSchema,
} from "../types/dto.js";
import { JournalEventSink } from "./journal-sink.js";
import { OperationQueue } from "./operation-queue.js";

// =============================================================================
// Configuration
// =============================================================================

export interface BillingServiceOptions {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly transfers: ValueTransferService;
  /** Defaults to the system clock. */
  readonly clock?: Clock;
  /** Defaults to a fresh InMemoryEventStore. */
  readonly eventStore?: EventStore;
  readonly dedupKeys?: DedupKeyStore;
}

function allocator(strategy: AppConfig["ID_STRATEGY"]): IdAllocator {
  return strategy === "uuid" ? new UuidIdAllocator() : new CounterIdAllocator();
}

// =============================================================================
// Service
// =============================================================================

export class BillingService {
  readonly engine: BillingEngine;
  readonly eventStore: EventStore;

  private readonly _logger: Logger;
  private readonly _queue = new OperationQueue();
  private readonly _journal: JournalEventSink;
  private readonly _principals: ReadonlyMap<string, string>;

  constructor(options: BillingServiceOptions) {
    const { config } = options;
    this._logger = options.logger;
    this.eventStore = options.eventStore ?? new InMemoryEventStore();
    this._journal = new JournalEventSink(this.eventStore);
    this._principals = new Map(parseApiKeys(config.API_KEYS).map((k) => [k.key, k.principal]));

    this.engine = new BillingEngine({
      config: toBillingConfig(config),
      clock: options.clock ?? systemClock,
      transfers: options.transfers,
      providerIds: allocator(config.ID_STRATEGY),
      subscriberIds: allocator(config.ID_STRATEGY),
      events: this._journal,
      ...(options.dedupKeys !== undefined ? { dedupKeys: options.dedupKeys } : {}),
    });

    this.eventStore.subscribeAll((stored) => {
      this._logger.debug(
        {
          streamId: stored.streamId,
          version: stored.version,
          globalPosition: stored.globalPosition,
          type: stored.event.type,
        },
        "Event appended",
      );
    });

    this._logger.info(
      {
        controllerOwner: config.CONTROLLER_OWNER,
        custody: config.CUSTODY_ACCOUNT,
        overdraftPolicy: config.OVERDRAFT_POLICY,
        idStrategy: config.ID_STRATEGY,
        apiKeyCount: this._principals.size,
      },
      "Billing service ready",
    );
  }

  // ─── Identity ──────────────────────────────────────────────────────

  /**
   * Map a configured API key to the caller it stands for.
   */
  resolveCaller(apiKey: string): CallerContext {
    const principal = this._principals.get(apiKey);
    if (principal === undefined) {
      throw new AuthorizationError("UNKNOWN_API_KEY", "Unknown API key");
    }
    return { principal };
  }

  // ─── Providers ─────────────────────────────────────────────────────

  registerProvider(caller: CallerContext, input: unknown): Promise<ProviderView> {
    return this._execute("registerProvider", caller, () => {
      const dto = RegisterProviderSchema.parse(input);
      return this.engine.registry.registerProvider(caller, dto.registrationKey, dto.fee).view();
    });
  }

  updateProviderFee(caller: CallerContext, input: unknown): Promise<ProviderView> {
    return this._execute("updateProviderFee", caller, () => {
      const dto = UpdateProviderFeeSchema.parse(input);
      return this.engine.registry.updateProviderFee(caller, dto.providerId, dto.fee).view();
    });
  }

  setProviderStatus(caller: CallerContext, input: unknown): Promise<readonly EntityId[]> {
    return this._execute("setProviderStatus", caller, () => {
      const dto = SetProviderStatusSchema.parse(input);
      return this.engine.registry.setProviderStatus(caller, dto.providerIds, dto.flags);
    });
  }

  removeProvider(caller: CallerContext, input: unknown): Promise<ProviderRemovalReceipt> {
    return this._execute("removeProvider", caller, () => {
      const dto = ProviderRefSchema.parse(input);
      return this.engine.registry.removeProvider(caller, dto.providerId);
    });
  }

  withdraw(caller: CallerContext, input: unknown): Promise<WithdrawalReceipt> {
    return this._execute("withdraw", caller, () => {
      const dto = ProviderRefSchema.parse(input);
      return this.engine.settlement.withdraw(caller, dto.providerId);
    });
  }

  // ─── Subscribers ───────────────────────────────────────────────────

  async registerSubscriber(caller: CallerContext, input: unknown): Promise<SubscriberView> {
    const subscriber = await this._execute("registerSubscriber", caller, () => {
      const dto = RegisterSubscriberSchema.parse(input);
      return this.engine.registry.registerSubscriber(caller, dto.deposit, dto.plan, dto.providerIds);
    });
    return subscriber.view();
  }

  async topUp(caller: CallerContext, input: unknown): Promise<SubscriberView> {
    const subscriber = await this._execute("topUp", caller, () => {
      const dto = TopUpSchema.parse(input);
      return this.engine.registry.topUp(caller, dto.subscriberId, dto.amount);
    });
    return subscriber.view();
  }

  cancel(caller: CallerContext, input: unknown): Promise<CancellationReceipt> {
    return this._execute("cancel", caller, () => {
      const dto = SubscriberRefSchema.parse(input);
      return this.engine.settlement.cancel(caller, dto.subscriberId);
    });
  }

  // ─── Read Models ───────────────────────────────────────────────────

  getProvider(providerId: EntityId): ProviderView {
    return this.engine.getProvider(providerId);
  }

  listProviders(): readonly ProviderView[] {
    return this.engine.listProviders();
  }

  getSubscriber(subscriberId: EntityId): SubscriberView {
    return this.engine.getSubscriber(subscriberId);
  }

  pendingEarnings(providerId: EntityId): Amount {
    return this.engine.pendingEarnings(providerId);
  }

  outstandingDues(subscriberId: EntityId): Amount {
    return this.engine.outstandingDues(subscriberId);
  }

  monthlyWithdrawals(input: unknown): Amount {
    const query = MonthlyWithdrawalsQuerySchema.parse(input);
    return this.engine.monthlyWithdrawals(query.providerId, query.year, query.month);
  }

  /** Mutations submitted and not yet settled. */
  get pendingOperations(): number {
    return this._queue.pending;
  }

  // ─── Events ────────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  readStreamEvents(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    return this.eventStore.read(streamId, options);
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private _execute<T>(
    operation: string,
    caller: CallerContext,
    fn: () => T | Promise<T>,
  ): Promise<T> {
    return this._queue.run(async () => {
      const correlationId = this._journal.beginOperation();
      const log = this._logger.child({ operation, principal: caller.principal, correlationId });

      try {
        const result = await fn();
        log.info("Operation succeeded");
        return result;
      } catch (error: unknown) {
        const { error: detail } = toErrorEnvelope(error);
        if (detail.kind === "internal") {
          log.error({ err: error }, "Operation failed");
        } else {
          log.warn({ code: detail.code, kind: detail.kind }, `Operation rejected: ${detail.message}`);
        }
        throw error;
      }
    });
  }
}
