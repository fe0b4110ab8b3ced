/**
 * @subledger/node — Service layer for the billing engine.
 *
 * @packageDocumentation
 */

export { BillingService } from "./services/billing-service.js";
export type { BillingServiceOptions } from "./services/billing-service.js";
export { OperationQueue } from "./services/operation-queue.js";
export { JournalEventSink, streamFor, toDomainEvent } from "./services/journal-sink.js";
export { loadConfig, parseApiKeys, toBillingConfig, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { toErrorEnvelope } from "./errors.js";
export * from "./types/index.js";
