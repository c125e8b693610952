/**
 * @sharepool/event-store
 *
 * Append-only, hash-chained notification log.
 *
 * - InMemoryEventStore for tests and single-process use
 * - JsonlEventStore for durable, file-backed streams
 * - EventCatalog with zod schemas for every splitter notification
 */

export type {
  StoredEvent,
  HashableEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  EventHandler,
  Subscription,
  IntegrityError,
  EventStoreIntegrityResult,
  EventStore,
  EventStoreErrorCode,
} from "./types.js";
export { EventStoreError } from "./types.js";

export { GENESIS_HASH, computeEventHash, verifyHashChain } from "./hash-chain.js";

export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

export { JsonlEventStore } from "./jsonl-store.js";
export type { JsonlEventStoreOptions } from "./jsonl-store.js";

export { EventCatalog } from "./catalog.js";
export type { EventSchema, CatalogValidation } from "./catalog.js";

export {
  SPLITTER_EVENTS,
  SPLITTER_EVENT_SOURCES,
  MoneySchema,
  PayeeAddedSchema,
  PaymentReleasedSchema,
  PaymentReceivedSchema,
  FeesAddedSchema,
  InvestorReimbursedSchema,
  OwnershipTransferredSchema,
  createSplitterCatalog,
} from "./splitter-events.js";
export type {
  SplitterEventType,
  SplitterEventMap,
  PayeeAddedPayload,
  PaymentReleasedPayload,
  PaymentReceivedPayload,
  FeesAddedPayload,
  InvestorReimbursedPayload,
  OwnershipTransferredPayload,
} from "./splitter-events.js";
