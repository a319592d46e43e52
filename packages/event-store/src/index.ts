/**
 * @cadence/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a SHA-256 hash chain
 * - EventCatalog for payload validation
 * - Cadence domain event definitions
 *
 * @packageDocumentation
 */

export type {
  StoredEvent,
  HashedStoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  HandlerFailure,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

export { CADENCE_EVENTS, createCadenceCatalog } from "./schedule-events.js";
export type {
  CadenceEventType,
  EngineInitializedPayload,
  StreamCreatedPayload,
  StreamsBatchCreatedPayload,
  VestingCreatedPayload,
  ScheduleClaimedPayload,
  ScheduleTerminatedPayload,
  TokensMintedPayload,
} from "./schedule-events.js";
