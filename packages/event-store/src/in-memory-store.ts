/**
 * @cadence/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. All state is lost on process exit.
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events returned)
 * - Synchronous subscription dispatch
 * - Every event is linked into a SHA-256 hash chain on append
 */

import { isDomainEvent } from "@cadence/types";
import type { DomainEvent } from "@cadence/types";
import type { EventCatalog } from "./catalog.js";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  HandlerFailure,
  HashedStoredEvent,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** When set, appends of unknown types or invalid payloads are refused. */
  readonly catalog?: EventCatalog;
  /**
   * Receives errors thrown by subscribers. A failing subscriber never
   * fails the append that triggered it. Default: kept in `handlerFailures()`.
   */
  readonly onHandlerError?: (failure: HandlerFailure) => void;
}

/**
 * In-memory event store.
 *
 * Events are held twice:
 * - Per-stream arrays (indexed by streamId) for stream reads
 * - A global array for readAll and global subscriptions
 *
 * `emit()` lets the store stand in as an engine event sink; each event
 * goes to the stream named after its source subsystem. `check()` runs
 * every validation `emit()` would, without appending, so a caller can
 * refuse an event before committing the change it records.
 */
export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, HashedStoredEvent[]>();
  private readonly _globalLog: HashedStoredEvent[] = [];
  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();
  private readonly _catalog: EventCatalog | undefined;
  private readonly _onHandlerError: (failure: HandlerFailure) => void;
  private readonly _handlerFailures: HandlerFailure[] = [];
  private _nextGlobalPosition = 1;
  private _lastHash: string = GENESIS_HASH;

  constructor(options?: InMemoryEventStoreOptions) {
    this._catalog = options?.catalog;
    this._onHandlerError =
      options?.onHandlerError ?? ((failure) => this._handlerFailures.push(failure));
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const currentVersion = this.streamVersion(streamId);
    const expectedVersion = options?.expectedVersion;
    if (expectedVersion === "no_stream" && currentVersion !== 0) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" already exists (version ${String(currentVersion)}), expected no_stream`,
        streamId,
      );
    }
    if (typeof expectedVersion === "number" && currentVersion !== expectedVersion) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${String(currentVersion)}, expected ${String(expectedVersion)}`,
        streamId,
      );
    }

    for (const event of events) {
      this._checkEvent(streamId, event);
    }

    let stream = this._streams.get(streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(streamId, stream);
    }

    const fromVersion = currentVersion + 1;
    const appendedAt = new Date().toISOString();
    const stored: HashedStoredEvent[] = events.map((event, i) => {
      const base: StoredEvent = {
        event: {
          type: event.type,
          metadata: event.metadata,
          payload: event.payload,
        },
        streamId,
        version: fromVersion + i,
        globalPosition: this._nextGlobalPosition++,
        appendedAt,
      };
      const previousHash = this._lastHash;
      const hash = computeEventHash(base, previousHash);
      this._lastHash = hash;
      return { ...base, hash, previousHash };
    });

    stream.push(...stored);
    this._globalLog.push(...stored);
    this._dispatch(streamId, stored);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  /**
   * Append a single event to the stream of its source subsystem.
   */
  emit(event: DomainEvent): void {
    this.append(event.metadata.source, [event]);
  }

  /**
   * @throws EventStoreError INVALID_EVENT | INVALID_PAYLOAD if `emit(event)` would
   */
  check(event: DomainEvent): void {
    this._checkEvent(isDomainEvent(event) ? event.metadata.source : "?", event);
  }

  /** Subscriber errors seen so far, when no `onHandlerError` was given. */
  handlerFailures(): readonly HandlerFailure[] {
    return this._handlerFailures;
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly HashedStoredEvent[] {
    this._validateStreamId(streamId);

    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${String(fromVersion)}`,
        streamId,
      );
    }

    const result =
      options?.direction === "backward"
        ? stream.filter((e) => e.version <= fromVersion).reverse()
        : stream.filter((e) => e.version >= fromVersion);

    return limit(result, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    const correlationId = options?.correlationId;

    let result =
      options?.direction === "backward"
        ? this._globalLog.filter((e) => e.globalPosition <= fromPosition).reverse()
        : this._globalLog.filter((e) => e.globalPosition >= fromPosition);

    if (correlationId !== undefined) {
      result = result.filter((e) => e.event.metadata.correlationId === correlationId);
    }

    return limit(result, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._validateStreamId(streamId);

    let subscribers = this._streamSubscribers.get(streamId);
    if (subscribers === undefined) {
      subscribers = new Set();
      this._streamSubscribers.set(streamId, subscribers);
    }
    subscribers.add(handler);

    return {
      unsubscribe: () => {
        subscribers.delete(handler);
        if (subscribers.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);
    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._nextGlobalPosition - 1;
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _checkEvent(streamId: string, event: DomainEvent): void {
    if (!isDomainEvent(event)) {
      throw new EventStoreError(
        "INVALID_EVENT",
        "Event is missing a type, metadata or payload",
        streamId,
      );
    }
    if (this._catalog !== undefined && !this._catalog.validate(event.type, event.payload)) {
      throw new EventStoreError(
        "INVALID_PAYLOAD",
        `Event "${event.type}" is unknown or has an invalid payload`,
        streamId,
      );
    }
  }

  private _dispatch(streamId: string, events: readonly HashedStoredEvent[]): void {
    const handlers = [
      ...(this._streamSubscribers.get(streamId) ?? []),
      ...this._globalSubscribers,
    ];
    for (const handler of handlers) {
      for (const event of events) {
        this._deliver(handler, event);
      }
    }
  }

  // Events are already stored when subscribers run
  private _deliver(handler: EventHandler, event: HashedStoredEvent): void {
    try {
      handler(event);
    } catch (error) {
      this._onHandlerError({ error, event });
    }
  }
}

function limit<T>(events: T[], maxCount: number | undefined): T[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
