/**
 * @sharepool/event-store: In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Used directly by tests and the demo, and
 * as the index behind the JSONL store.
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events returned)
 * - Synchronous subscription dispatch
 * - No durability; subclasses persist through `persist()`
 */

import type { DomainEvent } from "@sharepool/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";
import type { EventCatalog } from "./catalog.js";

export interface InMemoryEventStoreOptions {
  /** When set, every appended event must be registered and its payload valid. */
  readonly catalog?: EventCatalog | undefined;
}

export class InMemoryEventStore implements EventStore {
  /** Per-stream event storage */
  private readonly _streams = new Map<string, StoredEvent[]>();

  /** Global event log (all streams, in append order) */
  private readonly _globalLog: StoredEvent[] = [];

  private readonly _subscribers = new Set<EventHandler>();

  private readonly _catalog: EventCatalog | undefined;

  /** Hash of the last appended event */
  private _lastHash: string = GENESIS_HASH;

  constructor(options: InMemoryEventStoreOptions = {}) {
    this._catalog = options.catalog;
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    this.validate(streamId, events);

    const currentVersion = this.streamVersion(streamId);
    this._checkExpectedVersion(streamId, currentVersion, options);

    const fromVersion = currentVersion + 1;
    const appendedAt = new Date().toISOString();
    const stored: StoredEvent[] = [];
    let previousHash = this._lastHash;
    let globalPosition = this._globalLog.length;

    for (const [i, event] of events.entries()) {
      globalPosition += 1;
      const base = {
        event: {
          type: event.type,
          metadata: event.metadata,
          payload: event.payload,
        },
        streamId,
        version: fromVersion + i,
        globalPosition,
        appendedAt,
      };
      const hash = computeEventHash(base, previousHash);
      stored.push({ ...base, hash, previousHash });
      previousHash = hash;
    }

    // Durable write first; memory only changes once it succeeded.
    this.persist(stored);
    for (const record of stored) {
      this.restore(record);
    }

    this._dispatch(stored);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  /**
   * Run the checks `append` runs before writing: stream id, batch size and,
   * with a catalog, every event type and payload.
   */
  validate(streamId: string, events: readonly DomainEvent[]): void {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    for (const event of events) {
      this._validateEvent(streamId, event);
    }
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    const direction = options?.direction ?? "forward";
    const fromVersion = options?.fromVersion ?? (direction === "forward" ? 1 : stream.length);

    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${String(fromVersion)}`,
        streamId,
      );
    }

    const result =
      direction === "forward"
        ? stream.filter((e) => e.version >= fromVersion)
        : stream.filter((e) => e.version <= fromVersion).reverse();

    return limit(result, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribeAll(handler: EventHandler): Subscription {
    this._subscribers.add(handler);

    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
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
    return this._globalLog.length;
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Extension points ───────────────────────────────────────────────

  /**
   * Write a batch durably before it becomes visible. Throwing aborts the
   * append with nothing changed.
   */
  protected persist(_events: readonly StoredEvent[]): void {
    // in-memory only
  }

  /**
   * Index an already-hashed event. Used by `append` after `persist` and
   * by subclasses replaying their storage.
   */
  protected restore(stored: StoredEvent): void {
    let stream = this._streams.get(stored.streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(stored.streamId, stream);
    }
    stream.push(stored);
    this._globalLog.push(stored);
    this._lastHash = stored.hash;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.trim().length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _validateEvent(streamId: string, event: DomainEvent): void {
    if (this._catalog === undefined) {
      return;
    }
    const result = this._catalog.validate(event.type, event.payload);
    if (!result.valid) {
      throw new EventStoreError(
        "INVALID_EVENT",
        `Event "${event.type}" rejected: ${result.issues.join("; ")}`,
        streamId,
      );
    }
  }

  private _checkExpectedVersion(
    streamId: string,
    currentVersion: number,
    options: AppendOptions | undefined,
  ): void {
    const expected = options?.expectedVersion;
    if (expected === undefined || expected === "any") {
      return;
    }
    if (expected === "no_stream") {
      if (currentVersion !== 0) {
        throw new EventStoreError(
          "CONCURRENCY_CONFLICT",
          `Stream "${streamId}" already exists (version ${String(currentVersion)}), expected no_stream`,
          streamId,
        );
      }
      return;
    }
    if (currentVersion !== expected) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${String(currentVersion)}, expected ${String(expected)}`,
        streamId,
      );
    }
  }

  private _dispatch(events: readonly StoredEvent[]): void {
    for (const handler of this._subscribers) {
      for (const event of events) {
        handler(event);
      }
    }
  }
}

function limit(events: StoredEvent[], maxCount: number | undefined): StoredEvent[] {
  if (maxCount !== undefined && maxCount >= 0) {
    return events.slice(0, maxCount);
  }
  return events;
}
