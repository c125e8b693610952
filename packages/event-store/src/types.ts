/**
 * @sharepool/event-store: Core types.
 *
 * Append-only notification streams. One splitter writes one stream;
 * readers (the HTTP node, audits) consume them. Nothing in the splitter
 * core reads events back.
 *
 * Invariants:
 * - Stored events are immutable
 * - Stream versions are contiguous (1, 2, 3, ...)
 * - Global positions are contiguous across all streams
 * - Every stored event is linked into one SHA-256 hash chain
 */

import type { DomainEvent } from "@sharepool/types";

// =============================================================================
// Stored Event
// =============================================================================

export interface StoredEvent {
  readonly event: DomainEvent;

  readonly streamId: string;

  /** Position within the stream, 1-based */
  readonly version: number;

  /** Position across all streams, 1-based */
  readonly globalPosition: number;

  /** Store-level timestamp, distinct from the event's own */
  readonly appendedAt: string;

  /** SHA-256 over the canonical record plus `previousHash` */
  readonly hash: string;

  /** Hash of the preceding event, or "genesis" */
  readonly previousHash: string;
}

/** The part of a StoredEvent that is covered by its hash. */
export type HashableEvent = Omit<StoredEvent, "hash" | "previousHash">;

// =============================================================================
// Append / Read
// =============================================================================

/**
 * - number: the stream must be at exactly this version
 * - "no_stream": the stream must not exist yet
 * - "any": no check
 */
export type ExpectedVersion = number | "no_stream" | "any";

export interface AppendOptions {
  readonly expectedVersion?: ExpectedVersion | undefined;
}

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  readonly toVersion: number;
  readonly count: number;
}

export type ReadDirection = "forward" | "backward";

export interface ReadOptions {
  /** Inclusive, 1-based. Default 1 forward, stream head backward. */
  readonly fromVersion?: number | undefined;
  readonly maxCount?: number | undefined;
  readonly direction?: ReadDirection | undefined;
}

// =============================================================================
// Subscriptions
// =============================================================================

export type EventHandler = (event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

export interface EventStore {
  /**
   * Append events to a stream. All or nothing: a rejected batch leaves
   * the store unchanged.
   */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult;

  /**
   * Throw the error `append` would throw for this batch, without writing.
   */
  validate(streamId: string, events: readonly DomainEvent[]): void;

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /** Called synchronously for every event appended after subscribing. */
  subscribeAll(handler: EventHandler): Subscription;

  streamExists(streamId: string): boolean;

  /** Version of the last event in the stream, 0 if none. */
  streamVersion(streamId: string): number;

  /** Position of the last event in the store, 0 if empty. */
  globalPosition(): number;

  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "INVALID_EVENT"
  | "EMPTY_APPEND"
  | "INVALID_VERSION";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
