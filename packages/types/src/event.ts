/**
 * Event Types
 *
 * Every observable state change in a splitter is published as a
 * DomainEvent. Events are notifications: the core never reads them back.
 */

/**
 * Subsystems that emit events.
 */
export type EventSource =
  | "registry"
  | "distribution"
  | "reimbursement"
  | "pool"
  | "access";

export interface EventMetadata {
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Identity whose call produced the event */
  readonly actor: string;

  /** Groups all events emitted by one call */
  readonly correlationId: string;

  readonly causationId?: string | undefined;

  readonly source: EventSource;
}

/**
 * A domain event, discriminated by `type`
 * (`<subsystem>.<entity>.<action>`, e.g. "distribution.payment.released").
 */
export interface DomainEvent {
  readonly type: string;
  readonly metadata: EventMetadata;
  readonly payload: Readonly<Record<string, unknown>>;
}
