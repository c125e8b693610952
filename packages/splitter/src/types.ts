/**
 * @sharepool/splitter domain types.
 *
 * A splitter holds one pooled balance in one currency. Payees pull their
 * proportional share of everything the pool has received; investors are
 * paid back recorded fees in bulk by the owner.
 */

import type { AssetTransfer, DomainEvent, Identity, Money } from "@sharepool/types";
import type { EventStore, SplitterEventMap, SplitterEventType } from "@sharepool/event-store";

// =============================================================================
// Registry
// =============================================================================

export interface Payee {
  readonly identity: Identity;
  /** Positive integer share weight */
  readonly shares: number;
  /** Total paid to this payee so far */
  readonly released: Money;
}

// =============================================================================
// Reimbursement
// =============================================================================

export type InvestorStatus = "active" | "cleared";

export interface InvestorRecord {
  readonly identity: Identity;
  /** Outstanding fees; zero once cleared */
  readonly feeOwed: Money;
  readonly status: InvestorStatus;
  /** Total paid back to this investor across all batches */
  readonly reimbursed: Money;
}

// =============================================================================
// Receipts
// =============================================================================

export interface Deposit {
  readonly from: Identity;
  readonly amount: Money;
  readonly poolBalance: Money;
}

export interface Release {
  readonly to: Identity;
  readonly amount: Money;
  /** Reference returned by the AssetTransfer */
  readonly reference: string;
}

export interface Reimbursement {
  readonly investor: Identity;
  readonly amount: Money;
  readonly reference: string;
}

// =============================================================================
// Notifications
// =============================================================================

/**
 * Publishes one notification from inside a command. The coordinator
 * decides when buffered notifications reach the event store.
 */
export type Notify = <T extends SplitterEventType>(type: T, payload: SplitterEventMap[T]) => void;

/**
 * Notifications the event store refused after their command committed.
 * The command's result stands; the events are kept here instead.
 */
export interface PublishFailure {
  readonly streamId: string;
  readonly events: readonly DomainEvent[];
  readonly reason: string;
  readonly at: string;
}

// =============================================================================
// Configuration
// =============================================================================

export interface SplitterOptions {
  readonly id: string;
  readonly currency: string;
  readonly decimals: number;
  /** Initial privileged identity */
  readonly owner: Identity;
  readonly transfer: AssetTransfer;
  /** Notification log; events go to stream `splitter:<id>` */
  readonly eventStore?: EventStore | undefined;
  /** ISO 8601 timestamp source, for deterministic tests */
  readonly clock?: (() => string) | undefined;
  /** Event and correlation id source */
  readonly newId?: (() => string) | undefined;
  /** Called for every batch the event store refuses; must not throw */
  readonly onPublishError?: ((failure: PublishFailure) => void) | undefined;
}

/** Collaborators a restored splitter needs; everything else is in the snapshot. */
export type SplitterDependencies = Pick<
  SplitterOptions,
  "transfer" | "eventStore" | "clock" | "newId" | "onPublishError"
>;

// =============================================================================
// Snapshot
// =============================================================================

export interface SplitterSnapshot {
  readonly version: 1;
  readonly id: string;
  readonly currency: string;
  readonly decimals: number;
  readonly owner: Identity;
  readonly initialized: boolean;
  readonly payees: readonly Payee[];
  readonly totalReleased: Money;
  readonly poolBalance: Money;
  readonly investors: readonly InvestorRecord[];
  readonly feePoolTotal: Money;
  readonly asOf: string;
}

export interface SplitterSummary {
  readonly id: string;
  readonly owner: Identity;
  readonly initialized: boolean;
  readonly totalShares: number;
  readonly payeeCount: number;
  readonly poolBalance: Money;
  readonly totalReceived: Money;
  readonly totalReleased: Money;
  readonly feePoolTotal: Money;
}
