/**
 * SplitterService: one PaymentSplitter with its custody journal.
 *
 * Wires the domain together:
 * - Journal + JournalTransfer: custody bookkeeping and the AssetTransfer
 * - PaymentSplitter: shares, payouts, investor reimbursement
 * - EventStore: the notification log (shared across splitters)
 *
 * Deposits are validated against the splitter's denomination before the
 * journal books them, so custody and the splitter's pool move together.
 */

import { isIdentity } from "@sharepool/types";
import type { Identity, Money } from "@sharepool/types";
import { Journal, JournalTransfer } from "@sharepool/ledger";
import type { JournalSnapshot } from "@sharepool/ledger";
import type { EventStore, StoredEvent } from "@sharepool/event-store";
import { PaymentSplitter, ValidationError } from "@sharepool/splitter";
import type {
  Deposit,
  InvestorRecord,
  Payee,
  PublishFailure,
  Reimbursement,
  Release,
  SplitterSnapshot,
  SplitterSummary,
} from "@sharepool/splitter";
import type { ListEventsQuery } from "../types/dto.js";

export interface SplitterServiceConfig {
  readonly id: string;
  readonly owner: Identity;
  readonly currency: string;
  readonly decimals: number;
  readonly eventStore: EventStore;
  readonly onPublishError?: ((failure: PublishFailure) => void) | undefined;
}

export interface SplitterServiceState {
  readonly splitter: SplitterSnapshot;
  readonly journal: JournalSnapshot;
}

export interface PayeeView {
  readonly identity: Identity;
  readonly shares: number;
  readonly released: Money;
  readonly pending: Money;
}

export interface SplitterView extends SplitterSummary {
  readonly currency: string;
  readonly decimals: number;
  /** Balance of the custody account in the journal */
  readonly custody: Money;
}

export interface SplitterHealth {
  readonly id: string;
  readonly custodyMatchesPool: boolean;
  /** Notification batches the log refused since startup */
  readonly unpublishedBatches: number;
}

export class SplitterService {
  readonly splitter: PaymentSplitter;
  readonly journal: Journal;
  private readonly custody: JournalTransfer;
  private readonly eventStore: EventStore;

  private constructor(splitter: PaymentSplitter, custody: JournalTransfer, eventStore: EventStore) {
    this.splitter = splitter;
    this.custody = custody;
    this.journal = custody.journal;
    this.eventStore = eventStore;
  }

  static create(config: SplitterServiceConfig): SplitterService {
    const custody = new JournalTransfer(new Journal(config.currency, config.decimals));
    const splitter = new PaymentSplitter({
      id: config.id,
      currency: config.currency,
      decimals: config.decimals,
      owner: config.owner,
      transfer: custody,
      eventStore: config.eventStore,
      onPublishError: config.onPublishError,
    });
    return new SplitterService(splitter, custody, config.eventStore);
  }

  static restore(
    state: SplitterServiceState,
    eventStore: EventStore,
    onPublishError?: (failure: PublishFailure) => void,
  ): SplitterService {
    const custody = new JournalTransfer(Journal.fromSnapshot(state.journal));
    const splitter = PaymentSplitter.fromSnapshot(state.splitter, {
      transfer: custody,
      eventStore,
      onPublishError,
    });
    return new SplitterService(splitter, custody, eventStore);
  }

  get id(): string {
    return this.splitter.id;
  }

  // ─── Commands ──────────────────────────────────────────────────────

  deposit(from: Identity, amount: Money): Deposit {
    if (!isIdentity(from)) {
      throw new ValidationError("INVALID_IDENTITY", "Depositor identity must be non-empty");
    }
    this.splitter.denomination.positiveUnits(amount);
    this.custody.deposit(from, amount);
    return this.splitter.receive(from, amount);
  }

  initialize(caller: Identity, identities: readonly Identity[], shares: readonly number[]): readonly Payee[] {
    return this.splitter.initialize(caller, identities, shares);
  }

  release(caller: Identity, identity: Identity): Release {
    return this.splitter.release(caller, identity);
  }

  addProjectFees(caller: Identity, investor: Identity, amount: Money): InvestorRecord {
    return this.splitter.addProjectFees(caller, investor, amount);
  }

  reimburseProjectFees(caller: Identity): readonly Reimbursement[] {
    return this.splitter.reimburseProjectFees(caller);
  }

  transferOwnership(caller: Identity, newOwner: Identity): void {
    this.splitter.transferOwnership(caller, newOwner);
  }

  // ─── Queries ───────────────────────────────────────────────────────

  view(): SplitterView {
    const d = this.splitter.denomination;
    return {
      ...this.splitter.summary(),
      currency: d.currency,
      decimals: d.decimals,
      custody: d.money(this.custody.custodyUnits()),
    };
  }

  payee(identity: Identity): PayeeView {
    return {
      identity,
      shares: this.splitter.shares(identity),
      released: this.splitter.released(identity),
      pending: this.splitter.pendingPayment(identity),
    };
  }

  events(query: ListEventsQuery): readonly StoredEvent[] {
    return this.eventStore.read(this.splitter.streamId, {
      fromVersion: query.fromVersion,
      maxCount: query.limit,
      direction: query.direction,
    });
  }

  health(): SplitterHealth {
    return {
      id: this.id,
      custodyMatchesPool:
        this.custody.custodyUnits() === this.splitter.denomination.units(this.splitter.poolBalance()),
      unpublishedBatches: this.splitter.publishFailures().length,
    };
  }

  state(): SplitterServiceState {
    return { splitter: this.splitter.snapshot(), journal: this.journal.snapshot() };
  }
}
