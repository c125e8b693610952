/**
 * PaymentSplitter: coordinator for one pooled balance.
 *
 * Composes:
 * - OwnerGate: the privileged identity
 * - ShareRegistry: payees and share weights
 * - DistributionEngine: pull-based proportional payouts
 * - InvestorReimbursementQueue: fees owed to investors
 *
 * Every command runs to completion or throws with its changes undone.
 * Notifications raised during a command are checked against the event
 * store as they are raised, buffered, and appended only once the command
 * has committed; a reimbursement batch that fails part-way still
 * publishes the payments it completed.
 *
 * The store never decides a command's outcome. Events it refuses after
 * the state has changed are kept in `publishFailures()` and handed to
 * `onPublishError`.
 */

import { randomUUID } from "node:crypto";
import { isIdentity } from "@sharepool/types";
import type { AssetTransfer, DomainEvent, Identity, Money } from "@sharepool/types";
import { SPLITTER_EVENTS, SPLITTER_EVENT_SOURCES } from "@sharepool/event-store";
import { EventStoreError } from "@sharepool/event-store";
import type { EventStore } from "@sharepool/event-store";
import { OwnerGate } from "./authorization.js";
import { Denomination } from "./denomination.js";
import { DistributionEngine } from "./distribution.js";
import { StateError, ValidationError } from "./errors.js";
import { PooledBalance } from "./pool.js";
import { InvestorReimbursementQueue } from "./reimbursement.js";
import { ShareRegistry } from "./share-registry.js";
import type {
  Deposit,
  InvestorRecord,
  Notify,
  Payee,
  PublishFailure,
  Reimbursement,
  Release,
  SplitterDependencies,
  SplitterOptions,
  SplitterSnapshot,
  SplitterSummary,
} from "./types.js";

interface CommandContext {
  readonly actor: Identity;
  readonly correlationId: string;
}

export class PaymentSplitter {
  readonly id: string;
  readonly streamId: string;
  readonly denomination: Denomination;

  private readonly pool = new PooledBalance();
  private readonly gate: OwnerGate;
  private readonly registry: ShareRegistry;
  private readonly distribution: DistributionEngine;
  private readonly reimbursement: InvestorReimbursementQueue;

  private readonly transfer: AssetTransfer;
  private readonly eventStore: EventStore | undefined;
  private readonly clock: () => string;
  private readonly newId: () => string;
  private readonly onPublishError: ((failure: PublishFailure) => void) | undefined;

  private context: CommandContext | undefined;
  private pending: DomainEvent[] = [];
  private readonly failures: PublishFailure[] = [];

  constructor(options: SplitterOptions) {
    if (!isIdentity(options.id)) {
      throw new ValidationError("INVALID_IDENTITY", "Splitter id must be non-empty");
    }
    this.id = options.id;
    this.streamId = `splitter:${options.id}`;
    this.denomination = new Denomination(options.currency, options.decimals);
    this.transfer = options.transfer;
    this.eventStore = options.eventStore;
    this.clock = options.clock ?? (() => new Date().toISOString());
    this.newId = options.newId ?? randomUUID;
    this.onPublishError = options.onPublishError;

    this.gate = new OwnerGate(options.owner, this.notify);
    this.registry = new ShareRegistry(this.gate, this.denomination, this.notify);
    this.distribution = new DistributionEngine(
      this.registry,
      this.pool,
      this.transfer,
      this.denomination,
      this.notify,
    );
    this.reimbursement = new InvestorReimbursementQueue(
      this.gate,
      this.pool,
      this.transfer,
      this.denomination,
      this.notify,
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Commands
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Credit a deposit to the pool. Anyone may deposit.
   */
  receive(from: Identity, amount: Money): Deposit {
    return this.command(from, () => {
      if (!isIdentity(from)) {
        throw new ValidationError("INVALID_IDENTITY", "Depositor identity must be non-empty");
      }
      const units = this.denomination.positiveUnits(amount);
      this.pool.credit(units);

      const deposited = this.denomination.money(units);
      this.notify(SPLITTER_EVENTS.PAYMENT_RECEIVED, { from, amount: deposited });
      return { from, amount: deposited, poolBalance: this.poolBalance() };
    });
  }

  initialize(
    caller: Identity,
    identities: readonly Identity[],
    shareWeights: readonly number[],
  ): readonly Payee[] {
    return this.command(caller, () => this.registry.initialize(caller, identities, shareWeights));
  }

  release(caller: Identity, identity: Identity): Release {
    return this.command(caller, () => this.distribution.release(caller, identity));
  }

  addProjectFees(caller: Identity, investor: Identity, feeAmount: Money): InvestorRecord {
    return this.command(caller, () =>
      this.reimbursement.addProjectFees(caller, investor, feeAmount),
    );
  }

  reimburseProjectFees(caller: Identity): readonly Reimbursement[] {
    return this.command(caller, () => this.reimbursement.reimburseProjectFees(caller), {
      publishOnError: true,
    });
  }

  transferOwnership(caller: Identity, newOwner: Identity): void {
    this.command(caller, () => {
      this.gate.transferOwnership(caller, newOwner);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  owner(): Identity {
    return this.gate.owner();
  }

  isInitialized(): boolean {
    return this.registry.isInitialized();
  }

  totalShares(): number {
    return this.registry.totalShares();
  }

  shares(identity: Identity): number {
    return this.registry.shares(identity);
  }

  released(identity: Identity): Money {
    return this.denomination.money(this.registry.releasedUnits(identity));
  }

  payeeAt(index: number): Payee {
    return this.registry.payeeAt(index);
  }

  listPayees(): readonly Payee[] {
    return this.registry.listPayees();
  }

  pendingPayment(identity: Identity): Money {
    return this.distribution.pendingPayment(identity);
  }

  poolBalance(): Money {
    return this.denomination.money(this.pool.units);
  }

  totalReleased(): Money {
    return this.denomination.money(this.distribution.totalReleasedUnits);
  }

  totalReceived(): Money {
    return this.denomination.money(this.distribution.totalReceivedUnits);
  }

  feeOwed(identity: Identity): Money {
    return this.reimbursement.feeOwed(identity);
  }

  feePoolTotal(): Money {
    return this.denomination.money(this.reimbursement.feePoolTotalUnits);
  }

  listInvestors(): readonly InvestorRecord[] {
    return this.reimbursement.listInvestors();
  }

  /** Notification batches the event store refused, oldest first. */
  publishFailures(): readonly PublishFailure[] {
    return [...this.failures];
  }

  summary(): SplitterSummary {
    return {
      id: this.id,
      owner: this.owner(),
      initialized: this.isInitialized(),
      totalShares: this.totalShares(),
      payeeCount: this.registry.listPayees().length,
      poolBalance: this.poolBalance(),
      totalReceived: this.totalReceived(),
      totalReleased: this.totalReleased(),
      feePoolTotal: this.feePoolTotal(),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): SplitterSnapshot {
    return {
      version: 1,
      id: this.id,
      currency: this.denomination.currency,
      decimals: this.denomination.decimals,
      owner: this.owner(),
      initialized: this.isInitialized(),
      payees: this.listPayees(),
      totalReleased: this.totalReleased(),
      poolBalance: this.poolBalance(),
      investors: this.listInvestors(),
      feePoolTotal: this.feePoolTotal(),
      asOf: this.clock(),
    };
  }

  /**
   * Rebuild a splitter from a snapshot. Restoring publishes nothing.
   *
   * @throws StateError INVALID_SNAPSHOT when the totals disagree with the records
   */
  static fromSnapshot(snap: SplitterSnapshot, deps: SplitterDependencies): PaymentSplitter {
    if (snap.version !== 1) {
      throw new StateError("INVALID_SNAPSHOT", `Unsupported snapshot version ${String(snap.version)}`);
    }

    const splitter = new PaymentSplitter({
      ...deps,
      id: snap.id,
      currency: snap.currency,
      decimals: snap.decimals,
      owner: snap.owner,
    });
    const d = splitter.denomination;

    const poolUnits = d.units(snap.poolBalance);
    const totalReleased = d.units(snap.totalReleased);
    if (poolUnits < 0n) {
      throw new StateError("INVALID_SNAPSHOT", "Pool balance cannot be negative");
    }

    splitter.registry.restore(snap.payees, snap.initialized);
    const releasedSum = snap.payees.reduce((sum, p) => sum + d.units(p.released), 0n);
    if (releasedSum !== totalReleased) {
      throw new StateError(
        "INVALID_SNAPSHOT",
        `totalReleased ${snap.totalReleased.amount} does not match the payees' released sum`,
      );
    }
    splitter.distribution.restore(totalReleased);

    splitter.reimbursement.restore(snap.investors);
    if (splitter.reimbursement.feePoolTotalUnits !== d.units(snap.feePoolTotal)) {
      throw new StateError(
        "INVALID_SNAPSHOT",
        `feePoolTotal ${snap.feePoolTotal.amount} does not match the active investor records`,
      );
    }

    splitter.pool.credit(poolUnits);
    return splitter;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private readonly notify: Notify = (type, payload) => {
    if (this.context === undefined) {
      throw new Error(`Notification "${type}" raised outside a command`);
    }
    const event: DomainEvent = {
      type,
      metadata: {
        eventId: this.newId(),
        timestamp: this.clock(),
        actor: this.context.actor,
        correlationId: this.context.correlationId,
        source: SPLITTER_EVENT_SOURCES[type],
      },
      payload,
    };
    // A refused event must not take the rest of the batch down with it.
    if (this.eventStore !== undefined) {
      try {
        this.eventStore.validate(this.streamId, [event]);
      } catch (err) {
        this.recordFailure([event], err);
        return;
      }
    }
    this.pending.push(event);
  };

  private command<T>(
    actor: Identity,
    run: () => T,
    options: { readonly publishOnError?: boolean } = {},
  ): T {
    this.context = { actor, correlationId: this.newId() };
    this.pending = [];
    try {
      const result = run();
      this.publish();
      return result;
    } catch (err) {
      // publish() records its own failures, so `err` is always the one rethrown.
      if (options.publishOnError === true) {
        this.publish();
      }
      throw err;
    } finally {
      this.context = undefined;
      this.pending = [];
    }
  }

  /** Append the buffered batch; a refusal is recorded, never thrown. */
  private publish(): void {
    const events = this.pending;
    this.pending = [];
    if (this.eventStore === undefined || events.length === 0) {
      return;
    }
    try {
      this.eventStore.append(this.streamId, events);
    } catch (err) {
      this.recordFailure(events, err);
    }
  }

  private recordFailure(events: readonly DomainEvent[], err: unknown): void {
    const reason =
      err instanceof EventStoreError
        ? `${err.code}: ${err.message}`
        : err instanceof Error
          ? err.message
          : String(err);
    const failure: PublishFailure = { streamId: this.streamId, events, reason, at: this.clock() };
    this.failures.push(failure);
    this.onPublishError?.(failure);
  }
}
