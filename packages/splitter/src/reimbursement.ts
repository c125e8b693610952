/**
 * Investor Reimbursement Queue.
 *
 * The owner records fees owed to investors and later pays every active
 * record back in one batch, in first-registration order.
 *
 * Rules:
 * - Adding fees is strictly additive; a cleared record becomes active again
 * - feePoolTotal always equals the sum of feeOwed over active records
 * - Cleared records are skipped, never paid twice
 * - A failed transfer stops the batch; records paid before it stay paid
 */

import { isIdentity } from "@sharepool/types";
import type { AssetTransfer, Identity, Money } from "@sharepool/types";
import { SPLITTER_EVENTS } from "@sharepool/event-store";
import { requireAuthorized } from "./authorization.js";
import type { AuthorizationGate } from "./authorization.js";
import type { Denomination } from "./denomination.js";
import { EconomicError, StateError, ValidationError } from "./errors.js";
import type { PooledBalance } from "./pool.js";
import { executeTransfer } from "./transfer.js";
import type { InvestorRecord, InvestorStatus, Notify, Reimbursement } from "./types.js";

interface InvestorState {
  readonly identity: Identity;
  feeOwed: bigint;
  status: InvestorStatus;
  reimbursed: bigint;
}

export class InvestorReimbursementQueue {
  /** Insertion-ordered by first registration */
  private readonly records = new Map<Identity, InvestorState>();
  private _feePoolTotal = 0n;

  constructor(
    private readonly gate: AuthorizationGate,
    private readonly pool: PooledBalance,
    private readonly transfer: AssetTransfer,
    private readonly denomination: Denomination,
    private readonly notify: Notify,
  ) {}

  // ───────────────────────────────────────────────────────────────────────
  // Commands
  // ───────────────────────────────────────────────────────────────────────

  addProjectFees(caller: Identity, investor: Identity, feeAmount: Money): InvestorRecord {
    requireAuthorized(this.gate, caller, "add project fees");
    if (!isIdentity(investor)) {
      throw new ValidationError("INVALID_IDENTITY", "Investor identity must be non-empty");
    }
    const units = this.denomination.positiveUnits(feeAmount);

    let record = this.records.get(investor);
    if (record === undefined) {
      record = { identity: investor, feeOwed: 0n, status: "active", reimbursed: 0n };
      this.records.set(investor, record);
    }
    record.status = "active";
    record.feeOwed += units;
    this._feePoolTotal += units;

    const view = this.view(record);
    this.notify(SPLITTER_EVENTS.FEES_ADDED, {
      investor,
      amount: this.denomination.money(units),
      feeOwed: view.feeOwed,
    });
    return view;
  }

  /**
   * Pay every active record in full. The pool must cover the whole fee
   * pool before the first transfer is attempted. Each payment is
   * committed and notified before the next transfer starts.
   */
  reimburseProjectFees(caller: Identity): readonly Reimbursement[] {
    requireAuthorized(this.gate, caller, "reimburse project fees");
    if (this._feePoolTotal === 0n) {
      throw new EconomicError("NO_FEES_OWED", "No investor fees are owed");
    }
    if (this.pool.units === 0n) {
      throw new EconomicError("POOL_EMPTY", "The pool is empty");
    }
    if (this.pool.units < this._feePoolTotal) {
      throw new EconomicError(
        "INSUFFICIENT_BALANCE",
        `Pool holds ${String(this.pool.units)} base units, ${String(this._feePoolTotal)} owed to investors`,
      );
    }

    const paid: Reimbursement[] = [];
    for (const record of this.records.values()) {
      if (record.status === "cleared") {
        continue;
      }

      const owed = record.feeOwed;
      const amount = this.denomination.money(owed);
      const reference = executeTransfer(this.transfer, record.identity, amount);

      this._feePoolTotal -= owed;
      this.pool.debit(owed);
      record.reimbursed += owed;
      record.feeOwed = 0n;
      record.status = "cleared";

      const reimbursement: Reimbursement = { investor: record.identity, amount, reference };
      paid.push(reimbursement);
      this.notify(SPLITTER_EVENTS.INVESTOR_REIMBURSED, reimbursement);
    }
    return paid;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  /** Zero for unknown or cleared investors. */
  feeOwed(identity: Identity): Money {
    return this.denomination.money(this.records.get(identity)?.feeOwed ?? 0n);
  }

  get feePoolTotalUnits(): bigint {
    return this._feePoolTotal;
  }

  listInvestors(): readonly InvestorRecord[] {
    return [...this.records.values()].map((r) => this.view(r));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot support
  // ───────────────────────────────────────────────────────────────────────

  restore(investors: readonly InvestorRecord[]): void {
    if (this.records.size > 0) {
      throw new StateError("INVALID_SNAPSHOT", "Reimbursement queue already holds state");
    }
    for (const investor of investors) {
      const feeOwed = this.denomination.units(investor.feeOwed);
      if (
        !isIdentity(investor.identity) ||
        this.records.has(investor.identity) ||
        feeOwed < 0n ||
        (investor.status === "cleared") !== (feeOwed === 0n)
      ) {
        throw new StateError("INVALID_SNAPSHOT", `Investor record "${investor.identity}" is inconsistent`);
      }
      this.records.set(investor.identity, {
        identity: investor.identity,
        feeOwed,
        status: investor.status,
        reimbursed: this.denomination.units(investor.reimbursed),
      });
      this._feePoolTotal += feeOwed;
    }
  }

  private view(record: InvestorState): InvestorRecord {
    return {
      identity: record.identity,
      feeOwed: this.denomination.money(record.feeOwed),
      status: record.status,
      reimbursed: this.denomination.money(record.reimbursed),
    };
  }
}
