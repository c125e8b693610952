/**
 * @sharepool/ledger: AssetTransfer backed by a Journal.
 *
 * Custody is the `pool` asset account. Deposits debit it against the
 * depositor's contribution account; transfers credit it against the
 * destination's payout account. A transfer larger than the custody
 * balance is refused and posts nothing.
 *
 * Account ids:
 * - pool                    asset
 * - contribution:<identity> equity
 * - payout:<identity>       expense
 */

import type { AssetTransfer, Identity, Money, TransferResult } from "@sharepool/types";
import { Journal } from "./journal.js";
import { unitsOf } from "./money-math.js";
import { LedgerError } from "./types.js";

export const CUSTODY_ACCOUNT_ID = "pool";

export class JournalTransfer implements AssetTransfer {
  readonly journal: Journal;
  private _sequence = 0;

  constructor(journal: Journal) {
    this.journal = journal;
    this.journal.ensure({ id: CUSTODY_ACCOUNT_ID, type: "asset", name: "Pool custody" });
    this._sequence = journal.transactions().length;
  }

  /**
   * Record value arriving in custody.
   */
  deposit(from: Identity, amount: Money): string {
    const units = this.unitsFor(amount);
    const accountId = `contribution:${from}`;
    this.journal.ensure({ id: accountId, type: "equity", name: `Contributions from ${from}` });

    const correlationId = this.nextId("deposit");
    this.journal.post(
      correlationId,
      [
        { accountId: CUSTODY_ACCOUNT_ID, type: "debit", units },
        { accountId, type: "credit", units },
      ],
      { description: `Deposit from ${from}` },
    );
    return correlationId;
  }

  transfer(destination: Identity, amount: Money): TransferResult {
    if (amount.currency !== this.journal.currency || amount.decimals !== this.journal.decimals) {
      return {
        ok: false,
        reason: `Custody holds ${this.journal.currency}/${String(this.journal.decimals)}, not ${amount.currency}/${String(amount.decimals)}`,
      };
    }

    const units = unitsOf(amount);
    if (units <= 0n) {
      return { ok: false, reason: `Transfer amount must be positive, got ${amount.amount}` };
    }

    const available = this.custodyUnits();
    if (units > available) {
      return {
        ok: false,
        reason: `Custody holds ${available.toString()} base units, ${units.toString()} requested`,
      };
    }

    const accountId = `payout:${destination}`;
    this.journal.ensure({ id: accountId, type: "expense", name: `Payouts to ${destination}` });

    const reference = this.nextId("transfer");
    this.journal.post(
      reference,
      [
        { accountId, type: "debit", units },
        { accountId: CUSTODY_ACCOUNT_ID, type: "credit", units },
      ],
      { description: `Transfer to ${destination}`, reference },
    );
    return { ok: true, reference };
  }

  /**
   * Base units currently held in custody.
   */
  custodyUnits(): bigint {
    return this.journal.balance(CUSTODY_ACCOUNT_ID).units;
  }

  /**
   * Total base units ever paid out to one destination.
   */
  paidTo(destination: Identity): bigint {
    const accountId = `payout:${destination}`;
    return this.journal.hasAccount(accountId) ? this.journal.balance(accountId).units : 0n;
  }

  private unitsFor(amount: Money): bigint {
    if (amount.currency !== this.journal.currency || amount.decimals !== this.journal.decimals) {
      throw new LedgerError(
        "CURRENCY_MISMATCH",
        `Custody holds ${this.journal.currency}/${String(this.journal.decimals)}, not ${amount.currency}/${String(amount.decimals)}`,
      );
    }
    return unitsOf(amount);
  }

  private nextId(kind: "deposit" | "transfer"): string {
    this._sequence += 1;
    return `${kind}-${String(this._sequence)}`;
  }
}
