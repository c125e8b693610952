/**
 * @sharepool/ledger: Append-only double-entry journal.
 *
 * Single-currency by construction: a journal is opened for one currency
 * and scale, and every posting is expressed in its base units.
 *
 * API surface:
 * - open(): add an account to the chart
 * - post(): append a balanced transaction
 * - balance(): net balance of one account
 * - entries() / transactions(): history
 * - snapshot() / fromSnapshot(): persistence
 *
 * There is no update or delete. Corrections are new postings.
 */

import type { AccountRef, LedgerEntry } from "@sharepool/types";
import { toMoney, unitsOf } from "./money-math.js";
import type {
  AccountBalance,
  JournalAccount,
  JournalSnapshot,
  JournalTransaction,
  PostingLine,
} from "./types.js";
import { LedgerError, NORMAL_BALANCE } from "./types.js";

export class Journal {
  readonly currency: string;
  readonly decimals: number;

  private readonly _accounts = new Map<string, JournalAccount>();
  private readonly _transactions: JournalTransaction[] = [];
  private readonly _correlationIds = new Set<string>();

  constructor(currency: string, decimals: number) {
    this.currency = currency;
    this.decimals = decimals;
  }

  // ─── Accounts ────────────────────────────────────────────────────────

  open(ref: AccountRef, timestamp?: string): JournalAccount {
    if (this._accounts.has(ref.id)) {
      throw new LedgerError("DUPLICATE_ACCOUNT_ID", `Account already exists: "${ref.id}"`);
    }
    const account: JournalAccount = {
      ref: { ...ref },
      openedAt: timestamp ?? new Date().toISOString(),
    };
    this._accounts.set(ref.id, account);
    return account;
  }

  /**
   * Open the account unless it already exists.
   */
  ensure(ref: AccountRef): JournalAccount {
    return this._accounts.get(ref.id) ?? this.open(ref);
  }

  hasAccount(id: string): boolean {
    return this._accounts.has(id);
  }

  accounts(): readonly JournalAccount[] {
    return [...this._accounts.values()];
  }

  // ─── Posting ─────────────────────────────────────────────────────────

  /**
   * Append a balanced transaction.
   *
   * Every line must reference an open account and carry a positive amount;
   * debits must equal credits; the correlation ID must be new.
   */
  post(
    correlationId: string,
    lines: readonly PostingLine[],
    options?: { readonly description?: string | undefined; readonly reference?: string | undefined },
  ): JournalTransaction {
    if (lines.length === 0) {
      throw new LedgerError("EMPTY_TRANSACTION", "Cannot post an empty transaction");
    }
    if (this._correlationIds.has(correlationId)) {
      throw new LedgerError(
        "DUPLICATE_CORRELATION_ID",
        `Transaction already posted: "${correlationId}"`,
      );
    }

    let debits = 0n;
    let credits = 0n;
    for (const line of lines) {
      if (!this._accounts.has(line.accountId)) {
        throw new LedgerError("UNKNOWN_ACCOUNT", `Unknown account: "${line.accountId}"`);
      }
      if (line.units <= 0n) {
        throw new LedgerError(
          "INVALID_AMOUNT",
          `Posting amounts must be positive, got ${line.units.toString()} on "${line.accountId}"`,
        );
      }
      if (line.type === "debit") debits += line.units;
      else credits += line.units;
    }

    if (debits !== credits) {
      throw new LedgerError(
        "UNBALANCED_TRANSACTION",
        `Transaction "${correlationId}" is unbalanced: debits=${debits.toString()}, credits=${credits.toString()}`,
      );
    }

    const timestamp = new Date().toISOString();
    const entries: LedgerEntry[] = lines.map((line, i) => ({
      id: `${correlationId}:${String(i + 1)}`,
      accountId: line.accountId,
      type: line.type,
      money: toMoney(line.units, this.currency, this.decimals),
      timestamp,
      correlationId,
      ...(options?.reference !== undefined ? { reference: options.reference } : {}),
    }));

    const transaction: JournalTransaction = {
      correlationId,
      entries,
      timestamp,
      description: options?.description,
    };
    this._transactions.push(transaction);
    this._correlationIds.add(correlationId);
    return transaction;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  balance(accountId: string): AccountBalance {
    const account = this._accounts.get(accountId);
    if (account === undefined) {
      throw new LedgerError("UNKNOWN_ACCOUNT", `Unknown account: "${accountId}"`);
    }

    let totalDebits = 0n;
    let totalCredits = 0n;
    for (const entry of this.entries(accountId)) {
      if (entry.type === "debit") totalDebits += unitsOf(entry.money);
      else totalCredits += unitsOf(entry.money);
    }

    const units = NORMAL_BALANCE[account.ref.type] === "debit"
      ? totalDebits - totalCredits
      : totalCredits - totalDebits;

    return {
      accountId,
      accountType: account.ref.type,
      units,
      totalDebits,
      totalCredits,
    };
  }

  /**
   * All entries, optionally restricted to one account.
   */
  entries(accountId?: string): readonly LedgerEntry[] {
    const all = this._transactions.flatMap((t) => t.entries);
    return accountId === undefined ? all : all.filter((e) => e.accountId === accountId);
  }

  transactions(): readonly JournalTransaction[] {
    return [...this._transactions];
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): JournalSnapshot {
    return {
      version: 1,
      currency: this.currency,
      decimals: this.decimals,
      accounts: this.accounts(),
      transactions: this.transactions(),
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Restore a journal. Transactions are re-validated, not trusted.
   */
  static fromSnapshot(snapshot: JournalSnapshot): Journal {
    const journal = new Journal(snapshot.currency, snapshot.decimals);
    for (const account of snapshot.accounts) {
      journal.open(account.ref, account.openedAt);
    }
    for (const tx of snapshot.transactions) {
      const restored = journal.post(
        tx.correlationId,
        tx.entries.map((e) => ({ accountId: e.accountId, type: e.type, units: unitsOf(e.money) })),
        { description: tx.description, reference: tx.entries[0]?.reference },
      );
      // Keep the original timestamps so snapshots round-trip exactly.
      journal._transactions[journal._transactions.length - 1] = {
        ...restored,
        timestamp: tx.timestamp,
        entries: restored.entries.map((e, i) => ({
          ...e,
          timestamp: tx.entries[i]?.timestamp ?? tx.timestamp,
        })),
      };
    }
    return journal;
  }
}
