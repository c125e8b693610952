/**
 * @sharepool/ledger: Journal types.
 *
 * Rules:
 * - All types are readonly
 * - Posted entries are never mutated
 * - Fail-closed: invalid postings throw, never silently succeed
 */

import type { AccountRef, LedgerEntry } from "@sharepool/types";

// ─── Accounts ────────────────────────────────────────────────────────────

export type AccountType = AccountRef["type"];

export type NormalBalance = "debit" | "credit";

/**
 * Asset and expense accounts grow with debits; the rest with credits.
 */
export const NORMAL_BALANCE: Readonly<Record<AccountType, NormalBalance>> = {
  asset: "debit",
  expense: "debit",
  liability: "credit",
  income: "credit",
  equity: "credit",
} as const;

export interface JournalAccount {
  readonly ref: AccountRef;
  readonly openedAt: string;
}

// ─── Transactions ────────────────────────────────────────────────────────

/**
 * A balanced group of entries sharing one correlation ID.
 */
export interface JournalTransaction {
  readonly correlationId: string;
  readonly entries: readonly LedgerEntry[];
  readonly timestamp: string;
  readonly description?: string | undefined;
}

/**
 * One leg of a posting; the journal fills in ids and timestamps.
 */
export interface PostingLine {
  readonly accountId: string;
  readonly type: LedgerEntry["type"];
  readonly units: bigint;
}

export interface AccountBalance {
  readonly accountId: string;
  readonly accountType: AccountType;
  /** Net base units in the account's normal direction */
  readonly units: bigint;
  readonly totalDebits: bigint;
  readonly totalCredits: bigint;
}

// ─── Snapshot ────────────────────────────────────────────────────────────

export interface JournalSnapshot {
  readonly version: 1;
  readonly currency: string;
  readonly decimals: number;
  readonly accounts: readonly JournalAccount[];
  readonly transactions: readonly JournalTransaction[];
  readonly createdAt: string;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type LedgerErrorCode =
  | "UNBALANCED_TRANSACTION"
  | "UNKNOWN_ACCOUNT"
  | "DUPLICATE_ACCOUNT_ID"
  | "DUPLICATE_CORRELATION_ID"
  | "EMPTY_TRANSACTION"
  | "CURRENCY_MISMATCH"
  | "INVALID_AMOUNT";

export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
