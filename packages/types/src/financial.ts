/**
 * Financial Types
 *
 * Monetary primitives shared by the splitter, the journal and the node.
 *
 * Rules:
 * - Amounts are decimal strings, never floats
 * - Currency and scale always travel with the amount
 * - A pool holds a single currency; mixing is rejected by consumers
 */

/**
 * Currency identifier (token symbol or ISO 4217 code).
 */
export type Currency = string;

/**
 * A precise monetary amount.
 * Arithmetic happens on scaled bigints; this shape is what crosses
 * package and process boundaries.
 */
export interface Money {
  /** Decimal string, e.g. "100.50" or "25" */
  readonly amount: string;

  /** Currency symbol, e.g. "USDC" */
  readonly currency: Currency;

  /** Number of fractional digits in the base unit (USDC = 6, ETH = 18) */
  readonly decimals: number;
}

/**
 * An opaque participant identity: payee, investor, depositor or owner.
 */
export type Identity = string;

/**
 * Reference to an account in the journal.
 */
export interface AccountRef {
  readonly id: string;
  readonly type: "asset" | "liability" | "income" | "expense" | "equity";
  readonly name: string;
}

export type LedgerEntryType = "debit" | "credit";

/**
 * A single journal line. Always part of a balanced transaction.
 */
export interface LedgerEntry {
  readonly id: string;
  readonly accountId: string;
  readonly type: LedgerEntryType;
  readonly money: Money;
  /** ISO 8601 timestamp */
  readonly timestamp: string;
  /** Groups the lines of one transaction */
  readonly correlationId: string;
  /** Transfer reference handed back to the caller */
  readonly reference?: string | undefined;
}
