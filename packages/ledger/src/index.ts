/**
 * @sharepool/ledger: Money math and the custody journal.
 *
 * - bigint base-unit arithmetic with floor proportional splits
 * - append-only, single-currency double-entry journal
 * - JournalTransfer: an AssetTransfer that books every movement
 */

export { Journal } from "./journal.js";
export { JournalTransfer, CUSTODY_ACCOUNT_ID } from "./journal-transfer.js";

export {
  parseAmount,
  formatAmount,
  toMoney,
  unitsOf,
  proportionalShare,
} from "./money-math.js";

export type {
  AccountType,
  NormalBalance,
  JournalAccount,
  JournalTransaction,
  PostingLine,
  AccountBalance,
  JournalSnapshot,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError, NORMAL_BALANCE } from "./types.js";
