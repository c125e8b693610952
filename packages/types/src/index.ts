/**
 * @sharepool/types: Shared domain types for the Sharepool stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Financial types
export type {
  Money,
  Currency,
  Identity,
  LedgerEntry,
  LedgerEntryType,
  AccountRef,
} from "./financial.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Transfer contract
export type { AssetTransfer, TransferResult } from "./transfer.js";

// Runtime type guards
export { isIdentity } from "./guards.js";
