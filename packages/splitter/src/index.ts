/**
 * @sharepool/splitter
 *
 * Proportional payment splitter with pull-based withdrawals and a
 * prioritized investor reimbursement queue, sharing one pooled balance.
 */

// Coordinator
export { PaymentSplitter } from "./splitter.js";

// Components
export { ShareRegistry } from "./share-registry.js";
export { DistributionEngine } from "./distribution.js";
export { InvestorReimbursementQueue } from "./reimbursement.js";
export { PooledBalance } from "./pool.js";
export { Denomination } from "./denomination.js";
export { OwnerGate, requireAuthorized } from "./authorization.js";
export type { AuthorizationGate } from "./authorization.js";
export { executeTransfer } from "./transfer.js";

// Errors
export {
  SplitterError,
  ValidationError,
  StateError,
  AuthorizationError,
  EconomicError,
  TransferError,
} from "./errors.js";
export type {
  SplitterErrorCode,
  ValidationErrorCode,
  StateErrorCode,
  AuthorizationErrorCode,
  EconomicErrorCode,
  TransferErrorCode,
} from "./errors.js";

// Types
export type {
  Payee,
  InvestorStatus,
  InvestorRecord,
  Deposit,
  Release,
  Reimbursement,
  Notify,
  PublishFailure,
  SplitterOptions,
  SplitterDependencies,
  SplitterSnapshot,
  SplitterSummary,
} from "./types.js";
