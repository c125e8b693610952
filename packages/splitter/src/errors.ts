/**
 * Splitter errors.
 *
 * Every failure is thrown before any state of the failing call is kept,
 * except for reimbursement transfers completed earlier in the same batch.
 */

// =============================================================================
// Codes
// =============================================================================

export type ValidationErrorCode =
  | "INVALID_IDENTITY"
  | "INVALID_SHARES"
  | "DUPLICATE_PAYEE"
  | "LENGTH_MISMATCH"
  | "NO_PAYEES"
  | "INDEX_OUT_OF_RANGE"
  | "NO_SHARES"
  | "INVALID_AMOUNT"
  | "CURRENCY_MISMATCH";

export type StateErrorCode = "ALREADY_INITIALIZED" | "NOT_INITIALIZED" | "INVALID_SNAPSHOT";

export type AuthorizationErrorCode = "NOT_OWNER" | "NOT_SELF";

export type EconomicErrorCode =
  | "NO_PAYMENT_DUE"
  | "NO_FEES_OWED"
  | "POOL_EMPTY"
  | "INSUFFICIENT_BALANCE";

export type TransferErrorCode = "TRANSFER_FAILED";

export type SplitterErrorCode =
  | ValidationErrorCode
  | StateErrorCode
  | AuthorizationErrorCode
  | EconomicErrorCode
  | TransferErrorCode;

// =============================================================================
// Classes
// =============================================================================

export class SplitterError extends Error {
  public readonly code: SplitterErrorCode;
  constructor(code: SplitterErrorCode, message: string) {
    super(message);
    this.name = "SplitterError";
    this.code = code;
  }
}

/** Malformed input: bad identity, weight, amount, index or currency. */
export class ValidationError extends SplitterError {
  public override readonly code: ValidationErrorCode;
  constructor(code: ValidationErrorCode, message: string) {
    super(code, message);
    this.name = "ValidationError";
    this.code = code;
  }
}

export class StateError extends SplitterError {
  public override readonly code: StateErrorCode;
  constructor(code: StateErrorCode, message: string) {
    super(code, message);
    this.name = "StateError";
    this.code = code;
  }
}

export class AuthorizationError extends SplitterError {
  public override readonly code: AuthorizationErrorCode;
  constructor(code: AuthorizationErrorCode, message: string) {
    super(code, message);
    this.name = "AuthorizationError";
    this.code = code;
  }
}

/** Nothing to pay, or not enough in the pool to pay it. */
export class EconomicError extends SplitterError {
  public override readonly code: EconomicErrorCode;
  constructor(code: EconomicErrorCode, message: string) {
    super(code, message);
    this.name = "EconomicError";
    this.code = code;
  }
}

export class TransferError extends SplitterError {
  public override readonly code: TransferErrorCode;
  public readonly destination: string;
  constructor(destination: string, reason: string) {
    super("TRANSFER_FAILED", `Transfer to "${destination}" failed: ${reason}`);
    this.name = "TransferError";
    this.code = "TRANSFER_FAILED";
    this.destination = destination;
  }
}
