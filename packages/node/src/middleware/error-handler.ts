/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps domain error codes (SplitterError, LedgerError, EventStoreError)
 * to HTTP status codes. Anything unrecognised is a 500 whose message is
 * not exposed.
 */

import type { Context } from "hono";
import { LedgerError } from "@sharepool/ledger";
import { EventStoreError } from "@sharepool/event-store";
import { SplitterError } from "@sharepool/splitter";
import { ApiError, createErrorEnvelope } from "../types/error.js";
import type { ErrorStatus } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Validation
  INVALID_IDENTITY: 400,
  INVALID_SHARES: 400,
  DUPLICATE_PAYEE: 400,
  LENGTH_MISMATCH: 400,
  NO_PAYEES: 400,
  INDEX_OUT_OF_RANGE: 400,
  NO_SHARES: 400,
  INVALID_AMOUNT: 400,
  CURRENCY_MISMATCH: 400,

  // State
  ALREADY_INITIALIZED: 409,
  NOT_INITIALIZED: 409,
  INVALID_SNAPSHOT: 409,

  // Authorization
  NOT_OWNER: 403,
  NOT_SELF: 403,

  // Economic
  NO_PAYMENT_DUE: 422,
  NO_FEES_OWED: 422,
  POOL_EMPTY: 422,
  INSUFFICIENT_BALANCE: 422,

  // Asset transfer
  TRANSFER_FAILED: 502,

  // Ledger errors
  UNBALANCED_TRANSACTION: 400,
  UNKNOWN_ACCOUNT: 404,
  DUPLICATE_ACCOUNT_ID: 409,
  DUPLICATE_CORRELATION_ID: 409,
  EMPTY_TRANSACTION: 400,

  // Event store errors
  CONCURRENCY_CONFLICT: 409,
  INVALID_STREAM_ID: 400,
  INVALID_EVENT: 400,
  EMPTY_APPEND: 400,
  INVALID_VERSION: 400,
};

interface Resolved {
  readonly status: ErrorStatus;
  readonly code: string;
  readonly details?: Record<string, unknown> | undefined;
}

function resolve(err: Error): Resolved {
  if (err instanceof ApiError) {
    return { status: err.status, code: err.code, details: err.details };
  }
  if (
    err instanceof SplitterError ||
    err instanceof LedgerError ||
    err instanceof EventStoreError
  ) {
    const status = STATUS_MAP[err.code];
    if (status !== undefined) {
      return { status, code: err.code };
    }
  }
  return { status: 500, code: "INTERNAL_ERROR" };
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const { status, code, details } = resolve(err);

  // Don't leak internal details
  const message = status === 500 ? "Internal server error" : err.message;

  return c.json(createErrorEnvelope(code, message, details), status);
}
