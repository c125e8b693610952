/**
 * @sharepool/event-store: Splitter notifications.
 *
 * Every notification a splitter publishes, with the zod schema its
 * payload must satisfy. `createSplitterCatalog()` returns a catalog with
 * all of them registered.
 */

import { z } from "zod";
import type { EventSource } from "@sharepool/types";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Event Type Constants
// =============================================================================

export const SPLITTER_EVENTS = {
  PAYEE_ADDED: "registry.payee.added",
  PAYMENT_RELEASED: "distribution.payment.released",
  PAYMENT_RECEIVED: "pool.payment.received",
  FEES_ADDED: "reimbursement.fees.added",
  INVESTOR_REIMBURSED: "reimbursement.investor.reimbursed",
  OWNERSHIP_TRANSFERRED: "access.ownership.transferred",
} as const;

export type SplitterEventType = (typeof SPLITTER_EVENTS)[keyof typeof SPLITTER_EVENTS];

export const SPLITTER_EVENT_SOURCES: Readonly<Record<SplitterEventType, EventSource>> = {
  [SPLITTER_EVENTS.PAYEE_ADDED]: "registry",
  [SPLITTER_EVENTS.PAYMENT_RELEASED]: "distribution",
  [SPLITTER_EVENTS.PAYMENT_RECEIVED]: "pool",
  [SPLITTER_EVENTS.FEES_ADDED]: "reimbursement",
  [SPLITTER_EVENTS.INVESTOR_REIMBURSED]: "reimbursement",
  [SPLITTER_EVENTS.OWNERSHIP_TRANSFERRED]: "access",
};

// =============================================================================
// Payload Schemas
// =============================================================================

const identity = z.string().trim().min(1);

export const MoneySchema = z.object({
  amount: z.string().regex(/^\d+(\.\d+)?$/, "must be a non-negative decimal string"),
  currency: z.string().min(1),
  decimals: z.number().int().nonnegative(),
});

export const PayeeAddedSchema = z.object({
  identity,
  shares: z.number().int().positive(),
});

export const PaymentReleasedSchema = z.object({
  to: identity,
  amount: MoneySchema,
  reference: z.string().min(1),
});

export const PaymentReceivedSchema = z.object({
  from: identity,
  amount: MoneySchema,
});

export const FeesAddedSchema = z.object({
  investor: identity,
  amount: MoneySchema,
  /** Total owed to the investor after this addition */
  feeOwed: MoneySchema,
});

export const InvestorReimbursedSchema = z.object({
  investor: identity,
  amount: MoneySchema,
  reference: z.string().min(1),
});

export const OwnershipTransferredSchema = z.object({
  previousOwner: identity,
  newOwner: identity,
});

export type PayeeAddedPayload = z.infer<typeof PayeeAddedSchema>;
export type PaymentReleasedPayload = z.infer<typeof PaymentReleasedSchema>;
export type PaymentReceivedPayload = z.infer<typeof PaymentReceivedSchema>;
export type FeesAddedPayload = z.infer<typeof FeesAddedSchema>;
export type InvestorReimbursedPayload = z.infer<typeof InvestorReimbursedSchema>;
export type OwnershipTransferredPayload = z.infer<typeof OwnershipTransferredSchema>;

/** Payload type of each splitter notification. */
export interface SplitterEventMap {
  [SPLITTER_EVENTS.PAYEE_ADDED]: PayeeAddedPayload;
  [SPLITTER_EVENTS.PAYMENT_RELEASED]: PaymentReleasedPayload;
  [SPLITTER_EVENTS.PAYMENT_RECEIVED]: PaymentReceivedPayload;
  [SPLITTER_EVENTS.FEES_ADDED]: FeesAddedPayload;
  [SPLITTER_EVENTS.INVESTOR_REIMBURSED]: InvestorReimbursedPayload;
  [SPLITTER_EVENTS.OWNERSHIP_TRANSFERRED]: OwnershipTransferredPayload;
}

// =============================================================================
// Catalog
// =============================================================================

export function createSplitterCatalog(): EventCatalog {
  const catalog = new EventCatalog();

  catalog.register({
    type: SPLITTER_EVENTS.PAYEE_ADDED,
    description: "A payee was registered with a share weight",
    source: "registry",
    payload: PayeeAddedSchema,
  });
  catalog.register({
    type: SPLITTER_EVENTS.PAYMENT_RELEASED,
    description: "A payee withdrew its accrued share",
    source: "distribution",
    payload: PaymentReleasedSchema,
  });
  catalog.register({
    type: SPLITTER_EVENTS.PAYMENT_RECEIVED,
    description: "Value was deposited into the pool",
    source: "pool",
    payload: PaymentReceivedSchema,
  });
  catalog.register({
    type: SPLITTER_EVENTS.FEES_ADDED,
    description: "Project fees were recorded for an investor",
    source: "reimbursement",
    payload: FeesAddedSchema,
  });
  catalog.register({
    type: SPLITTER_EVENTS.INVESTOR_REIMBURSED,
    description: "An investor was paid back its recorded fees",
    source: "reimbursement",
    payload: InvestorReimbursedSchema,
  });
  catalog.register({
    type: SPLITTER_EVENTS.OWNERSHIP_TRANSFERRED,
    description: "The privileged identity changed",
    source: "access",
    payload: OwnershipTransferredSchema,
  });

  return catalog;
}
