/**
 * Asset transfer contract.
 *
 * The splitter never moves value itself. It asks an AssetTransfer to move
 * `amount` to `destination` and treats any failure as fatal to the call
 * that issued it. Implementations are synchronous and atomic per call:
 * either the whole amount moved or nothing did.
 */

import type { Identity, Money } from "./financial.js";

export type TransferResult =
  | { readonly ok: true; readonly reference: string }
  | { readonly ok: false; readonly reason: string };

export interface AssetTransfer {
  transfer(destination: Identity, amount: Money): TransferResult;
}
