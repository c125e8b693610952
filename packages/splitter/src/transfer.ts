/**
 * Calls into the AssetTransfer collaborator.
 */

import type { AssetTransfer, Identity, Money, TransferResult } from "@sharepool/types";
import { TransferError } from "./errors.js";

/**
 * Move `amount` to `destination` or throw TransferError. A collaborator
 * that throws is treated like one that reports failure.
 */
export function executeTransfer(transfer: AssetTransfer, destination: Identity, amount: Money): string {
  let result: TransferResult;
  try {
    result = transfer.transfer(destination, amount);
  } catch (err) {
    throw new TransferError(destination, err instanceof Error ? err.message : String(err));
  }
  if (!result.ok) {
    throw new TransferError(destination, result.reason);
  }
  return result.reference;
}
