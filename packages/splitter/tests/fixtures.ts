/**
 * Shared test fixtures: a recording AssetTransfer and splitter factory.
 */

import type { AssetTransfer, Identity, Money, TransferResult } from "@sharepool/types";
import type { EventStore } from "@sharepool/event-store";
import { PaymentSplitter } from "../src/splitter.js";
import type { PublishFailure } from "../src/types.js";

export const OWNER = "owner";
export const NOW = "2026-01-01T00:00:00.000Z";

export function units(amount: string): Money {
  return { amount, currency: "UNIT", decimals: 0 };
}

export interface TransferCall {
  readonly destination: Identity;
  readonly amount: Money;
}

/**
 * Records every successful transfer. Destinations in `failFor` get a
 * failure result, destinations in `throwFor` make it throw.
 */
export class RecordingTransfer implements AssetTransfer {
  readonly calls: TransferCall[] = [];
  readonly failFor = new Set<Identity>();
  readonly throwFor = new Set<Identity>();

  transfer(destination: Identity, amount: Money): TransferResult {
    if (this.throwFor.has(destination)) {
      throw new Error("network down");
    }
    if (this.failFor.has(destination)) {
      return { ok: false, reason: "rejected" };
    }
    this.calls.push({ destination, amount });
    return { ok: true, reference: `ref-${String(this.calls.length)}` };
  }
}

export function sequentialIds(prefix = "id"): () => string {
  let n = 0;
  return () => {
    n += 1;
    return `${prefix}-${String(n)}`;
  };
}

export function makeSplitter(
  transfer: AssetTransfer = new RecordingTransfer(),
  eventStore?: EventStore,
  onPublishError?: (failure: PublishFailure) => void,
): PaymentSplitter {
  return new PaymentSplitter({
    id: "test",
    currency: "UNIT",
    decimals: 0,
    owner: OWNER,
    transfer,
    eventStore,
    clock: () => NOW,
    newId: sequentialIds(),
    onPublishError,
  });
}

/**
 * The error thrown by `fn`; fails the test if nothing is thrown.
 */
export function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected an error to be thrown");
}
