/**
 * @sharepool/event-store: Hash chain.
 *
 *   hash[1] = sha256(jcs(record[1]) + "genesis")
 *   hash[n] = sha256(jcs(record[n]) + hash[n-1])
 *
 * `jcs` is RFC 8785 canonical JSON, so key order and number formatting
 * never change a hash. Editing, dropping or reordering any event breaks
 * verification from that position on.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  HashableEvent,
  IntegrityError,
  StoredEvent,
} from "./types.js";

export const GENESIS_HASH = "genesis";

export function computeEventHash(record: HashableEvent, previousHash: string): string {
  const content = canonicalize({
    event: record.event,
    streamId: record.streamId,
    version: record.version,
    globalPosition: record.globalPosition,
    appendedAt: record.appendedAt,
  });
  return createHash("sha256").update(content + previousHash).digest("hex");
}

/**
 * Verify a sequence of events given in global position order.
 */
export function verifyHashChain(events: readonly StoredEvent[]): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let previousHash = GENESIS_HASH;
  let expectedPosition = 1;
  let lastVerifiedPosition = 0;

  for (const stored of events) {
    if (stored.globalPosition !== expectedPosition) {
      errors.push({
        position: stored.globalPosition,
        reason: `Expected global position ${String(expectedPosition)}, found ${String(stored.globalPosition)}`,
      });
    }

    if (stored.previousHash !== previousHash) {
      errors.push({
        position: stored.globalPosition,
        reason: `previousHash mismatch at position ${String(stored.globalPosition)}`,
      });
    }

    if (computeEventHash(stored, stored.previousHash) !== stored.hash) {
      errors.push({
        position: stored.globalPosition,
        reason: `Hash mismatch at position ${String(stored.globalPosition)}`,
      });
    }

    if (errors.length === 0) {
      lastVerifiedPosition = stored.globalPosition;
    }
    previousHash = stored.hash;
    expectedPosition = stored.globalPosition + 1;
  }

  return { valid: errors.length === 0, lastVerifiedPosition, errors };
}
