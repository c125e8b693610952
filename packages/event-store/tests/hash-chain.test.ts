/**
 * Tests for the hash chain.
 */

import { describe, it, expect } from "vitest";
import type { DomainEvent } from "@sharepool/types";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "../src/hash-chain.js";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import type { StoredEvent } from "../src/types.js";

function makeEvent(n: number): DomainEvent {
  return {
    type: "registry.payee.added",
    metadata: {
      eventId: `evt-${String(n)}`,
      timestamp: "2026-01-01T00:00:00.000Z",
      actor: "owner",
      correlationId: "corr-1",
      source: "registry",
    },
    payload: { identity: `p${String(n)}`, shares: n },
  };
}

function chain(count: number): StoredEvent[] {
  const store = new InMemoryEventStore();
  store.append("s", Array.from({ length: count }, (_, i) => makeEvent(i + 1)));
  return [...store.read("s")];
}

describe("computeEventHash", () => {
  it("is a 64-character hex digest", () => {
    const [first] = chain(1);
    expect(first?.hash).toMatch(/^[0-9a-f]{64}$/);
  });

  it("ignores payload key order", () => {
    const [first] = chain(1);
    if (first === undefined) throw new Error("no event");
    const reordered = {
      ...first,
      event: { ...first.event, payload: { shares: 1, identity: "p1" } },
    };
    expect(computeEventHash(reordered, GENESIS_HASH)).toBe(first.hash);
  });
});

describe("verifyHashChain", () => {
  it("accepts an empty chain", () => {
    expect(verifyHashChain([])).toEqual({ valid: true, lastVerifiedPosition: 0, errors: [] });
  });

  it("detects an edited payload", () => {
    const events = chain(3);
    const second = events[1];
    if (second === undefined) throw new Error("no event");
    events[1] = { ...second, event: { ...second.event, payload: { identity: "p2", shares: 99 } } };

    const result = verifyHashChain(events);
    expect(result.valid).toBe(false);
    expect(result.lastVerifiedPosition).toBe(1);
    expect(result.errors[0]).toEqual({ position: 2, reason: "Hash mismatch at position 2" });
  });

  it("detects a dropped event", () => {
    const events = chain(3);
    events.splice(1, 1);

    const result = verifyHashChain(events);
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.reason)).toEqual([
      "Expected global position 2, found 3",
      "previousHash mismatch at position 3",
    ]);
  });
});
