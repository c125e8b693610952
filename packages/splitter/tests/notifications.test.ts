/**
 * Tests for the notifications a splitter publishes to its event store.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import type { AssetTransfer } from "@sharepool/types";
import {
  createSplitterCatalog,
  InMemoryEventStore,
  SPLITTER_EVENTS,
} from "@sharepool/event-store";
import type { StoredEvent } from "@sharepool/event-store";
import { TransferError } from "../src/errors.js";
import type { PaymentSplitter } from "../src/splitter.js";
import { caught, makeSplitter, NOW, OWNER, RecordingTransfer, units } from "./fixtures.js";

describe("notifications", () => {
  let store: InMemoryEventStore;
  let transfer: RecordingTransfer;
  let splitter: PaymentSplitter;

  beforeEach(() => {
    store = new InMemoryEventStore({ catalog: createSplitterCatalog() });
    transfer = new RecordingTransfer();
    splitter = makeSplitter(transfer, store);
  });

  function types(): string[] {
    return store.read(splitter.streamId).map((e) => e.event.type);
  }

  it("publishes one event per state change in call order", () => {
    splitter.initialize(OWNER, ["p1", "p2"], [1, 3]);
    splitter.receive("funder", units("100"));
    splitter.release("p1", "p1");

    expect(types()).toEqual([
      SPLITTER_EVENTS.PAYEE_ADDED,
      SPLITTER_EVENTS.PAYEE_ADDED,
      SPLITTER_EVENTS.PAYMENT_RECEIVED,
      SPLITTER_EVENTS.PAYMENT_RELEASED,
    ]);
    expect(store.read(splitter.streamId)[3]?.event.payload).toEqual({
      to: "p1",
      amount: units("25"),
      reference: "ref-1",
    });
  });

  it("stamps actor, source and a shared correlation id per call", () => {
    splitter.initialize(OWNER, ["p1", "p2"], [1, 1]);
    splitter.receive("funder", units("10"));

    const [first, second, third] = store.read(splitter.streamId).map((e) => e.event.metadata);
    expect(first).toEqual({
      eventId: "id-2",
      timestamp: NOW,
      actor: OWNER,
      correlationId: "id-1",
      source: "registry",
    });
    expect(second?.correlationId).toBe("id-1");
    expect(third).toMatchObject({ actor: "funder", correlationId: "id-4", source: "pool" });
  });

  it("publishes nothing for a failed initialize", () => {
    caught(() => splitter.initialize(OWNER, ["p1", "p1"], [1, 1]));
    expect(store.globalPosition()).toBe(0);
  });

  it("publishes nothing for a failed release", () => {
    splitter.initialize(OWNER, ["p1"], [1]);
    splitter.receive("funder", units("10"));
    transfer.failFor.add("p1");

    caught(() => splitter.release("p1", "p1"));

    expect(types()).not.toContain(SPLITTER_EVENTS.PAYMENT_RELEASED);
  });

  it("publishes the reimbursements completed before a failure", () => {
    splitter.addProjectFees(OWNER, "i1", units("10"));
    splitter.addProjectFees(OWNER, "i2", units("10"));
    splitter.receive("funder", units("20"));
    transfer.failFor.add("i2");

    caught(() => splitter.reimburseProjectFees(OWNER));

    const reimbursed = store
      .read(splitter.streamId)
      .filter((e) => e.event.type === SPLITTER_EVENTS.INVESTOR_REIMBURSED);
    expect(reimbursed.map((e) => e.event.payload)).toEqual([
      { investor: "i1", amount: units("10"), reference: "ref-1" },
    ]);
  });

  it("records fee additions and ownership changes", () => {
    splitter.addProjectFees(OWNER, "i1", units("4"));
    splitter.addProjectFees(OWNER, "i1", units("6"));
    splitter.transferOwnership(OWNER, "next");

    const events = store.read(splitter.streamId).map((e) => e.event);
    expect(events[1]?.payload).toEqual({ investor: "i1", amount: units("6"), feeOwed: units("10") });
    expect(events[2]).toMatchObject({
      type: SPLITTER_EVENTS.OWNERSHIP_TRANSFERRED,
      payload: { previousOwner: OWNER, newOwner: "next" },
    });
  });

  it("keeps the hash chain intact across every kind of call", () => {
    splitter.initialize(OWNER, ["p1", "p2"], [2, 3]);
    splitter.addProjectFees(OWNER, "i1", units("5"));
    splitter.receive("funder", units("55"));
    splitter.reimburseProjectFees(OWNER);
    splitter.release("p2", "p2");
    splitter.transferOwnership(OWNER, "next");

    expect(store.verifyIntegrity()).toEqual({
      valid: true,
      lastVerifiedPosition: 7,
      errors: [],
    });
  });
});

// =============================================================================
// Refused notifications
// =============================================================================

/** A store whose disk writes fail while `failing` is set. */
class FlakyStore extends InMemoryEventStore {
  failing = false;

  constructor() {
    super({ catalog: createSplitterCatalog() });
  }

  protected override persist(_events: readonly StoredEvent[]): void {
    if (this.failing) {
      throw new Error("disk full");
    }
  }
}

describe("publish failures", () => {
  it("keeps a committed release when the store rejects its payload", () => {
    const blank: AssetTransfer = { transfer: () => ({ ok: true, reference: "" }) };
    const store = new InMemoryEventStore({ catalog: createSplitterCatalog() });
    const onPublishError = vi.fn();
    const splitter = makeSplitter(blank, store, onPublishError);
    splitter.initialize(OWNER, ["p1", "p2"], [1, 3]);
    splitter.receive("funder", units("100"));

    const release = splitter.release("p1", "p1");

    expect(release).toEqual({ to: "p1", amount: units("25"), reference: "" });
    expect(splitter.released("p1")).toEqual(units("25"));
    expect(splitter.poolBalance()).toEqual(units("75"));
    expect(store.read(splitter.streamId).map((e) => e.event.type)).toEqual([
      SPLITTER_EVENTS.PAYEE_ADDED,
      SPLITTER_EVENTS.PAYEE_ADDED,
      SPLITTER_EVENTS.PAYMENT_RECEIVED,
    ]);

    const [failure] = splitter.publishFailures();
    expect(failure?.events.map((e) => e.type)).toEqual([SPLITTER_EVENTS.PAYMENT_RELEASED]);
    expect(failure?.reason).toMatch(/^INVALID_EVENT: /);
    expect(failure?.at).toBe(NOW);
    expect(onPublishError).toHaveBeenCalledTimes(1);
    expect(onPublishError).toHaveBeenCalledWith(failure);
  });

  it("publishes the valid events of a batch that holds a refused one", () => {
    const references = ["ref-1", ""];
    const transfer: AssetTransfer = {
      transfer: () => ({ ok: true, reference: references.shift() ?? "ref-x" }),
    };
    const store = new InMemoryEventStore({ catalog: createSplitterCatalog() });
    const splitter = makeSplitter(transfer, store);
    splitter.addProjectFees(OWNER, "i1", units("10"));
    splitter.addProjectFees(OWNER, "i2", units("10"));
    splitter.receive("funder", units("20"));

    expect(splitter.reimburseProjectFees(OWNER)).toHaveLength(2);

    const reimbursed = store
      .read(splitter.streamId)
      .filter((e) => e.event.type === SPLITTER_EVENTS.INVESTOR_REIMBURSED);
    expect(reimbursed.map((e) => e.event.payload)).toEqual([
      { investor: "i1", amount: units("10"), reference: "ref-1" },
    ]);
    expect(splitter.publishFailures()[0]?.events[0]?.payload).toEqual({
      investor: "i2",
      amount: units("10"),
      reference: "",
    });
  });

  it("returns a deposit whose notification could not be written", () => {
    const store = new FlakyStore();
    const splitter = makeSplitter(new RecordingTransfer(), store);
    store.failing = true;

    const deposit = splitter.receive("funder", units("100"));

    expect(deposit.poolBalance).toEqual(units("100"));
    expect(store.globalPosition()).toBe(0);
    expect(splitter.publishFailures()).toEqual([
      {
        streamId: "splitter:test",
        events: [expect.objectContaining({ type: SPLITTER_EVENTS.PAYMENT_RECEIVED })],
        reason: "disk full",
        at: NOW,
      },
    ]);
  });

  it("rethrows the transfer error when the partial batch cannot be written", () => {
    const store = new FlakyStore();
    const transfer = new RecordingTransfer();
    const splitter = makeSplitter(transfer, store);
    splitter.addProjectFees(OWNER, "i1", units("10"));
    splitter.addProjectFees(OWNER, "i2", units("10"));
    splitter.receive("funder", units("20"));
    transfer.failFor.add("i2");
    store.failing = true;

    const err = caught(() => splitter.reimburseProjectFees(OWNER));

    expect(err).toBeInstanceOf(TransferError);
    expect(splitter.feeOwed("i1")).toEqual(units("0"));
    expect(splitter.publishFailures().map((f) => f.events.map((e) => e.type))).toEqual([
      [SPLITTER_EVENTS.INVESTOR_REIMBURSED],
    ]);
  });

  it("reports no failures while the store accepts everything", () => {
    const store = new FlakyStore();
    const splitter = makeSplitter(new RecordingTransfer(), store);
    splitter.initialize(OWNER, ["p1"], [1]);
    splitter.receive("funder", units("5"));

    expect(splitter.publishFailures()).toEqual([]);
    expect(store.streamVersion(splitter.streamId)).toBe(2);
  });
});
