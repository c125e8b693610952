/**
 * Tests for JournalTransfer: the journal-backed AssetTransfer.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { Money } from "@sharepool/types";
import { Journal } from "../src/journal.js";
import { JournalTransfer, CUSTODY_ACCOUNT_ID } from "../src/journal-transfer.js";
import { LedgerError } from "../src/types.js";

function units(amount: string): Money {
  return { amount, currency: "UNIT", decimals: 0 };
}

describe("JournalTransfer", () => {
  let journal: Journal;
  let transfer: JournalTransfer;

  beforeEach(() => {
    journal = new Journal("UNIT", 0);
    transfer = new JournalTransfer(journal);
  });

  it("opens the custody account", () => {
    expect(journal.hasAccount(CUSTODY_ACCOUNT_ID)).toBe(true);
    expect(transfer.custodyUnits()).toBe(0n);
  });

  it("books deposits into custody", () => {
    const id = transfer.deposit("alice", units("100"));

    expect(id).toBe("deposit-1");
    expect(transfer.custodyUnits()).toBe(100n);
    expect(journal.balance("contribution:alice").units).toBe(100n);
  });

  it("moves value out of custody and returns a reference", () => {
    transfer.deposit("alice", units("100"));

    const result = transfer.transfer("bob", units("25"));

    expect(result).toEqual({ ok: true, reference: "transfer-2" });
    expect(transfer.custodyUnits()).toBe(75n);
    expect(transfer.paidTo("bob")).toBe(25n);
    expect(journal.entries("payout:bob")[0]?.reference).toBe("transfer-2");
  });

  it("refuses to overdraw custody and posts nothing", () => {
    transfer.deposit("alice", units("10"));

    const result = transfer.transfer("bob", units("11"));

    expect(result).toEqual({ ok: false, reason: "Custody holds 10 base units, 11 requested" });
    expect(journal.transactions()).toHaveLength(1);
    expect(transfer.paidTo("bob")).toBe(0n);
  });

  it("refuses a non-positive amount", () => {
    const result = transfer.transfer("bob", units("0"));
    expect(result.ok).toBe(false);
  });

  it("refuses another currency", () => {
    transfer.deposit("alice", units("10"));
    const result = transfer.transfer("bob", { amount: "1", currency: "USDC", decimals: 0 });
    expect(result).toEqual({ ok: false, reason: "Custody holds UNIT/0, not USDC/0" });
  });

  it("rejects deposits in another currency", () => {
    expect(() => transfer.deposit("alice", { amount: "1", currency: "USDC", decimals: 6 })).toThrow(
      LedgerError,
    );
  });

  it("continues numbering after a restored journal", () => {
    transfer.deposit("alice", units("5"));
    const restored = new JournalTransfer(Journal.fromSnapshot(journal.snapshot()));

    expect(restored.deposit("carol", units("1"))).toBe("deposit-2");
    expect(restored.custodyUnits()).toBe(6n);
  });
});
