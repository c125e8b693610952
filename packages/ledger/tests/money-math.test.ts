/**
 * Tests for the base-unit money math.
 */

import { describe, it, expect } from "vitest";
import type { Money } from "@sharepool/types";
import {
  parseAmount,
  formatAmount,
  toMoney,
  unitsOf,
  proportionalShare,
} from "../src/money-math.js";
import { LedgerError } from "../src/types.js";

function usdc(amount: string): Money {
  return { amount, currency: "USDC", decimals: 6 };
}

// ─── parseAmount ─────────────────────────────────────────────────────────

describe("parseAmount", () => {
  it("scales a whole number", () => {
    expect(parseAmount("100", 6)).toBe(100_000_000n);
  });

  it("scales a decimal number", () => {
    expect(parseAmount("100.50", 2)).toBe(10050n);
  });

  it("pads a short fractional part", () => {
    expect(parseAmount("1.5", 6)).toBe(1_500_000n);
  });

  it("parses negatives", () => {
    expect(parseAmount("-50.25", 2)).toBe(-5025n);
  });

  it("accepts surrounding whitespace", () => {
    expect(parseAmount(" 7 ", 0)).toBe(7n);
  });

  it("rejects more fractional digits than the scale allows", () => {
    expect(() => parseAmount("1.123", 2)).toThrow(/3 decimal places/);
  });

  it("rejects malformed strings", () => {
    for (const bad of ["", "abc", "1.", ".5", "1e6", "1,000"]) {
      expect(() => parseAmount(bad, 6)).toThrow(LedgerError);
    }
  });
});

// ─── formatAmount ────────────────────────────────────────────────────────

describe("formatAmount", () => {
  it("renders zero decimals without a point", () => {
    expect(formatAmount(25n, 0)).toBe("25");
  });

  it("pads small values", () => {
    expect(formatAmount(5n, 6)).toBe("0.000005");
  });

  it("renders negatives", () => {
    expect(formatAmount(-5025n, 2)).toBe("-50.25");
  });

  it("toMoney wraps units with currency and scale", () => {
    expect(toMoney(25_000_000n, "USDC", 6)).toEqual(usdc("25.000000"));
  });

  it("unitsOf reads money back into base units", () => {
    expect(unitsOf(usdc("12.5"))).toBe(12_500_000n);
  });
});

// ─── Splits ──────────────────────────────────────────────────────────────

describe("proportionalShare", () => {
  it("splits exactly when divisible", () => {
    expect(proportionalShare(100n, 1n, 4n)).toBe(25n);
    expect(proportionalShare(100n, 3n, 4n)).toBe(75n);
  });

  it("floors the remainder", () => {
    expect(proportionalShare(10n, 1n, 3n)).toBe(3n);
    expect(proportionalShare(11n, 2n, 3n)).toBe(7n);
  });

  it("rejects a non-positive denominator", () => {
    expect(() => proportionalShare(10n, 1n, 0n)).toThrow(/denominator/);
  });

  it("rejects negative inputs", () => {
    expect(() => proportionalShare(-10n, 1n, 3n)).toThrow(/negative/);
  });
});
