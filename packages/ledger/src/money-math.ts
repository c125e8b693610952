/**
 * @sharepool/ledger: Deterministic monetary arithmetic.
 *
 * Amounts are decimal strings at the edges and scaled bigints inside.
 * "12.5" with decimals=2 is 1250n base units.
 *
 * Rules:
 * - No floating-point operations
 * - Proportional splits round toward zero (floor for non-negative input)
 */

import type { Money } from "@sharepool/types";
import { LedgerError } from "./types.js";

const AMOUNT_PATTERN = /^-?\d+(\.\d+)?$/;

// ─── Scaling ─────────────────────────────────────────────────────────────

/**
 * Parse a decimal string into base units.
 *
 * "100" with decimals=6 → 100000000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();
  if (!AMOUNT_PATTERN.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${amount}"`);
  }

  const negative = trimmed.startsWith("-");
  const [whole = "0", fraction = ""] = (negative ? trimmed.slice(1) : trimmed).split(".");

  if (fraction.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fraction.length)} decimal places, but the currency allows ${String(decimals)}`,
    );
  }

  const units = BigInt(whole + fraction.padEnd(decimals, "0"));
  return negative ? -units : units;
}

/**
 * Render base units as a decimal string with exactly `decimals` places.
 *
 * 2500000n with decimals=6 → "2.500000"
 */
export function formatAmount(units: bigint, decimals: number): string {
  if (decimals === 0) {
    return units.toString();
  }

  const negative = units < 0n;
  const digits = (negative ? -units : units).toString().padStart(decimals + 1, "0");
  const cut = digits.length - decimals;
  const rendered = `${digits.slice(0, cut)}.${digits.slice(cut)}`;

  return negative ? `-${rendered}` : rendered;
}

/**
 * Wrap base units as Money.
 */
export function toMoney(units: bigint, currency: string, decimals: number): Money {
  return { amount: formatAmount(units, decimals), currency, decimals };
}

/**
 * Base units of a Money value.
 */
export function unitsOf(money: Money): bigint {
  return parseAmount(money.amount, money.decimals);
}

// ─── Splits ──────────────────────────────────────────────────────────────

/**
 * floor(amount × numerator / denominator) in base units.
 *
 * Used for proportional entitlements: the remainder stays with the caller
 * of the split. Amount and numerator must be non-negative.
 */
export function proportionalShare(
  amount: bigint,
  numerator: bigint,
  denominator: bigint,
): bigint {
  if (denominator <= 0n) {
    throw new LedgerError("INVALID_AMOUNT", "Share denominator must be positive");
  }
  if (amount < 0n || numerator < 0n) {
    throw new LedgerError("INVALID_AMOUNT", "Proportional share of a negative amount");
  }
  return (amount * numerator) / denominator;
}
