/**
 * The single currency and scale a splitter accounts in.
 *
 * Converts boundary Money to base units and back, rejecting anything in
 * another currency or scale.
 */

import { LedgerError, parseAmount, toMoney } from "@sharepool/ledger";
import type { Money } from "@sharepool/types";
import { ValidationError } from "./errors.js";

export class Denomination {
  constructor(
    public readonly currency: string,
    public readonly decimals: number,
  ) {
    if (currency.trim() === "") {
      throw new ValidationError("CURRENCY_MISMATCH", "Currency must be a non-empty string");
    }
    if (!Number.isInteger(decimals) || decimals < 0) {
      throw new ValidationError(
        "CURRENCY_MISMATCH",
        `Decimals must be a non-negative integer, got ${String(decimals)}`,
      );
    }
  }

  money(units: bigint): Money {
    return toMoney(units, this.currency, this.decimals);
  }

  zero(): Money {
    return this.money(0n);
  }

  /**
   * Base units of a strictly positive amount in this denomination.
   */
  positiveUnits(amount: Money): bigint {
    const units = this.units(amount);
    if (units <= 0n) {
      throw new ValidationError("INVALID_AMOUNT", `Amount must be positive, got ${amount.amount}`);
    }
    return units;
  }

  /**
   * Base units of any amount in this denomination.
   */
  units(amount: Money): bigint {
    if (amount.currency !== this.currency || amount.decimals !== this.decimals) {
      throw new ValidationError(
        "CURRENCY_MISMATCH",
        `Expected ${this.currency}/${String(this.decimals)}, got ${amount.currency}/${String(amount.decimals)}`,
      );
    }
    try {
      return parseAmount(amount.amount, amount.decimals);
    } catch (err) {
      if (err instanceof LedgerError) {
        throw new ValidationError("INVALID_AMOUNT", err.message);
      }
      throw err;
    }
  }
}
