/**
 * Pooled balance.
 *
 * Grows with deposits and shrinks only when a release or reimbursement
 * transfer succeeds. Never negative.
 */

import { EconomicError } from "./errors.js";

export class PooledBalance {
  private _units: bigint;

  constructor(units = 0n) {
    this._units = units;
  }

  get units(): bigint {
    return this._units;
  }

  credit(units: bigint): void {
    this._units += units;
  }

  debit(units: bigint): void {
    if (units > this._units) {
      throw new EconomicError(
        "INSUFFICIENT_BALANCE",
        `Pool holds ${String(this._units)} base units, ${String(units)} requested`,
      );
    }
    this._units -= units;
  }
}
