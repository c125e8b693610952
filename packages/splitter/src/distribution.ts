/**
 * Distribution Engine: pull-based proportional withdrawals.
 *
 *   totalReceived = poolBalance + totalReleased
 *   entitlement   = floor(totalReceived × shares / totalShares)
 *   payment       = entitlement − released
 *
 * Rules:
 * - Only the payee itself can pull its payment
 * - Remainders of the floor stay in the pool for later calls
 * - Nothing changes unless the transfer succeeds
 */

import { proportionalShare } from "@sharepool/ledger";
import type { AssetTransfer, Identity, Money } from "@sharepool/types";
import { SPLITTER_EVENTS } from "@sharepool/event-store";
import type { Denomination } from "./denomination.js";
import { AuthorizationError, EconomicError, StateError, ValidationError } from "./errors.js";
import type { PooledBalance } from "./pool.js";
import type { ShareRegistry } from "./share-registry.js";
import { executeTransfer } from "./transfer.js";
import type { Notify, Release } from "./types.js";

export class DistributionEngine {
  private _totalReleased = 0n;

  constructor(
    private readonly registry: ShareRegistry,
    private readonly pool: PooledBalance,
    private readonly transfer: AssetTransfer,
    private readonly denomination: Denomination,
    private readonly notify: Notify,
  ) {}

  /**
   * Pay `identity` everything it has accrued and not yet withdrawn.
   */
  release(caller: Identity, identity: Identity): Release {
    if (caller !== identity) {
      throw new AuthorizationError("NOT_SELF", `"${caller}" cannot release payments for "${identity}"`);
    }
    if (!this.registry.isInitialized()) {
      throw new StateError("NOT_INITIALIZED", "No payees have been registered yet");
    }
    if (this.registry.shares(identity) === 0) {
      throw new ValidationError("NO_SHARES", `"${identity}" holds no shares`);
    }

    const payment = this.paymentUnits(identity);
    // Reimbursements draw the pool down, so the formula can go negative.
    if (payment <= 0n) {
      throw new EconomicError("NO_PAYMENT_DUE", `"${identity}" is not due any payment`);
    }
    if (payment > this.pool.units) {
      throw new EconomicError(
        "INSUFFICIENT_BALANCE",
        `Payment of ${String(payment)} base units exceeds the pool of ${String(this.pool.units)}`,
      );
    }

    const amount = this.denomination.money(payment);
    const reference = executeTransfer(this.transfer, identity, amount);

    this.registry.recordRelease(identity, payment);
    this._totalReleased += payment;
    this.pool.debit(payment);

    this.notify(SPLITTER_EVENTS.PAYMENT_RELEASED, { to: identity, amount, reference });
    return { to: identity, amount, reference };
  }

  /**
   * What `release` would pay right now; zero when it would fail.
   */
  pendingPayment(identity: Identity): Money {
    if (this.registry.shares(identity) === 0) {
      return this.denomination.zero();
    }
    const payment = this.paymentUnits(identity);
    if (payment <= 0n || payment > this.pool.units) {
      return this.denomination.zero();
    }
    return this.denomination.money(payment);
  }

  get totalReleasedUnits(): bigint {
    return this._totalReleased;
  }

  get totalReceivedUnits(): bigint {
    return this.pool.units + this._totalReleased;
  }

  /** Snapshot support: the sum already paid to payees. */
  restore(totalReleased: bigint): void {
    this._totalReleased = totalReleased;
  }

  private paymentUnits(identity: Identity): bigint {
    const entitlement = proportionalShare(
      this.totalReceivedUnits,
      BigInt(this.registry.shares(identity)),
      BigInt(this.registry.totalShares()),
    );
    return entitlement - this.registry.releasedUnits(identity);
  }
}
