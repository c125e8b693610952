/**
 * Share Registry: payees and their share weights.
 *
 * Written exactly once by `initialize`; afterwards only each payee's
 * `released` total moves, and only upward.
 *
 * Invariants:
 * - totalShares equals the sum of all payee shares
 * - An identity is registered at most once
 * - Payees keep their registration order
 */

import { isIdentity } from "@sharepool/types";
import type { Identity } from "@sharepool/types";
import { SPLITTER_EVENTS } from "@sharepool/event-store";
import { requireAuthorized } from "./authorization.js";
import type { AuthorizationGate } from "./authorization.js";
import type { Denomination } from "./denomination.js";
import { StateError, ValidationError } from "./errors.js";
import type { Notify, Payee } from "./types.js";

interface PayeeState {
  readonly identity: Identity;
  readonly shares: number;
  released: bigint;
}

export class ShareRegistry {
  private readonly payees: PayeeState[] = [];
  private readonly byIdentity = new Map<Identity, PayeeState>();
  private _totalShares = 0;
  private _initialized = false;

  constructor(
    private readonly gate: AuthorizationGate,
    private readonly denomination: Denomination,
    private readonly notify: Notify,
  ) {}

  // ───────────────────────────────────────────────────────────────────────
  // Commands
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Register every payee. Owner only, and only once: any later call fails
   * with ALREADY_INITIALIZED before its arguments are looked at. If one
   * pair is rejected, none of the pairs is kept.
   */
  initialize(
    caller: Identity,
    identities: readonly Identity[],
    shareWeights: readonly number[],
  ): readonly Payee[] {
    requireAuthorized(this.gate, caller, "initialize the registry");
    if (this._initialized) {
      throw new StateError("ALREADY_INITIALIZED", "Registry is already initialized");
    }
    if (identities.length !== shareWeights.length) {
      throw new ValidationError(
        "LENGTH_MISMATCH",
        `Got ${String(identities.length)} identities and ${String(shareWeights.length)} share weights`,
      );
    }
    if (identities.length === 0) {
      throw new ValidationError("NO_PAYEES", "At least one payee is required");
    }

    try {
      identities.forEach((identity, i) => {
        this.addPayee(identity, shareWeights[i]);
      });
    } catch (err) {
      this.payees.length = 0;
      this.byIdentity.clear();
      this._totalShares = 0;
      throw err;
    }

    this._initialized = true;
    return this.listPayees();
  }

  /**
   * Credit a payment to a registered payee.
   */
  recordRelease(identity: Identity, units: bigint): void {
    const payee = this.byIdentity.get(identity);
    if (payee === undefined) {
      throw new ValidationError("NO_SHARES", `"${identity}" holds no shares`);
    }
    payee.released += units;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  isInitialized(): boolean {
    return this._initialized;
  }

  totalShares(): number {
    return this._totalShares;
  }

  /** 0 for an unknown identity. */
  shares(identity: Identity): number {
    return this.byIdentity.get(identity)?.shares ?? 0;
  }

  releasedUnits(identity: Identity): bigint {
    return this.byIdentity.get(identity)?.released ?? 0n;
  }

  payeeAt(index: number): Payee {
    const payee = Number.isInteger(index) && index >= 0 ? this.payees[index] : undefined;
    if (payee === undefined) {
      throw new ValidationError(
        "INDEX_OUT_OF_RANGE",
        `Payee index ${String(index)} is out of range (${String(this.payees.length)} payees)`,
      );
    }
    return this.view(payee);
  }

  listPayees(): readonly Payee[] {
    return this.payees.map((p) => this.view(p));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot support
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Load a previously exported registry into an empty one.
   */
  restore(payees: readonly Payee[], initialized: boolean): void {
    if (this.payees.length > 0 || this._initialized) {
      throw new StateError("INVALID_SNAPSHOT", "Registry already holds state");
    }
    if (initialized !== payees.length > 0) {
      throw new StateError(
        "INVALID_SNAPSHOT",
        initialized ? "An initialized registry needs payees" : "Payees present before initialization",
      );
    }
    for (const payee of payees) {
      this.insert(payee.identity, payee.shares);
      this.recordRelease(payee.identity, this.denomination.units(payee.released));
    }
    this._initialized = initialized;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private addPayee(identity: Identity, shareWeight: number | undefined): void {
    this.insert(identity, shareWeight);
    this.notify(SPLITTER_EVENTS.PAYEE_ADDED, { identity, shares: this.shares(identity) });
  }

  private insert(identity: Identity, shareWeight: number | undefined): void {
    if (!isIdentity(identity)) {
      throw new ValidationError("INVALID_IDENTITY", "Payee identity must be non-empty");
    }
    if (
      shareWeight === undefined ||
      !Number.isSafeInteger(shareWeight) ||
      shareWeight <= 0 ||
      !Number.isSafeInteger(this._totalShares + shareWeight)
    ) {
      throw new ValidationError(
        "INVALID_SHARES",
        `Share weight for "${identity}" must be a positive integer, got ${String(shareWeight)}`,
      );
    }
    if (this.byIdentity.has(identity)) {
      throw new ValidationError("DUPLICATE_PAYEE", `"${identity}" is already a payee`);
    }

    const payee: PayeeState = { identity, shares: shareWeight, released: 0n };
    this.payees.push(payee);
    this.byIdentity.set(identity, payee);
    this._totalShares += shareWeight;
  }

  private view(payee: PayeeState): Payee {
    return {
      identity: payee.identity,
      shares: payee.shares,
      released: this.denomination.money(payee.released),
    };
  }
}
