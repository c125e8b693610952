/**
 * Authorization gate.
 *
 * Administrative operations receive the caller identity explicitly and
 * ask the gate; nothing is inherited.
 */

import { isIdentity } from "@sharepool/types";
import type { Identity } from "@sharepool/types";
import { SPLITTER_EVENTS } from "@sharepool/event-store";
import { AuthorizationError, ValidationError } from "./errors.js";
import type { Notify } from "./types.js";

export interface AuthorizationGate {
  isAuthorized(caller: Identity): boolean;
}

/**
 * Throws NOT_OWNER unless the gate authorizes `caller`.
 */
export function requireAuthorized(gate: AuthorizationGate, caller: Identity, action: string): void {
  if (!gate.isAuthorized(caller)) {
    throw new AuthorizationError("NOT_OWNER", `"${caller}" is not allowed to ${action}`);
  }
}

/**
 * A single stored privileged identity.
 */
export class OwnerGate implements AuthorizationGate {
  private _owner: Identity;
  private readonly notify: Notify;

  constructor(owner: Identity, notify: Notify) {
    if (!isIdentity(owner)) {
      throw new ValidationError("INVALID_IDENTITY", "Owner must be a non-empty identity");
    }
    this._owner = owner;
    this.notify = notify;
  }

  owner(): Identity {
    return this._owner;
  }

  isAuthorized(caller: Identity): boolean {
    return caller === this._owner;
  }

  transferOwnership(caller: Identity, newOwner: Identity): void {
    requireAuthorized(this, caller, "transfer ownership");
    if (!isIdentity(newOwner)) {
      throw new ValidationError("INVALID_IDENTITY", "New owner must be a non-empty identity");
    }

    const previousOwner = this._owner;
    this._owner = newOwner;
    this.notify(SPLITTER_EVENTS.OWNERSHIP_TRANSFERRED, { previousOwner, newOwner });
  }
}
