/**
 * Caller identification types.
 *
 * Two strategies:
 * 1. API key via X-Api-Key header, mapped to an identity
 * 2. X-Caller-Id header, trusted as-is (development and tests only)
 */

import type { Identity } from "@sharepool/types";

export type AuthStrategy = "api-key" | "header";

/**
 * Resolved caller, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: AuthStrategy;
  readonly identity: Identity;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly identity: Identity;
}
