/**
 * Caller identification middleware.
 *
 * With API keys configured, X-Api-Key must name a known key and the
 * caller is the identity it maps to. Without keys, the caller is read
 * from X-Caller-Id (development and tests).
 *
 * On success, sets `c.set("caller", authContext)`. On failure, 401.
 */

import type { MiddlewareHandler } from "hono";
import { isIdentity } from "@sharepool/types";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, AuthContext } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const CALLER_ID_HEADER = "X-Caller-Id";

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

export function authMiddleware(config?: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    let caller: AuthContext | undefined;

    if (config !== undefined) {
      const apiKey = c.req.header(API_KEY_HEADER);
      if (apiKey === undefined) {
        return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
      }
      const record = config.apiKeys.get(apiKey);
      if (record === undefined) {
        return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
      }
      caller = { type: "api-key", identity: record.identity };
    } else {
      const header = c.req.header(CALLER_ID_HEADER)?.trim();
      if (header === undefined || !isIdentity(header)) {
        return c.json(
          createErrorEnvelope("UNAUTHORIZED", `${CALLER_ID_HEADER} header required`),
          401,
        );
      }
      caller = { type: "header", identity: header };
    }

    c.set("caller", caller);
    return next();
  };
}

/**
 * Build the key map from parsed API_KEYS records.
 */
export function createAuthConfig(records: readonly ApiKeyRecord[]): AuthConfig {
  return { apiKeys: new Map(records.map((r) => [r.key, r])) };
}
