/**
 * Request logging middleware.
 *
 * Hands one entry per request to a callback; the entry point feeds it to
 * pino, tests leave it out.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { AuthContext } from "../types/auth.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** Resolved caller, absent on unauthenticated routes */
  readonly caller?: string | undefined;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();

    await next();

    // Unset on routes that skip the auth middleware
    const caller: AuthContext | undefined = c.get("caller");
    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - start),
      requestId: c.get("requestId"),
      caller: caller?.identity,
    });
  };
}
