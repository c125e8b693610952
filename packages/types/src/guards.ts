/**
 * Runtime Type Guards
 *
 * Narrowing functions for values crossing a package boundary.
 */

import type { Identity } from "./financial.js";

/**
 * A participant identity is any string with a non-blank character.
 */
export function isIdentity(value: unknown): value is Identity {
  return typeof value === "string" && value.trim().length > 0;
}
