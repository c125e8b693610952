/**
 * Middleware barrel: re-exports all middleware.
 */

export { handleError, STATUS_MAP } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { readBody, readQuery, formatZodErrors } from "./validate.js";
export {
  authMiddleware,
  createAuthConfig,
  API_KEY_HEADER,
  CALLER_ID_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
