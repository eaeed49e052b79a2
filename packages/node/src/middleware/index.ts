/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, resolveError } from "./error-handler.js";
export type { ResolvedError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { callerMiddleware, CALLER_HEADER } from "./caller.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { parseBody, parseParam } from "./validate.js";
