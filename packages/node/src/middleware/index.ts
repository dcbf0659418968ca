/**
 * Middleware barrel - re-exports all middleware.
 */

export { createErrorHandler, statusForKind } from "./error-handler.js";
export type { UnexpectedErrorSink } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, formatZodErrors } from "./validate.js";
export type { ValidatedBodyEnv } from "./validate.js";
export { callerMiddleware, API_KEY_HEADER, CALLER_ID_HEADER } from "./caller.js";
export type { CallerConfig } from "./caller.js";
