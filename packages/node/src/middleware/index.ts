/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, STATUS_MAP } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry, RequestLogLevel } from "./logger.js";
export { validateBody, validationFailed } from "./validate.js";
export type { ValidatedBodyEnv } from "./validate.js";
export { authMiddleware, requirePermission, API_KEY_HEADER } from "./auth.js";
export type { AuthConfig } from "./auth.js";
