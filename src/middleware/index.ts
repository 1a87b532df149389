export { pipeline } from './pipeline.js';
export type { Handler, HandlerContext, Middleware } from './pipeline.js';
export { errorHandler, createErrorHandler } from './error-handler.js';
export { createAdminAuthMiddleware } from './authenticate.js';
export { bodyLimit, MAX_BODY_BYTES } from './body-limit.js';
export { validateBody, readJsonBody, stringField, booleanField } from './validate-body.js';
export { createRateLimitMiddleware, clientKey, RATE_LIMITS } from './rate-limit.js';
export type { RateLimitConfig } from './rate-limit.js';
export { createLoggingMiddleware } from './logging.js';
