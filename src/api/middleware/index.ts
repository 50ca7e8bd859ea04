/**
 * AgroCarbon - Middleware exports
 */

export { createApiKeyGuard, parseApiKeys } from './auth';
export { createRateLimiters } from './rate-limit';
export type { RateLimitOptions } from './rate-limit';
export { errorHandler, notFound } from './error-handler';
export { requestLogger } from './request-log';
