/**
 * AgroCarbon - Rate Limiting Middleware
 */

import rateLimit from 'express-rate-limit';

export interface RateLimitOptions {
  /** Max requests per 15 min per IP for the whole API (default 100) */
  apiMax?: number;
  /** Max estimates per minute per IP (default 30) */
  estimateMax?: number;
}

/**
 * Limiters are created per app so each app instance has its own memory store
 */
export function createRateLimiters(options: RateLimitOptions = {}) {
  /**
   * General API rate limiter (more permissive)
   */
  const apiLimiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minuter
    max: options.apiMax ?? 100,
    message: {
      success: false,
      error: 'Too many requests. Try again in 15 minutes.',
      code: 'RATE_LIMIT_EXCEEDED'
    },
    standardHeaders: true,
    legacyHeaders: false,
  });

  /**
   * Stricter limiter for the estimate endpoint
   */
  const estimateLimiter = rateLimit({
    windowMs: 1 * 60 * 1000, // 1 minut
    max: options.estimateMax ?? 30,
    message: {
      success: false,
      error: 'Too many estimate requests. Try again in a minute.',
      code: 'ESTIMATE_RATE_LIMIT_EXCEEDED'
    },
    standardHeaders: true,
    legacyHeaders: false,
  });

  return { apiLimiter, estimateLimiter };
}
