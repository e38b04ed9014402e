/**
 * Rate Limiting Middleware
 *
 * express-rate-limit with the in-memory store (per process):
 * - Global: All endpoints except /health
 * - User mutations: Stricter limit for POST /user and DELETE /user/:username
 *
 * Clients are keyed by req.ip, which honours X-Forwarded-For only when
 * TRUST_PROXY is enabled (see app.ts).
 */

import rateLimit from 'express-rate-limit';
import { RATE_LIMITS } from '@/config/businessRules';
import { logger } from '@/adapters/logging/LoggerFactory';

/**
 * Global rate limiter for all endpoints
 */
export const globalRateLimiter = rateLimit({
  windowMs: RATE_LIMITS.GLOBAL.WINDOW_MS,
  limit: RATE_LIMITS.GLOBAL.MAX_REQUESTS,
  message: {
    message: `Too many requests. Please try again later. Limit: ${RATE_LIMITS.GLOBAL.MAX_REQUESTS} requests per minute.`,
  },
  standardHeaders: true, // Return rate limit info in `RateLimit-*` headers
  legacyHeaders: false, // Disable `X-RateLimit-*` headers
  // Skip rate limiting for health checks
  skip: (req) => req.path === '/health',
});

/**
 * Stricter rate limiter for creating and deleting users
 */
export const userMutationRateLimiter = rateLimit({
  windowMs: RATE_LIMITS.USER_MUTATIONS.WINDOW_MS,
  limit: RATE_LIMITS.USER_MUTATIONS.MAX_REQUESTS,
  message: {
    message: `Too many user changes. Please slow down. Limit: ${RATE_LIMITS.USER_MUTATIONS.MAX_REQUESTS} requests per minute.`,
  },
  standardHeaders: true,
  legacyHeaders: false,
  // Log when rate limit is hit for monitoring
  handler: (req, res, _next, options) => {
    logger.warn(
      {
        type: 'RATE_LIMIT_EXCEEDED',
        method: req.method,
        path: req.path,
        ip: req.ip,
        limit: RATE_LIMITS.USER_MUTATIONS.MAX_REQUESTS,
      },
      'Rate limit exceeded'
    );
    res.status(options.statusCode).json(options.message);
  },
});
