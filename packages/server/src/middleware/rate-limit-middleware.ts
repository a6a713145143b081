/**
 * Rate Limiting Middleware
 *
 * Protects the infrastructure-mutating endpoints from bursts of requests.
 * Uses express-rate-limit with configurable windows and limits.
 *
 * @module @capbench/server/middleware/rate-limit-middleware
 */

import type { Request, Response } from 'express';
import rateLimit, { type Options, type RateLimitRequestHandler } from 'express-rate-limit';
import { createServiceLogger } from '@capbench/shared';
import { correlationIdOf } from '../api/responses.js';

const logger = createServiceLogger({}, { component: 'rate-limit' });

/**
 * Rate limit configuration options
 */
export interface RateLimitConfig {
  /** Window duration in milliseconds (default: 1 minute) */
  windowMs?: number;
  /** Maximum requests per window (default: 30) */
  max?: number;
  /** Message to send when rate limit is exceeded */
  message?: string;
  /** Skip rate limiting for certain requests */
  skip?: (req: Request) => boolean;
}

const DEFAULT_CONFIG: Required<Pick<RateLimitConfig, 'windowMs' | 'max' | 'message'>> = {
  windowMs: 60 * 1000,
  max: 30,
  message: 'Too many requests, please try again later',
};

/**
 * Create a rate limiting middleware with the given configuration
 */
export function createRateLimitMiddleware(config: RateLimitConfig = {}): RateLimitRequestHandler {
  const message = config.message ?? DEFAULT_CONFIG.message;

  const handler = (req: Request, res: Response): void => {
    logger.warn('Rate limit exceeded', {
      correlationId: correlationIdOf(res),
      ip: req.ip,
      method: req.method,
      path: req.path,
    });
    res.status(429).json({
      success: false,
      error: {
        code: 'RATE_LIMIT_EXCEEDED',
        message,
        retryAfter: res.getHeader('Retry-After'),
      },
    });
  };

  const options: Partial<Options> = {
    windowMs: config.windowMs ?? DEFAULT_CONFIG.windowMs,
    limit: config.max ?? DEFAULT_CONFIG.max,
    standardHeaders: true,
    legacyHeaders: false,
    handler,
    ...(config.skip !== undefined && { skip: config.skip }),
  };

  logger.debug('Rate limit middleware configured', { windowMs: options.windowMs, max: options.limit });
  return rateLimit(options);
}
