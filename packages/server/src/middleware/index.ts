/**
 * Middleware Module
 *
 * Re-exports all middleware for the server
 * @module @capbench/server/middleware
 */

// Rate Limiting Middleware
export {
  createRateLimitMiddleware,
  type RateLimitConfig,
} from './rate-limit-middleware.js';

// Request Statistics Middleware
export { categorizePath, createRequestStatsMiddleware } from './request-stats-middleware.js';
