/**
 * API Module
 * @module @capbench/server/api
 */

export * from './responses.js';
export * from './failure.js';
export * from './performance.js';
export * from './reports.js';
export * from './metrics.js';
export * from './dashboard.js';
export {
  createApiRouter,
  createHealthCheck,
  readinessCheck,
  livenessCheck,
  requestLoggingMiddleware,
  errorHandlingMiddleware,
  notFoundHandler,
  type ApiRouterOptions,
  type HealthCheckResponse,
} from './router.js';
