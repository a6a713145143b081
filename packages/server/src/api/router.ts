/**
 * Central API Router
 *
 * Combines all REST API routes into a single router.
 * @module @capbench/server/api/router
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import { createServiceLogger, generateCorrelationId } from '@capbench/shared';
import type { AppContext } from '../context.js';
import { createRateLimitMiddleware, createRequestStatsMiddleware } from '../middleware/index.js';
import { createDashboardRouter } from './dashboard.js';
import { createFailureRouter } from './failure.js';
import { createMetricsRouter } from './metrics.js';
import { createPerformanceRouter } from './performance.js';
import { createReportsRouter } from './reports.js';
import { correlationIdOf, requestLoggerFor, sendError } from './responses.js';

const logger = createServiceLogger({}, { component: 'api-router' });

/**
 * API router configuration options
 */
export interface ApiRouterOptions {
  /** Enable request logging (default: true) */
  enableLogging?: boolean;
  /** Enable rate limiting of mutating endpoints (default: true outside tests) */
  enableRateLimiting?: boolean;
}

/**
 * Health check response
 */
export interface HealthCheckResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  version: string;
  uptime: number;
  checks: {
    orchestrator: { mode: string };
    scenarios: { active: number };
  };
}

/**
 * Server start time for uptime calculation
 */
const startTime = Date.now();

export function createHealthCheck(ctx: AppContext) {
  /**
   * GET /health - Health check endpoint
   */
  return async function healthCheck(_req: Request, res: Response): Promise<void> {
    const response: HealthCheckResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version ?? '0.1.0',
      uptime: Math.floor((Date.now() - startTime) / 1000),
      checks: {
        orchestrator: { mode: ctx.controller.currentMode() ?? 'pending' },
        scenarios: { active: ctx.registry.activeCount.value },
      },
    };
    requestLoggerFor(logger, res).debug('Health check performed', { status: response.status });
    res.status(200).json(response);
  };
}

/**
 * GET /ready - Readiness check endpoint
 */
export async function readinessCheck(_req: Request, res: Response): Promise<void> {
  res.status(200).json({ ready: true, timestamp: new Date().toISOString() });
}

/**
 * GET /live - Liveness check endpoint
 */
export async function livenessCheck(_req: Request, res: Response): Promise<void> {
  res.status(200).json({ alive: true, timestamp: new Date().toISOString() });
}

/**
 * Request logging middleware
 */
export function requestLoggingMiddleware(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers['x-correlation-id'];
  const correlationId = typeof header === 'string' && header.length > 0 ? header : generateCorrelationId();
  const startedAt = Date.now();

  res.locals.correlationId = correlationId;
  res.setHeader('X-Correlation-ID', correlationId);

  const requestLogger = logger.withCorrelationId(correlationId);
  requestLogger.debug('Incoming request', {
    method: req.method,
    path: req.path,
    ip: req.ip ?? req.socket.remoteAddress,
  });

  res.on('finish', () => {
    const meta = {
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration: Date.now() - startedAt,
    };
    if (res.statusCode >= 400) {
      requestLogger.warn('Request completed', meta);
    } else {
      requestLogger.info('Request completed', meta);
    }
  });

  next();
}

/**
 * Error handling middleware
 */
export function errorHandlingMiddleware(err: Error, req: Request, res: Response, _next: NextFunction): void {
  logger.withCorrelationId(correlationIdOf(res)).error('Unhandled error', err, {
    method: req.method,
    path: req.path,
  });

  const isProduction = process.env.NODE_ENV === 'production';
  sendError(res, 'INTERNAL_ERROR', isProduction ? 'An internal error occurred' : err.message, 500);
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  sendError(res, 'NOT_FOUND', `Route ${req.method} ${req.path} not found`, 404);
}

/**
 * Create the central API router
 */
export function createApiRouter(ctx: AppContext, options: ApiRouterOptions = {}): Router {
  const { enableLogging = true, enableRateLimiting = ctx.config.nodeEnv !== 'test' } = options;

  const router = Router();

  if (enableLogging) {
    router.use(requestLoggingMiddleware);
  }
  router.use(createRequestStatsMiddleware(ctx.metrics));

  router.get('/health', createHealthCheck(ctx));
  router.get('/ready', readinessCheck);
  router.get('/live', livenessCheck);

  const mutationLimiter = enableRateLimiting
    ? createRateLimitMiddleware({ windowMs: ctx.config.rateLimit.windowMs, max: ctx.config.rateLimit.max })
    : undefined;

  const apiRouter = Router();
  apiRouter.use('/failure', createFailureRouter(ctx, { mutationLimiter }));
  apiRouter.use('/performance', createPerformanceRouter(ctx, { mutationLimiter }));
  apiRouter.use('/reports', createReportsRouter(ctx));
  apiRouter.use('/metrics', createMetricsRouter(ctx));
  apiRouter.use('/dashboard', createDashboardRouter(ctx));

  router.use('/api', apiRouter);
  router.use('/api/*', notFoundHandler);
  router.use(errorHandlingMiddleware);

  logger.info('API router initialized', {
    rateLimiting: enableRateLimiting,
    routes: [
      '/health',
      '/ready',
      '/live',
      '/api/failure',
      '/api/performance',
      '/api/reports',
      '/api/metrics',
      '/api/dashboard',
    ],
  });

  return router;
}
