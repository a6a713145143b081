/**
 * Request statistics middleware
 *
 * Counts every request and its duration into the metrics collector under a
 * category derived from the path.
 *
 * @module @capbench/server/middleware/request-stats-middleware
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { MetricsCategory, MetricsCollector } from '@capbench/core';

const PATH_CATEGORIES: Array<[string, MetricsCategory]> = [
  ['/api/failure', 'failure'],
  ['/api/performance', 'performance'],
  ['/api/reports', 'reports'],
  ['/api/dashboard', 'dashboard'],
];

/**
 * Category a request path is counted under
 */
export function categorizePath(path: string): MetricsCategory {
  for (const [prefix, category] of PATH_CATEGORIES) {
    if (path === prefix || path.startsWith(`${prefix}/`)) {
      return category;
    }
  }
  return 'general';
}

export function createRequestStatsMiddleware(
  metrics: MetricsCollector,
  clock: () => number = Date.now,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const startedAt = clock();
    const category = categorizePath(req.originalUrl.split('?')[0] ?? req.path);

    res.on('finish', () => {
      metrics.recordRequest(category, (clock() - startedAt) / 1000);
    });

    next();
  };
}
