/**
 * Performance testing REST API Endpoints
 * @module @capbench/server/api/performance
 */

import { Router, type Request, type Response, type RequestHandler } from 'express';
import type { BenchmarkRun, ReportSeries, ReportSummary, StoreDefinition } from '@capbench/shared';
import {
  ALL_OPERATION_KINDS,
  createServiceLogger,
  errorMessage,
  formatReportTimestamp,
  validateBenchmarkConfigInput,
} from '@capbench/shared';
import { latencyStatsByStore, meanLatencies, summarizeBenchmark } from '@capbench/core';
import type { AppContext } from '../context.js';
import { requestLoggerFor, sendFailure, sendSuccess, sendValidationError } from './responses.js';

const logger = createServiceLogger({}, { component: 'api-performance' });

/**
 * Mean latency (seconds) of one operation per store
 */
export interface LatencyMetric {
  operation: string;
  [store: string]: string | number;
}

export interface ThroughputMetric {
  db: string;
  throughput: number;
}

export function toLatencyMetrics(run: BenchmarkRun): LatencyMetric[] {
  return ALL_OPERATION_KINDS.map((operation) => {
    const metric: LatencyMetric = { operation };
    for (const [store, latency] of Object.entries(meanLatencies(run, operation))) {
      metric[store] = latency;
    }
    return metric;
  });
}

export function toThroughputMetrics(run: BenchmarkRun, stores: readonly StoreDefinition[]): ThroughputMetric[] {
  return Object.values(run.results).map((result) => ({
    db: stores.find((store) => store.id === result.store)?.label ?? result.store,
    throughput: result.throughputOpsPerSec,
  }));
}

export interface PerformanceHandlers {
  run(req: Request, res: Response): Promise<void>;
  cleanup(req: Request, res: Response): Promise<void>;
}

export function createPerformanceHandlers(ctx: AppContext): PerformanceHandlers {
  /**
   * POST /api/performance/run - Run the benchmark on every store and save a report
   */
  async function run(req: Request, res: Response): Promise<void> {
    const requestLogger = requestLoggerFor(logger, res);

    const validation = validateBenchmarkConfigInput(req.body);
    if (!validation.valid) {
      requestLogger.warn('Benchmark validation failed', { errors: validation.errors });
      sendValidationError(res, validation.errors);
      return;
    }
    const config = validation.value;

    try {
      const benchmark = await ctx.benchmarkRunner.run(config);
      ctx.metrics.increment('benchmarksRun');

      const totals = summarizeBenchmark(benchmark);
      const summary = { totalOps: totals.totalOps, errors: totals.errors, errorRate: totals.errorRate };
      const latencyMetrics = toLatencyMetrics(benchmark);
      const throughputMetrics = toThroughputMetrics(benchmark, ctx.stores);

      const reportSummary: ReportSummary = {
        ...summary,
        batchSize: config.batchSize,
        consistencyLevel: config.consistencyLevel,
        testType: config.testType,
        failedStores: totals.failedStores.join(',') || null,
      };
      const series: ReportSeries[] = [
        { title: 'Latency', rows: latencyMetrics },
        { title: 'Throughput', rows: throughputMetrics.map((metric) => ({ ...metric })) },
      ];

      let report: string | null = null;
      try {
        report = await ctx.reports.save(
          'performance',
          formatReportTimestamp(benchmark.completedAt),
          reportSummary,
          series,
          benchmark.results,
        );
      } catch (error) {
        requestLogger.error('Failed to save performance report', { error: errorMessage(error) });
      }

      requestLogger.info('Benchmark completed', { ...summary, report });
      sendSuccess(res, {
        summary,
        latencyMetrics,
        throughputMetrics,
        detailedResults: {
          config: benchmark.config,
          results: benchmark.results,
          latencyStats: latencyStatsByStore(benchmark),
          failedStores: totals.failedStores,
          totalBatches: totals.totalBatches,
          startedAt: benchmark.startedAt,
          completedAt: benchmark.completedAt,
        },
        report,
      });
    } catch (error) {
      requestLogger.error('Benchmark failed', error instanceof Error ? error : undefined);
      sendFailure(res, error, 'Performance test failed');
    }
  }

  /**
   * POST /api/performance/cleanup - Empty the benchmark tables
   */
  async function cleanup(_req: Request, res: Response): Promise<void> {
    try {
      const stores = await ctx.benchmarkRunner.cleanup();
      const cleaned = Object.values(stores).every((outcome) => outcome.success);
      sendSuccess(res, { message: cleaned ? 'Cleaned successfully' : 'Cleanup incomplete', stores });
    } catch (error) {
      requestLoggerFor(logger, res).error('Cleanup failed', error instanceof Error ? error : undefined);
      sendFailure(res, error, 'Cleanup failed');
    }
  }

  return { run, cleanup };
}

export interface PerformanceRouterOptions {
  mutationLimiter?: RequestHandler;
}

/**
 * Create the performance testing router
 */
export function createPerformanceRouter(ctx: AppContext, options: PerformanceRouterOptions = {}): Router {
  const router = Router();
  const handlers = createPerformanceHandlers(ctx);
  const guard: RequestHandler[] = options.mutationLimiter ? [options.mutationLimiter] : [];

  router.post('/run', ...guard, handlers.run);
  router.post('/cleanup', ...guard, handlers.cleanup);

  return router;
}
