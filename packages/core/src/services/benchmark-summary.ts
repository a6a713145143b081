/**
 * Aggregation of benchmark results
 * @module @capbench/core/services/benchmark-summary
 */

import type { BenchmarkRun, LatencyStats, OperationKind, StoreId } from '@capbench/shared';
import { mean, percentile, round } from '@capbench/shared';

/**
 * Run-level totals
 */
export interface BenchmarkSummary {
  totalOps: number;
  errors: number;
  totalBatches: number;
  /** Failed batches over all batches, 0..1 */
  errorRate: number;
  failedStores: StoreId[];
}

/**
 * Statistics over one latency series (seconds)
 */
export function latencyStats(series: readonly number[]): LatencyStats {
  return {
    count: series.length,
    mean: mean(series),
    p50: percentile(series, 50),
    p95: percentile(series, 95),
    max: series.length > 0 ? Math.max(...series) : 0,
  };
}

/**
 * Latency statistics per store per operation kind
 */
export function latencyStatsByStore(run: BenchmarkRun): Record<StoreId, Record<OperationKind, LatencyStats>> {
  const byStore: Record<StoreId, Record<OperationKind, LatencyStats>> = {};
  for (const [store, result] of Object.entries(run.results)) {
    byStore[store] = {
      insert: latencyStats(result.latenciesByOp.insert),
      read: latencyStats(result.latenciesByOp.read),
      update: latencyStats(result.latenciesByOp.update),
    };
  }
  return byStore;
}

export function summarizeBenchmark(run: BenchmarkRun): BenchmarkSummary {
  const results = Object.values(run.results);
  const errors = results.reduce((sum, result) => sum + result.errorCount, 0);
  const totalBatches = results.reduce((sum, result) => sum + result.batchCount, 0);
  return {
    totalOps: run.config.operationCount,
    errors,
    totalBatches,
    errorRate: totalBatches > 0 ? round(errors / totalBatches, 4) : 0,
    failedStores: results.filter((result) => !result.success).map((result) => result.store),
  };
}

/**
 * Mean latency of one operation kind for every store
 */
export function meanLatencies(run: BenchmarkRun, kind: OperationKind): Record<StoreId, number> {
  const means: Record<StoreId, number> = {};
  for (const [store, result] of Object.entries(run.results)) {
    means[store] = mean(result.latenciesByOp[kind]);
  }
  return means;
}
