/**
 * Performance benchmark type definitions
 * @module @capbench/shared/types/benchmark
 */

import type { StoreId } from './store.js';

/**
 * Requested consistency level (recorded with the run)
 */
export type ConsistencyLevel = 'eventual' | 'strong' | 'session';

/**
 * Workload mix
 */
export type BenchmarkTestType = 'mixed' | 'read' | 'write' | 'update';

/**
 * Timed operation kinds
 */
export type OperationKind = 'insert' | 'read' | 'update';

export const ALL_CONSISTENCY_LEVELS: readonly ConsistencyLevel[] = ['eventual', 'strong', 'session'] as const;
export const ALL_TEST_TYPES: readonly BenchmarkTestType[] = ['mixed', 'read', 'write', 'update'] as const;
export const ALL_OPERATION_KINDS: readonly OperationKind[] = ['insert', 'read', 'update'] as const;

/**
 * Limits for benchmark configuration
 */
export const BENCHMARK_LIMITS = {
  minOperationCount: 1,
  maxOperationCount: 10_000,
  minBatchSize: 1,
  maxBatchSize: 1_000,
} as const;

/**
 * Benchmark configuration
 */
export interface BenchmarkConfig {
  operationCount: number;
  batchSize: number;
  /**
   * Labels the run in results and reports. The drivers keep their own
   * connection-level read and write settings whatever the value.
   */
  consistencyLevel: ConsistencyLevel;
  testType: BenchmarkTestType;
}

/**
 * Defaults applied to omitted fields
 */
export const DEFAULT_BENCHMARK_CONFIG: BenchmarkConfig = {
  operationCount: 1000,
  batchSize: 100,
  consistencyLevel: 'eventual',
  testType: 'mixed',
};

/**
 * Synthetic fixed-schema record
 */
export interface BenchmarkRecord {
  [column: string]: string | number;
  id: string;
  name: string;
  status: string;
  type: string;
  value: number;
  timestamp: string;
}

/**
 * Latency series in seconds, one entry per successful batch
 */
export type LatencySeries = Record<OperationKind, number[]>;

/**
 * Benchmark outcome for one store
 */
export interface BenchmarkResult {
  store: StoreId;
  latenciesByOp: LatencySeries;
  throughputOpsPerSec: number;
  errorCount: number;
  batchCount: number;
  totalTimeSeconds: number;
  /** False when the store task itself failed */
  success: boolean;
  error?: string;
}

/**
 * Latency statistics for one operation kind
 */
export interface LatencyStats {
  count: number;
  mean: number;
  p50: number;
  p95: number;
  max: number;
}

/**
 * Outcome of a benchmark run across both stores
 */
export interface BenchmarkRun {
  config: BenchmarkConfig;
  results: Record<StoreId, BenchmarkResult>;
  startedAt: Date;
  completedAt: Date;
}
