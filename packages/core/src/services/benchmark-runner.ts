/**
 * Concurrent performance benchmark across the stores
 * @module @capbench/core/services/benchmark-runner
 */

import type {
  BenchmarkConfig,
  BenchmarkResult,
  BenchmarkRun,
  LatencySeries,
  OperationKind,
  StoreDriver,
  StoreId,
  StoreResult,
  StoreRow,
} from '@capbench/shared';
import {
  BENCHMARK_TABLE,
  CapbenchError,
  ErrorCode,
  createServiceLogger,
  errorMessage,
  storeFailure,
  type Logger,
} from '@capbench/shared';
import type { TaskPool } from '../probes/task-pool';
import { generateRecords, type RecordGeneratorOptions } from './record-generator';

/**
 * Runner configuration
 */
export interface BenchmarkRunnerConfig {
  drivers: StoreDriver[];
  /** Pool used for blocking drivers */
  pool?: TaskPool;
  /** Monotonic clock in milliseconds */
  clock?: () => number;
  generator?: RecordGeneratorOptions;
  logger?: Logger;
}

/**
 * Teardown outcome for one store
 */
export interface CleanupResult {
  success: boolean;
  error?: string;
}

/**
 * Runs one workload per store as sibling tasks. A failing store yields a
 * failed result for that store only.
 */
export class PerformanceBenchmarkRunner {
  private readonly drivers: StoreDriver[];
  private readonly pool?: TaskPool;
  private readonly clock: () => number;
  private readonly generator: RecordGeneratorOptions;
  private readonly logger: Logger;

  constructor(config: BenchmarkRunnerConfig) {
    this.drivers = config.drivers;
    this.pool = config.pool;
    this.clock = config.clock ?? (() => performance.now());
    this.generator = config.generator ?? {};
    this.logger = config.logger ?? createServiceLogger({}, { component: 'benchmark-runner' });
  }

  async run(config: BenchmarkConfig): Promise<BenchmarkRun> {
    const startedAt = new Date();
    this.logger.info('Benchmark started', { ...config });

    const settled = await Promise.allSettled(this.drivers.map((driver) => this.runStore(driver, config)));

    const results: Record<StoreId, BenchmarkResult> = {};
    settled.forEach((outcome, index) => {
      const driver = this.drivers[index];
      if (!driver) return;
      if (outcome.status === 'fulfilled') {
        results[driver.id] = outcome.value;
      } else {
        const message = errorMessage(outcome.reason);
        this.logger.error('Store benchmark failed', { store: driver.id, error: message });
        results[driver.id] = failedResult(driver.id, message);
      }
    });

    this.logger.info('Benchmark completed', {
      stores: Object.keys(results),
      errors: Object.values(results).reduce((sum, result) => sum + result.errorCount, 0),
    });
    return { config, results, startedAt, completedAt: new Date() };
  }

  /**
   * Empty the benchmark table of every store
   */
  async cleanup(): Promise<Record<StoreId, CleanupResult>> {
    const outcomes = await Promise.all(
      this.drivers.map(async (driver) => [driver.id, await this.teardown(driver)] as const),
    );
    return Object.fromEntries(outcomes);
  }

  private async runStore(driver: StoreDriver, config: BenchmarkConfig): Promise<BenchmarkResult> {
    const logger = this.logger.child({ store: driver.id });
    await this.teardown(driver);

    const ensured = await this.dispatch(driver, () => driver.ensureTable(BENCHMARK_TABLE));
    if (!ensured.ok) {
      throw new CapbenchError(
        `Cannot prepare ${BENCHMARK_TABLE.name}: ${ensured.error.message}`,
        ErrorCode.STORE_UNAVAILABLE,
        { store: driver.id },
        ensured.error,
      );
    }

    const records = generateRecords(config.operationCount, this.generator);
    const latencies: LatencySeries = { insert: [], read: [], update: [] };
    let errorCount = 0;
    let batchCount = 0;

    const startedAt = this.clock();
    for (let offset = 0; offset < records.length; offset += config.batchSize) {
      const batch = records.slice(offset, offset + config.batchSize);
      batchCount += 1;

      const failure = await this.runBatch(driver, config, batch.map((record) => record.id), batch, latencies);
      if (failure) {
        errorCount += 1;
        logger.warn('Batch failed', { batch: batchCount, error: failure.message });
      }
    }
    const totalTimeSeconds = (this.clock() - startedAt) / 1000;

    await this.teardown(driver);

    return {
      store: driver.id,
      latenciesByOp: latencies,
      throughputOpsPerSec: totalTimeSeconds > 0 ? config.operationCount / totalTimeSeconds : 0,
      errorCount,
      batchCount,
      totalTimeSeconds,
      success: true,
    };
  }

  /**
   * Timed insert, then read and update depending on the test type. Stops at
   * the first failing call and returns its error; calls that completed keep
   * their latency.
   */
  private async runBatch(
    driver: StoreDriver,
    config: BenchmarkConfig,
    ids: string[],
    batch: StoreRow[],
    latencies: LatencySeries,
  ): Promise<Error | null> {
    const steps: Array<[OperationKind, () => Promise<StoreResult<unknown>>]> = [
      ['insert', () => driver.insertMany(BENCHMARK_TABLE.name, batch)],
    ];
    if (config.testType === 'mixed' || config.testType === 'read') {
      steps.push(['read', () => driver.find(BENCHMARK_TABLE.name, { status: 'ACTIVE' })]);
    }
    if (config.testType === 'mixed' || config.testType === 'update') {
      steps.push(['update', () => driver.update(BENCHMARK_TABLE.name, { id: ids }, { status: 'UPDATED' })]);
    }

    for (const [kind, call] of steps) {
      const started = this.clock();
      const outcome = await this.dispatch(driver, call);
      if (!outcome.ok) {
        return outcome.error;
      }
      latencies[kind].push((this.clock() - started) / 1000);
    }
    return null;
  }

  private async teardown(driver: StoreDriver): Promise<CleanupResult> {
    const outcome = await this.dispatch(driver, () => driver.truncate(BENCHMARK_TABLE.name));
    if (!outcome.ok) {
      this.logger.warn('Benchmark teardown failed', { store: driver.id, error: outcome.error.message });
      return { success: false, error: outcome.error.message };
    }
    return { success: true };
  }

  /**
   * Blocking drivers go through the pool. A rejection on either path becomes
   * a failed result.
   */
  private async dispatch<T>(driver: StoreDriver, call: () => Promise<StoreResult<T>>): Promise<StoreResult<T>> {
    try {
      if (!driver.blocking || !this.pool) {
        return await call();
      }
      return await this.pool.exec(call);
    } catch (error) {
      return storeFailure<T>(error);
    }
  }
}

function failedResult(store: StoreId, error: string): BenchmarkResult {
  return {
    store,
    latenciesByOp: { insert: [], read: [], update: [] },
    throughputOpsPerSec: 0,
    errorCount: 0,
    batchCount: 0,
    totalTimeSeconds: 0,
    success: false,
    error,
  };
}
