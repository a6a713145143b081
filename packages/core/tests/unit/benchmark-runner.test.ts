/**
 * Unit tests for PerformanceBenchmarkRunner
 * @module @capbench/core/tests/unit/benchmark-runner
 */

import { describe, it, expect } from 'vitest';

import { PerformanceBenchmarkRunner, TaskPool } from '../../src';
import {
  BENCHMARK_TABLE,
  DEFAULT_BENCHMARK_CONFIG,
  type BenchmarkConfig,
  type StoreResult,
  type StoreRow,
  sleep,
} from '@capbench/shared';
import { MemoryStore } from '../helpers/memory-store';

function steppingClock(stepMs: number): () => number {
  let now = 0;
  return () => {
    const current = now;
    now += stepMs;
    return current;
  };
}

function config(overrides: Partial<BenchmarkConfig> = {}): BenchmarkConfig {
  return { ...DEFAULT_BENCHMARK_CONFIG, ...overrides };
}

let nextId = 0;
const generator = { random: () => 0, idFactory: () => `rec-${nextId++}` };

describe('PerformanceBenchmarkRunner', () => {
  it('should time each batch and derive throughput from the store total', async () => {
    const driver = new MemoryStore('mongodb');
    const runner = new PerformanceBenchmarkRunner({ drivers: [driver], clock: steppingClock(10), generator });

    const run = await runner.run(config({ operationCount: 10, batchSize: 4, testType: 'write' }));
    const result = run.results['mongodb'];

    expect(result?.success).toBe(true);
    expect(result?.batchCount).toBe(3);
    expect(result?.errorCount).toBe(0);
    expect(result?.latenciesByOp).toEqual({ insert: [0.01, 0.01, 0.01], read: [], update: [] });
    expect(result?.totalTimeSeconds).toBeCloseTo(0.07);
    expect(result?.throughputOpsPerSec).toBeCloseTo(142.857, 2);
  });

  it('should run a single batch when the batch size exceeds the operation count', async () => {
    const driver = new MemoryStore('mongodb');
    const runner = new PerformanceBenchmarkRunner({ drivers: [driver], generator });

    const run = await runner.run(config({ operationCount: 5, batchSize: 100, testType: 'write' }));

    expect(run.results['mongodb']?.batchCount).toBe(1);
    expect(run.results['mongodb']?.latenciesByOp.insert).toHaveLength(1);
  });

  it('should time insert, read and update for a mixed workload', async () => {
    const driver = new MemoryStore('mongodb');
    const runner = new PerformanceBenchmarkRunner({ drivers: [driver], generator });

    const run = await runner.run(config({ operationCount: 4, batchSize: 2, testType: 'mixed' }));
    const latencies = run.results['mongodb']?.latenciesByOp;

    expect(latencies?.insert).toHaveLength(2);
    expect(latencies?.read).toHaveLength(2);
    expect(latencies?.update).toHaveLength(2);
    expect(driver.calls).toEqual([
      'truncate',
      'ensureTable',
      'insertMany',
      'find',
      'update',
      'insertMany',
      'find',
      'update',
      'truncate',
    ]);
  });

  it('should only add the update step for an update workload', async () => {
    const driver = new MemoryStore('mongodb');
    const runner = new PerformanceBenchmarkRunner({ drivers: [driver], generator });

    await runner.run(config({ operationCount: 2, batchSize: 2, testType: 'update' }));

    expect(driver.calls).toEqual(['truncate', 'ensureTable', 'insertMany', 'update', 'truncate']);
  });

  it('should count a failed batch and keep the latencies of completed steps', async () => {
    const driver = new MemoryStore('mongodb');
    driver.failNext('find', 'read timeout');
    const runner = new PerformanceBenchmarkRunner({ drivers: [driver], generator });

    const run = await runner.run(config({ operationCount: 4, batchSize: 2, testType: 'mixed' }));
    const result = run.results['mongodb'];

    expect(result?.success).toBe(true);
    expect(result?.errorCount).toBe(1);
    expect(result?.batchCount).toBe(2);
    expect(result?.latenciesByOp.insert).toHaveLength(2);
    expect(result?.latenciesByOp.read).toHaveLength(1);
    expect(result?.latenciesByOp.update).toHaveLength(1);
  });

  it('should leave the benchmark table empty afterwards', async () => {
    const driver = new MemoryStore('mongodb');
    const runner = new PerformanceBenchmarkRunner({ drivers: [driver], generator });

    await runner.run(config({ operationCount: 6, batchSize: 3, testType: 'write' }));

    expect(driver.rows(BENCHMARK_TABLE.name)).toEqual([]);
    expect(driver.calls.filter((call) => call === 'truncate')).toHaveLength(2);
  });

  it('should isolate a failing store from its sibling', async () => {
    const broken = new MemoryStore('mongodb');
    broken.failAlways('ensureTable', 'connection refused');
    const healthy = new MemoryStore('cassandra');
    const runner = new PerformanceBenchmarkRunner({ drivers: [broken, healthy], generator });

    const run = await runner.run(config({ operationCount: 2, batchSize: 1, testType: 'write' }));

    expect(run.results['mongodb']).toEqual({
      store: 'mongodb',
      latenciesByOp: { insert: [], read: [], update: [] },
      throughputOpsPerSec: 0,
      errorCount: 0,
      batchCount: 0,
      totalTimeSeconds: 0,
      success: false,
      error: 'Cannot prepare performance_test: connection refused',
    });
    expect(run.results['cassandra']?.success).toBe(true);
    expect(run.results['cassandra']?.batchCount).toBe(2);
  });

  it('should dispatch blocking drivers through the pool', async () => {
    const driver = new MemoryStore('cassandra', true);
    const pool = new TaskPool({ maxConcurrency: 2 });
    const runner = new PerformanceBenchmarkRunner({ drivers: [driver], pool, generator });

    await runner.run(config({ operationCount: 2, batchSize: 2, testType: 'write' }));

    expect(pool.getStats().completedTasks).toBe(4);
  });

  it('should turn a pool rejection into a batch failure', async () => {
    class RejectingStore extends MemoryStore {
      override async insertMany(_table: string, _rows: StoreRow[]): Promise<StoreResult<number>> {
        throw new Error('driver crashed');
      }
    }
    const driver = new RejectingStore('cassandra', true);
    const runner = new PerformanceBenchmarkRunner({ drivers: [driver], pool: new TaskPool(), generator });

    const run = await runner.run(config({ operationCount: 3, batchSize: 1, testType: 'write' }));

    expect(run.results['cassandra']?.errorCount).toBe(3);
    expect(run.results['cassandra']?.latenciesByOp.insert).toEqual([]);
  });

  it('should count a rejecting non-blocking driver per batch', async () => {
    class RejectingStore extends MemoryStore {
      override async find(): Promise<StoreResult<StoreRow[]>> {
        throw new Error('cursor killed');
      }
    }
    const driver = new RejectingStore('mongodb');
    const runner = new PerformanceBenchmarkRunner({ drivers: [driver], generator });

    const run = await runner.run(config({ operationCount: 3, batchSize: 1, testType: 'read' }));
    const result = run.results['mongodb'];

    expect(result?.success).toBe(true);
    expect(result?.batchCount).toBe(3);
    expect(result?.errorCount).toBe(3);
    expect(result?.latenciesByOp.insert).toHaveLength(3);
    expect(result?.latenciesByOp.read).toEqual([]);
  });

  it('should run the store workloads at the same time', async () => {
    let inFlight = 0;
    let peak = 0;
    class SlowStore extends MemoryStore {
      override async insertMany(table: string, rows: StoreRow[]): Promise<StoreResult<number>> {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await sleep(40);
        inFlight -= 1;
        return super.insertMany(table, rows);
      }
    }
    const runner = new PerformanceBenchmarkRunner({
      drivers: [new SlowStore('mongodb'), new SlowStore('cassandra')],
      generator,
    });

    const started = Date.now();
    const run = await runner.run(config({ operationCount: 3, batchSize: 1, testType: 'write' }));
    const elapsedMs = Date.now() - started;

    expect(peak).toBe(2);
    expect(run.results['mongodb']?.batchCount).toBe(3);
    expect(run.results['cassandra']?.batchCount).toBe(3);
    expect(elapsedMs).toBeLessThan(240);
  });

  it('should report teardown results per store', async () => {
    const broken = new MemoryStore('mongodb');
    broken.failNext('truncate', 'permission denied');
    const healthy = new MemoryStore('cassandra');
    const runner = new PerformanceBenchmarkRunner({ drivers: [broken, healthy] });

    await expect(runner.cleanup()).resolves.toEqual({
      mongodb: { success: false, error: 'permission denied' },
      cassandra: { success: true },
    });
  });
});
