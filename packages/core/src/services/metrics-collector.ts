/**
 * Request and run counters
 * @module @capbench/core/services/metrics-collector
 */

/**
 * Request categories tracked by the collector
 */
export type MetricsCategory = 'failure' | 'performance' | 'reports' | 'dashboard' | 'general';

/**
 * Run counters
 */
export interface RunCounters {
  scenariosStarted: number;
  scenariosFailed: number;
  benchmarksRun: number;
}

/**
 * Interval snapshot for one category
 */
export interface CategorySnapshot {
  /** Requests since the previous snapshot */
  throughput: number;
  /** Average request latency in seconds */
  avgLatency: number;
}

interface CategoryStats {
  count: number;
  totalTime: number;
}

/**
 * Owned by the server and handed to the components that record into it
 */
export class MetricsCollector {
  private readonly stats = new Map<MetricsCategory, CategoryStats>();
  private readonly counters: RunCounters = {
    scenariosStarted: 0,
    scenariosFailed: 0,
    benchmarksRun: 0,
  };

  /**
   * Count one request and its duration in seconds
   */
  recordRequest(category: MetricsCategory, durationSeconds: number): void {
    const stats = this.stats.get(category) ?? { count: 0, totalTime: 0 };
    stats.count += 1;
    stats.totalTime += durationSeconds;
    this.stats.set(category, stats);
  }

  increment(counter: keyof RunCounters): void {
    this.counters[counter] += 1;
  }

  /**
   * Read and reset one category
   */
  snapshot(category: MetricsCategory): CategorySnapshot {
    const stats = this.stats.get(category) ?? { count: 0, totalTime: 0 };
    this.stats.delete(category);
    return {
      throughput: stats.count,
      avgLatency: stats.count > 0 ? stats.totalTime / stats.count : 0,
    };
  }

  /**
   * Read and reset every category
   */
  snapshotAll(): Record<MetricsCategory, CategorySnapshot> {
    return {
      failure: this.snapshot('failure'),
      performance: this.snapshot('performance'),
      reports: this.snapshot('reports'),
      dashboard: this.snapshot('dashboard'),
      general: this.snapshot('general'),
    };
  }

  runCounters(): RunCounters {
    return { ...this.counters };
  }
}
