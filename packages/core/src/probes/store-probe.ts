/**
 * Bounded write+read health check against one store
 * @module @capbench/core/probes/store-probe
 */

import type { ProbeResult, StoreDriver, StoreId, StoreResult } from '@capbench/shared';
import {
  PROBE_TABLE,
  ProbeError,
  TaskTimeoutError,
  createServiceLogger,
  errorMessage,
  generateUUID,
  round,
  type Logger,
} from '@capbench/shared';
import type { TaskPool } from './task-pool';

/**
 * Probe configuration
 */
export interface StoreProbeConfig {
  /** Per-probe timeout in milliseconds (default: 5000) */
  timeoutMs?: number;
  /** Pool used for blocking drivers */
  pool?: TaskPool;
  /** Monotonic clock in milliseconds */
  clock?: () => number;
  logger?: Logger;
}

/**
 * One insert into the probe table followed by one read of that row.
 * probe() never rejects.
 */
export class StoreProbe {
  private readonly timeoutMs: number;
  private readonly pool?: TaskPool;
  private readonly clock: () => number;
  private readonly logger: Logger;
  private tableReady = false;

  constructor(private readonly driver: StoreDriver, config: StoreProbeConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? 5000;
    this.pool = config.pool;
    this.clock = config.clock ?? (() => performance.now());
    this.logger = config.logger ?? createServiceLogger({}, { component: 'store-probe', store: driver.id });
  }

  get store(): StoreId {
    return this.driver.id;
  }

  async probe(): Promise<ProbeResult> {
    const started = this.clock();
    try {
      const outcome = this.driver.blocking && this.pool
        ? await this.pool.exec(() => this.writeAndRead(), { timeout: this.timeoutMs })
        : await withTimeout(this.writeAndRead(), this.timeoutMs);

      if (!outcome.ok) {
        return this.failure(outcome.error);
      }
      return {
        store: this.driver.id,
        success: true,
        latencyMs: round(this.clock() - started),
        error: null,
      };
    } catch (error) {
      return this.failure(error);
    }
  }

  private failure(cause: unknown): ProbeResult {
    const error = new ProbeError(this.driver.id, errorMessage(cause), cause instanceof Error ? cause : undefined);
    this.logger.debug('Probe failed', { error: error.toLog() });
    return { store: this.driver.id, success: false, latencyMs: null, error: error.message };
  }

  private async writeAndRead(): Promise<StoreResult<void>> {
    if (!this.tableReady) {
      const ensured = await this.driver.ensureTable(PROBE_TABLE);
      if (!ensured.ok) return ensured;
      this.tableReady = true;
    }

    const id = generateUUID();
    const inserted = await this.driver.insert(PROBE_TABLE.name, {
      id,
      name: 'probe',
      status: 'ACTIVE',
      type: 'health-check',
      checked_at: new Date().toISOString(),
    });
    if (!inserted.ok) return inserted;

    const found = await this.driver.find(PROBE_TABLE.name, { id });
    if (!found.ok) return { ok: false, error: found.error };
    if (found.value.length === 0) {
      return { ok: false, error: new Error(`Probe row ${id} not readable after write`) };
    }
    return { ok: true, value: undefined };
  }
}

/**
 * Race a promise against a timeout
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  if (!(timeoutMs > 0) || !Number.isFinite(timeoutMs)) {
    return promise;
  }
  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => reject(new TaskTimeoutError(timeoutMs)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => {
    if (timeoutHandle) clearTimeout(timeoutHandle);
  });
}
