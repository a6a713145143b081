/**
 * Live metrics REST API Endpoint
 * @module @capbench/server/api/metrics
 */

import { Router, type Request, type Response } from 'express';
import { cpus, freemem, loadavg, totalmem } from 'os';
import { round } from '@capbench/shared';
import type { AppContext } from '../context.js';
import { sendSuccess } from './responses.js';

const BYTES_PER_MB = 1024 * 1024;

/**
 * Host load and memory
 */
export interface HostMetrics {
  /** One-minute load average over the core count, capped at 100 */
  cpuPercent: number;
  memory: {
    total: number;
    used: number;
    percent: number;
  };
}

export function readHostMetrics(): HostMetrics {
  const cores = Math.max(1, cpus().length);
  const [oneMinute = 0] = loadavg();
  const total = totalmem();
  const used = total - freemem();
  return {
    cpuPercent: round(Math.min(100, (oneMinute / cores) * 100)),
    memory: {
      total,
      used,
      percent: total > 0 ? round((used / total) * 100) : 0,
    },
  };
}

export interface MetricsHandlers {
  live(req: Request, res: Response): Promise<void>;
}

export function createMetricsHandlers(ctx: AppContext): MetricsHandlers {
  /**
   * GET /api/metrics/live - Host figures and request counters since the previous call
   */
  async function live(_req: Request, res: Response): Promise<void> {
    const memory = process.memoryUsage();
    sendSuccess(res, {
      timestamp: new Date().toISOString(),
      requests: ctx.metrics.snapshotAll(),
      counters: ctx.metrics.runCounters(),
      activeScenarios: ctx.registry.activeCount.value,
      host: readHostMetrics(),
      process: {
        uptimeSeconds: Math.floor(process.uptime()),
        rssMb: round(memory.rss / BYTES_PER_MB),
        heapUsedMb: round(memory.heapUsed / BYTES_PER_MB),
      },
    });
  }

  return { live };
}

export function createMetricsRouter(ctx: AppContext): Router {
  const router = Router();
  router.get('/live', createMetricsHandlers(ctx).live);
  return router;
}
