/**
 * Dashboard summary REST API Endpoint
 * @module @capbench/server/api/dashboard
 */

import { Router, type Request, type Response } from 'express';
import type { ExecutionMode, NodeUptimeReport, StoreId } from '@capbench/shared';
import { createServiceLogger, errorMessage } from '@capbench/shared';
import type { AppContext } from '../context.js';
import { readHostMetrics } from './metrics.js';
import { requestLoggerFor, sendSuccess } from './responses.js';

const logger = createServiceLogger({}, { component: 'api-dashboard' });

export interface ComponentError {
  status: 'error';
  message: string;
}

export interface ControllerSummary {
  status: 'healthy';
  mode: ExecutionMode;
  activeScenarios: number;
}

export interface StoreSummary {
  status: 'connected';
}

export interface LiveSummary {
  timestamp: string;
  cpuPercent: number;
  memoryPercent: number;
}

export interface DashboardSummary {
  controller: ControllerSummary | ComponentError;
  stores: Record<StoreId, StoreSummary | ComponentError>;
  uptimes: NodeUptimeReport;
  liveMetrics: LiveSummary | Record<string, never>;
}

function componentError(reason: unknown): ComponentError {
  return { status: 'error', message: errorMessage(reason) };
}

export interface DashboardHandlers {
  summary(req: Request, res: Response): Promise<void>;
}

export function createDashboardHandlers(ctx: AppContext): DashboardHandlers {
  async function controllerSummary(): Promise<ControllerSummary> {
    return {
      status: 'healthy',
      mode: await ctx.controller.mode(),
      activeScenarios: ctx.registry.activeCount.value,
    };
  }

  async function storeSummary(storeId: StoreId): Promise<StoreSummary | ComponentError> {
    const driver = ctx.drivers.find((candidate) => candidate.id === storeId);
    if (!driver) {
      return { status: 'error', message: `No driver for store ${storeId}` };
    }
    const connected = await driver.connect();
    return connected.ok ? { status: 'connected' } : componentError(connected.error);
  }

  async function storeSummaries(): Promise<Record<StoreId, StoreSummary | ComponentError>> {
    const outcomes = await Promise.allSettled(ctx.stores.map((store) => storeSummary(store.id)));
    const summaries: Record<StoreId, StoreSummary | ComponentError> = {};
    ctx.stores.forEach((store, index) => {
      const outcome = outcomes[index];
      summaries[store.id] = outcome?.status === 'fulfilled' ? outcome.value : componentError(outcome?.reason);
    });
    return summaries;
  }

  async function liveSummary(): Promise<LiveSummary> {
    const host = readHostMetrics();
    return {
      timestamp: new Date().toISOString(),
      cpuPercent: host.cpuPercent,
      memoryPercent: host.memory.percent,
    };
  }

  /**
   * GET /api/dashboard/summary - Controller, stores, node uptimes and host
   * figures gathered concurrently. A failing part is reported on its own.
   */
  async function summary(_req: Request, res: Response): Promise<void> {
    const nodes = ctx.stores.flatMap((store) => store.nodes);

    const [controller, stores, uptimes, live] = await Promise.allSettled([
      controllerSummary(),
      storeSummaries(),
      ctx.controller.uptimes(nodes),
      liveSummary(),
    ]);

    const failed = [controller, stores, uptimes, live].filter((outcome) => outcome.status === 'rejected');
    if (failed.length > 0) {
      requestLoggerFor(logger, res).warn('Dashboard summary degraded', { failedParts: failed.length });
    }

    const body: DashboardSummary = {
      controller: controller.status === 'fulfilled' ? controller.value : componentError(controller.reason),
      stores: stores.status === 'fulfilled' ? stores.value : {},
      uptimes: uptimes.status === 'fulfilled' ? uptimes.value : {},
      liveMetrics: live.status === 'fulfilled' ? live.value : {},
    };
    sendSuccess(res, body);
  }

  return { summary };
}

export function createDashboardRouter(ctx: AppContext): Router {
  const router = Router();
  router.get('/summary', createDashboardHandlers(ctx).summary);
  return router;
}
