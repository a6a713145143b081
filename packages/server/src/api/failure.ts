/**
 * Failure testing REST API Endpoints
 *
 * Runs failure scenarios and exposes node uptimes, restoration and the CAP
 * reference scorecard.
 * @module @capbench/server/api/failure
 */

import { Router, type Request, type Response, type RequestHandler } from 'express';
import type {
  FailureType,
  ScenarioResult,
  StoreDefinition,
  StoreId,
} from '@capbench/shared';
import {
  CAP_REFERENCE,
  ErrorCode,
  createServiceLogger,
  errorMessage,
  generateUUID,
  parseList,
  statusCodeFor,
  validateSimulateFailureInput,
  validateTargetNodes,
} from '@capbench/shared';
import type { AppContext } from '../context.js';
import {
  errorCodeName,
  requestLoggerFor,
  sendError,
  sendFailure,
  sendSuccess,
  sendValidationError,
} from './responses.js';

const logger = createServiceLogger({}, { component: 'api-failure' });

/**
 * Probe outcome of one store at one tick
 */
export interface ProbeView {
  success: boolean;
  latency: number | null;
  error: string | null;
}

/**
 * All stores at one tick
 */
export interface AvailabilityPoint {
  time: string;
  [store: string]: string | ProbeView;
}

/**
 * Store availability (0 or 100) at one recovery check
 */
export interface RecoveryPoint {
  time: string;
  [store: string]: string | number;
}

/**
 * Scenario summary returned to clients
 */
export interface ScenarioSummary {
  scenarioId: string;
  failureType: FailureType;
  targetNode: string;
  duration: number;
  /** Ticks each store spent failed by the injection */
  downtime: Record<StoreId, number>;
  dataLoss: Record<StoreId, number>;
  recoveryTime: number;
  recoveryComplete: boolean;
  mode: ScenarioResult['mode'];
  outcome: ScenarioResult['outcome'];
  aborted: boolean;
}

/**
 * Group availability samples by tick
 */
export function toAvailabilityMetrics(result: ScenarioResult): AvailabilityPoint[] {
  const points = new Map<number, AvailabilityPoint>();
  for (const sample of result.availability) {
    let point = points.get(sample.tick);
    if (!point) {
      point = { time: `${sample.tick}s` };
      points.set(sample.tick, point);
    }
    point[sample.store] = { success: sample.success, latency: sample.latencyMs, error: sample.error };
  }
  return [...points.values()];
}

/**
 * Recovery checks as per-store availability percentages
 */
export function toRecoveryMetrics(result: ScenarioResult, stores: readonly StoreDefinition[]): RecoveryPoint[] {
  return result.recovery.map((sample) => {
    const point: RecoveryPoint = { time: `${sample.tick}s` };
    for (const store of stores) {
      const affected = result.affectedStores.includes(store.id);
      point[store.id] = !affected || sample.storeOnline ? 100 : 0;
    }
    return point;
  });
}

export function summarizeScenario(result: ScenarioResult, stores: readonly StoreDefinition[]): ScenarioSummary {
  const downtime: Record<StoreId, number> = {};
  const dataLoss: Record<StoreId, number> = {};
  for (const store of stores) {
    downtime[store.id] = result.affectedStores.includes(store.id)
      ? result.availability.filter((sample) => sample.store === store.id && !sample.success).length
      : 0;
    dataLoss[store.id] = result.dataLoss;
  }

  return {
    scenarioId: result.scenarioId,
    failureType: result.scenario.kind === 'node-failure' ? 'node' : 'network',
    targetNode: result.scenario.targets.join(','),
    duration: result.scenario.durationSeconds,
    downtime,
    dataLoss,
    recoveryTime: result.recoveryTimeSeconds,
    recoveryComplete: result.recoveryComplete,
    mode: result.mode,
    outcome: result.outcome,
    aborted: result.aborted,
  };
}

/**
 * Handlers bound to one application context
 */
export interface FailureHandlers {
  simulate(req: Request, res: Response): Promise<void>;
  containerUptimes(req: Request, res: Response): Promise<void>;
  stop(req: Request, res: Response): Promise<void>;
  capAnalysis(req: Request, res: Response): Promise<void>;
  status(req: Request, res: Response): Promise<void>;
}

export function createFailureHandlers(ctx: AppContext): FailureHandlers {
  /**
   * POST /api/failure/simulate - Run one failure scenario to completion
   */
  async function simulate(req: Request, res: Response): Promise<void> {
    const requestLogger = requestLoggerFor(logger, res);

    const validation = validateSimulateFailureInput(req.body, {
      maxDurationSeconds: ctx.config.maxScenarioDuration,
    });
    if (!validation.valid) {
      requestLogger.warn('Failure simulation validation failed', { errors: validation.errors });
      sendValidationError(res, validation.errors);
      return;
    }

    const scenario = validation.value;
    const scenarioId = generateUUID();
    const handle = ctx.registry.register(scenarioId);
    ctx.metrics.increment('scenariosStarted');

    try {
      requestLogger.info('Failure simulation requested', {
        scenarioId,
        kind: scenario.kind,
        targets: [...scenario.targets],
        durationSeconds: scenario.durationSeconds,
      });
      const result = await ctx.scenarioRunner.run(scenario, { scenarioId, signal: handle.signal });
      const body = {
        summary: summarizeScenario(result, ctx.stores),
        recoveryMetrics: toRecoveryMetrics(result, ctx.stores),
        availabilityMetrics: toAvailabilityMetrics(result),
        detailedResults: result,
      };

      if (result.outcome === 'failed') {
        ctx.metrics.increment('scenariosFailed');
        const code = result.errorCode ?? ErrorCode.INTERNAL;
        sendError(res, errorCodeName(code), result.errors[0] ?? 'Simulation failed', statusCodeFor(code), undefined, body);
        return;
      }

      sendSuccess(res, body);
    } catch (error) {
      ctx.metrics.increment('scenariosFailed');
      requestLogger.error('Failure simulation error', error instanceof Error ? error : undefined);
      sendFailure(res, error, 'Simulation failed');
    }
  }

  /**
   * GET /api/failure/container-uptimes?names=a,b - Uptime of each named node
   */
  async function containerUptimes(req: Request, res: Response): Promise<void> {
    const names = typeof req.query.names === 'string' ? parseList(req.query.names) : [];
    if (names.length === 0) {
      sendError(res, 'VALIDATION_ERROR', 'No container names provided', 400);
      return;
    }
    const invalid = validateTargetNodes(names.join(','));
    if (invalid.length > 0) {
      sendValidationError(res, invalid.map((detail) => ({ ...detail, field: 'names' })));
      return;
    }

    try {
      const mode = await ctx.controller.mode();
      const uptimes = await ctx.controller.uptimes(names);
      sendSuccess(res, { mode, uptimes });
    } catch (error) {
      requestLoggerFor(logger, res).error('Uptime check failed', error instanceof Error ? error : undefined);
      sendFailure(res, error, 'Uptime check failed');
    }
  }

  /**
   * POST /api/failure/stop - Abort running scenarios and restart stopped nodes
   */
  async function stop(_req: Request, res: Response): Promise<void> {
    const requestLogger = requestLoggerFor(logger, res);

    try {
      const aborted = ctx.registry.abortAll('Stopped by operator');
      const mode = await ctx.controller.mode();
      const nodes = [...new Set(ctx.stores.flatMap((store) => store.nodes))];

      const restored: string[] = [];
      const failed: Record<string, string> = {};
      for (const node of nodes) {
        if ((await ctx.controller.status(node)) !== 'stopped') continue;
        try {
          await ctx.controller.start(node);
          restored.push(node);
        } catch (error) {
          requestLogger.warn('Failed to restore node', { node, error: errorMessage(error) });
          failed[node] = errorMessage(error);
        }
      }

      requestLogger.info('Restoration complete', { aborted, restored });
      sendSuccess(res, {
        message: 'Restoration complete',
        mode,
        aborted,
        restored,
        ...(Object.keys(failed).length > 0 && { failed }),
      });
    } catch (error) {
      requestLogger.error('Stop simulation failed', error instanceof Error ? error : undefined);
      sendFailure(res, error, 'Failed to stop');
    }
  }

  /**
   * GET /api/failure/cap-analysis - Static CAP reference scorecard
   */
  async function capAnalysis(_req: Request, res: Response): Promise<void> {
    sendSuccess(res, { ...CAP_REFERENCE });
  }

  /**
   * GET /api/failure/status - Controller mode, active scenarios and locks
   */
  async function status(_req: Request, res: Response): Promise<void> {
    sendSuccess(res, {
      mode: ctx.controller.currentMode(),
      active: ctx.registry.activeList.value,
      lockedNodes: ctx.locks.lockedNodes(),
      recent: ctx.registry.recent(),
      counters: ctx.metrics.runCounters(),
    });
  }

  return { simulate, containerUptimes, stop, capAnalysis, status };
}

/**
 * Router options
 */
export interface FailureRouterOptions {
  /** Guards the endpoints that mutate infrastructure */
  mutationLimiter?: RequestHandler;
}

/**
 * Create the failure testing router
 */
export function createFailureRouter(ctx: AppContext, options: FailureRouterOptions = {}): Router {
  const router = Router();
  const handlers = createFailureHandlers(ctx);
  const guard: RequestHandler[] = options.mutationLimiter ? [options.mutationLimiter] : [];

  router.post('/simulate', ...guard, handlers.simulate);
  router.post('/stop', ...guard, handlers.stop);
  router.get('/container-uptimes', handlers.containerUptimes);
  router.get('/cap-analysis', handlers.capAnalysis);
  router.get('/status', handlers.status);

  return router;
}
