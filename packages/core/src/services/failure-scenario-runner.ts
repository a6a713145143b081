/**
 * Failure scenario runner
 *
 * Drives one bounded failure-injection run through
 * preparing → injecting → monitoring → restoring → recovery-watch → completed
 * and returns the availability and recovery series it observed.
 *
 * @module @capbench/core/services/failure-scenario-runner
 */

import { EventEmitter } from 'events';
import type {
  AvailabilitySample,
  ExecutionMode,
  ProbeResult,
  RecoverySample,
  Scenario,
  ScenarioOutcome,
  ScenarioPhase,
  ScenarioResult,
  StoreDefinition,
  StoreId,
} from '@capbench/shared';
import {
  CancelledError,
  InjectionError,
  RECOVERY_CEILING_TICKS,
  RecoveryTimeoutError,
  ResolutionError,
  RestorationError,
  createServiceLogger,
  errorMessage,
  findStoreForNode,
  generateUUID,
  isCapbenchError,
  round,
  sleep,
  type Logger,
} from '@capbench/shared';
import type { InfrastructureController } from '../infrastructure/infrastructure-controller';
import { NodeLockManager, type ReleaseLocks } from '../infrastructure/node-lock';
import type { StoreProbe } from '../probes/store-probe';

/**
 * A store under test and the probe that checks it
 */
export interface MonitoredStore {
  definition: StoreDefinition;
  probe: StoreProbe;
}

/**
 * Runner configuration
 */
export interface FailureScenarioRunnerConfig {
  controller: InfrastructureController;
  /** Stores in the order their samples are recorded */
  stores: MonitoredStore[];
  /** Shared with every runner acting on the same nodes */
  locks?: NodeLockManager;
  /** Wait before each monitoring and recovery tick (default: 1000) */
  tickIntervalMs?: number;
  /** Wall clock in milliseconds */
  clock?: () => number;
  logger?: Logger;
}

/**
 * Per-run options
 */
export interface ScenarioRunOptions {
  scenarioId?: string;
  /** Ends the run early; nodes already mutated are still restored */
  signal?: AbortSignal;
}

/**
 * Phase change notification
 */
export interface ScenarioPhaseEvent {
  scenarioId: string;
  scenario: Scenario;
  phase: ScenarioPhase;
  mode?: ExecutionMode;
}

/**
 * Mutable state of one run. Never shared between runs.
 */
interface RunState {
  scenarioId: string;
  scenario: Scenario;
  logger: Logger;
  phase: ScenarioPhase;
  mode: ExecutionMode;
  targetedStores: Set<StoreId>;
  network?: string;
  mutated: string[];
  availability: AvailabilitySample[];
  recovery: RecoverySample[];
  errors: string[];
  errorCode?: number;
  failed: boolean;
  aborted: boolean;
  recoveryTimeSeconds: number;
  recoveryComplete: boolean;
  monitoringStartedAt: number | null;
  monitoringEndedAt: number | null;
  startedAt: Date;
}

const FAILURE_LABELS: Record<Scenario['kind'], string> = {
  'node-failure': 'Node down',
  'network-partition': 'Network partition',
};

/**
 * Executes failure scenarios against the infrastructure controller and the
 * monitored stores.
 *
 * Events: `scenario_started`, `phase_changed` (ScenarioPhaseEvent),
 * `scenario_completed` (ScenarioResult).
 */
export class FailureScenarioRunner extends EventEmitter {
  private readonly controller: InfrastructureController;
  private readonly stores: MonitoredStore[];
  private readonly locks: NodeLockManager;
  private readonly tickIntervalMs: number;
  private readonly clock: () => number;
  private readonly logger: Logger;

  constructor(config: FailureScenarioRunnerConfig) {
    super();
    this.controller = config.controller;
    this.stores = config.stores;
    this.locks = config.locks ?? new NodeLockManager();
    this.tickIntervalMs = config.tickIntervalMs ?? 1000;
    this.clock = config.clock ?? Date.now;
    this.logger = config.logger ?? createServiceLogger({}, { component: 'failure-scenario-runner' });
  }

  /**
   * Run one scenario to completion. Resolves with a result for every
   * outcome, including failed ones.
   */
  async run(scenario: Scenario, options: ScenarioRunOptions = {}): Promise<ScenarioResult> {
    const scenarioId = options.scenarioId ?? generateUUID();
    const state: RunState = {
      scenarioId,
      scenario,
      logger: this.logger.withScenarioId(scenarioId),
      phase: 'idle',
      mode: 'live',
      targetedStores: new Set(),
      mutated: [],
      availability: [],
      recovery: [],
      errors: [],
      failed: false,
      aborted: false,
      recoveryTimeSeconds: 0,
      recoveryComplete: true,
      monitoringStartedAt: null,
      monitoringEndedAt: null,
      startedAt: new Date(this.clock()),
    };

    state.logger.info('Scenario started', {
      kind: scenario.kind,
      targets: [...scenario.targets],
      durationSeconds: scenario.durationSeconds,
    });
    this.emit('scenario_started', { scenarioId, scenario, phase: state.phase });

    let release: ReleaseLocks | null = null;
    try {
      try {
        state.mode = await this.controller.mode();
        this.setPhase(state, 'preparing');
        release = await this.prepare(state);

        if (options.signal?.aborted) {
          state.aborted = true;
          state.logger.warn('Scenario cancelled before injection');
        } else {
          this.setPhase(state, 'injecting');
          await this.inject(state, options.signal);

          if (!state.aborted) {
            this.setPhase(state, 'monitoring');
            await this.monitor(state, options.signal);
          }
        }
      } catch (error) {
        this.fail(state, error);
      }

      if (state.mutated.length > 0) {
        try {
          this.setPhase(state, 'restoring');
          await this.restore(state, state.mutated);

          if (scenario.kind === 'node-failure' && !state.failed) {
            this.setPhase(state, 'recovery-watch');
            await this.watchRecovery(state, options.signal);
          }
        } catch (error) {
          this.fail(state, error);
        }
      }
    } finally {
      release?.();
    }

    this.setPhase(state, 'completed');
    const result = this.buildResult(state);
    state.logger.info('Scenario completed', {
      outcome: result.outcome,
      mode: result.mode,
      errors: result.errors.length,
    });
    this.emit('scenario_completed', result);
    return result;
  }

  /**
   * Map targets to stores, lock them, check they exist and resolve the
   * partition network. Nothing is mutated here.
   */
  private async prepare(state: RunState): Promise<ReleaseLocks> {
    const { scenario } = state;
    const definitions = this.stores.map((store) => store.definition);

    for (const target of scenario.targets) {
      const store = findStoreForNode(definitions, target);
      if (!store) {
        throw ResolutionError.target(target, 'node does not belong to a monitored store');
      }
      state.targetedStores.add(store.id);
    }

    const release = await this.locks.acquire(scenario.targets);
    try {
      for (const target of scenario.targets) {
        if ((await this.controller.status(target)) === 'unknown') {
          throw ResolutionError.target(target, 'node not found');
        }
      }
      if (scenario.kind === 'network-partition') {
        state.network = await this.controller.resolveNetwork(scenario.targets);
      }
    } catch (error) {
      release();
      throw error;
    }
    return release;
  }

  /**
   * Stop or disconnect every target. On the first failure the nodes already
   * mutated are restored and the run fails. Cancellation stops before the
   * next target; nodes already mutated are left for the restoring phase.
   */
  private async inject(state: RunState, signal?: AbortSignal): Promise<void> {
    const { scenario } = state;
    for (const target of scenario.targets) {
      if (signal?.aborted) {
        state.aborted = true;
        state.logger.warn('Injection cancelled', { mutated: [...state.mutated] });
        return;
      }
      try {
        if (scenario.kind === 'node-failure') {
          await this.controller.stop(target);
        } else {
          await this.controller.disconnect(target, this.requireNetwork(state));
        }
        state.mutated.push(target);
      } catch (error) {
        const verb = scenario.kind === 'node-failure' ? 'stop' : 'disconnect';
        const injectionError = new InjectionError(
          `Failed to ${verb} ${target}: ${errorMessage(error)}`,
          target,
          [...state.mutated],
          error instanceof Error ? error : undefined,
        );
        state.logger.error('Injection failed, rolling back', injectionError, { rollback: [...state.mutated] });
        state.errors.push(injectionError.message);
        state.errorCode = injectionError.code;
        state.failed = true;
        await this.restore(state, [...state.mutated].reverse());
        state.mutated = [];
        throw injectionError;
      }
    }
  }

  private async monitor(state: RunState, signal?: AbortSignal): Promise<void> {
    const { scenario } = state;
    state.monitoringStartedAt = this.clock();

    try {
      for (let tick = 0; tick < scenario.durationSeconds; tick++) {
        await sleep(this.tickIntervalMs, signal);
        state.availability.push(...(await this.sample(state, tick)));
      }
    } catch (error) {
      if (!(error instanceof CancelledError)) throw error;
      state.aborted = true;
      state.logger.warn('Monitoring cancelled', { samples: state.availability.length });
    } finally {
      state.monitoringEndedAt = this.clock();
    }
  }

  /**
   * Probe every store concurrently and override targeted stores to failure
   */
  private async sample(state: RunState, tick: number): Promise<AvailabilitySample[]> {
    const { scenario } = state;
    return Promise.all(
      this.stores.map(async (store): Promise<AvailabilitySample> => {
        const probe: ProbeResult = await store.probe.probe();
        const storeId = store.definition.id;
        if (state.targetedStores.has(storeId)) {
          return {
            tick,
            store: storeId,
            success: false,
            latencyMs: null,
            error: FAILURE_LABELS[scenario.kind],
            probed: false,
          };
        }
        return {
          tick,
          store: storeId,
          success: probe.success,
          latencyMs: probe.latencyMs,
          error: probe.error,
          probed: true,
        };
      }),
    );
  }

  /**
   * Reverse the injection on the given nodes. Failures are recorded, never
   * thrown.
   */
  private async restore(state: RunState, nodes: readonly string[]): Promise<void> {
    for (const nodeId of nodes) {
      try {
        if (state.scenario.kind === 'node-failure') {
          await this.controller.start(nodeId);
        } else {
          await this.controller.connect(nodeId, this.requireNetwork(state));
        }
      } catch (error) {
        const restorationError = new RestorationError(
          nodeId,
          error instanceof Error ? error : new Error(String(error)),
        );
        state.logger.error('Restoration failed', restorationError);
        state.errors.push(restorationError.message);
      }
    }
  }

  /**
   * Check the restarted targets once per tick until all report running or
   * the ceiling is reached
   */
  private async watchRecovery(state: RunState, signal?: AbortSignal): Promise<void> {
    const targets = state.scenario.targets;
    state.recoveryComplete = false;

    try {
      for (let tick = 0; tick < RECOVERY_CEILING_TICKS; tick++) {
        await sleep(this.tickIntervalMs, signal);
        const states = await Promise.all(targets.map((target) => this.controller.status(target)));
        const storeOnline = states.every((runState) => runState === 'running');
        state.recovery.push({ tick, storeOnline });
        state.recoveryTimeSeconds = tick + 1;

        if (storeOnline) {
          state.recoveryComplete = true;
          state.logger.info('Targets recovered', { recoveryTimeSeconds: state.recoveryTimeSeconds });
          return;
        }
      }
    } catch (error) {
      if (!(error instanceof CancelledError)) throw error;
      state.aborted = true;
      state.logger.warn('Recovery watch cancelled', { checks: state.recovery.length });
      return;
    }

    const timeout = new RecoveryTimeoutError(targets, RECOVERY_CEILING_TICKS);
    state.recoveryTimeSeconds = RECOVERY_CEILING_TICKS;
    state.errors.push(timeout.message);
    state.logger.warn('Recovery ceiling reached', { targets: [...targets] });
  }

  private fail(state: RunState, error: unknown): void {
    if (state.failed) return;
    state.failed = true;
    if (isCapbenchError(error)) {
      state.errorCode = error.code;
    }
    if (error instanceof ResolutionError) {
      state.logger.warn('Scenario could not be prepared', { error: error.message });
    } else {
      state.logger.error('Scenario failed', error instanceof Error ? error : { error: String(error) });
    }
    state.errors.push(errorMessage(error));
  }

  private requireNetwork(state: RunState): string {
    if (state.network === undefined) {
      throw ResolutionError.network(this.controller.configuredNetwork);
    }
    return state.network;
  }

  private setPhase(state: RunState, phase: ScenarioPhase): void {
    state.phase = phase;
    state.logger.debug('Phase changed', { phase });
    const event: ScenarioPhaseEvent = {
      scenarioId: state.scenarioId,
      scenario: state.scenario,
      phase,
      mode: state.mode,
    };
    this.emit('phase_changed', event);
  }

  private buildResult(state: RunState): ScenarioResult {
    const outcome = determineOutcome(state);
    const monitoredMs =
      state.monitoringStartedAt !== null && state.monitoringEndedAt !== null
        ? Math.max(0, state.monitoringEndedAt - state.monitoringStartedAt)
        : 0;

    return {
      scenarioId: state.scenarioId,
      scenario: state.scenario,
      phase: state.phase,
      outcome,
      success: outcome !== 'failed',
      mode: state.mode,
      actualDuration: round(monitoredMs / 1000),
      recoveryTimeSeconds: state.recoveryTimeSeconds,
      recoveryComplete: state.recoveryComplete,
      availability: state.availability,
      recovery: state.recovery,
      dataLoss: 0,
      errors: state.errors,
      ...(state.errorCode !== undefined && { errorCode: state.errorCode }),
      ...(state.network !== undefined && { network: state.network }),
      affectedStores: [...state.targetedStores],
      aborted: state.aborted,
      startedAt: state.startedAt,
      completedAt: new Date(this.clock()),
    };
  }
}

function determineOutcome(state: RunState): ScenarioOutcome {
  if (state.failed) return 'failed';
  if (state.aborted || !state.recoveryComplete || state.errors.length > 0) return 'partial-failure';
  return 'success';
}
