/**
 * Failure scenario type definitions
 * @module @capbench/shared/types/scenario
 */

import type { ExecutionMode } from './infrastructure.js';
import type { StoreId } from './store.js';

/**
 * Kind of injected failure
 */
export type FailureKind = 'node-failure' | 'network-partition';

/**
 * All failure kinds
 */
export const ALL_FAILURE_KINDS: readonly FailureKind[] = ['node-failure', 'network-partition'] as const;

/**
 * Failure type as accepted on the HTTP API
 */
export type FailureType = 'node' | 'network';

/**
 * Map the API failure type to the scenario kind
 */
export const FAILURE_TYPE_TO_KIND: Record<FailureType, FailureKind> = {
  node: 'node-failure',
  network: 'network-partition',
};

/**
 * One bounded failure-injection run. Immutable once accepted.
 */
export interface Scenario {
  readonly kind: FailureKind;
  /** Target node names, deduplicated, in request order */
  readonly targets: readonly string[];
  /** Monitoring ticks (one per logical second) */
  readonly durationSeconds: number;
  /** Whether stores are probed during monitoring */
  readonly testOperations: boolean;
}

/**
 * Runner state machine phases
 */
export type ScenarioPhase =
  | 'idle'
  | 'preparing'
  | 'injecting'
  | 'monitoring'
  | 'restoring'
  | 'recovery-watch'
  | 'completed';

/**
 * Terminal outcome of a scenario
 */
export type ScenarioOutcome = 'success' | 'partial-failure' | 'failed';

/**
 * One availability sample for one store at one tick
 */
export interface AvailabilitySample {
  tick: number;
  store: StoreId;
  success: boolean;
  latencyMs: number | null;
  error: string | null;
  /** False when the value was not observed by a probe */
  probed: boolean;
}

/**
 * One recovery check
 */
export interface RecoverySample {
  tick: number;
  storeOnline: boolean;
}

/**
 * Maximum number of recovery checks after restoring a stopped node
 */
export const RECOVERY_CEILING_TICKS = 10;

/**
 * Outcome of one scenario run
 */
export interface ScenarioResult {
  scenarioId: string;
  scenario: Scenario;
  /** Last phase reached ('completed' unless the run failed to start) */
  phase: ScenarioPhase;
  outcome: ScenarioOutcome;
  success: boolean;
  mode: ExecutionMode;
  /** Wall-clock seconds spent monitoring */
  actualDuration: number;
  recoveryTimeSeconds: number;
  /** False when the recovery ceiling was reached without recovery */
  recoveryComplete: boolean;
  /** Ordered by tick, then by store */
  availability: AvailabilitySample[];
  recovery: RecoverySample[];
  /** Always 0: loss detection is not implemented */
  dataLoss: number;
  errors: string[];
  /** Error code of the failure that aborted the run, if any */
  errorCode?: number;
  /** Network used for a partition */
  network?: string;
  /** Stores hosting at least one target */
  affectedStores: StoreId[];
  /** Whether the run was cancelled before completing its ticks */
  aborted: boolean;
  startedAt: Date;
  completedAt: Date;
}

/**
 * Summary of a running or finished scenario kept by the registry
 */
export interface ScenarioRecord {
  scenarioId: string;
  kind: FailureKind;
  targets: string[];
  durationSeconds: number;
  phase: ScenarioPhase;
  outcome?: ScenarioOutcome;
  mode?: ExecutionMode;
  startedAt: Date;
  completedAt?: Date;
}
