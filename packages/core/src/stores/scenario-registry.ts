/**
 * Reactive registry of running and recent scenarios using Vue reactivity
 * @module @capbench/core/stores/scenario-registry
 */

import { computed, reactive, type ComputedRef } from '@vue/reactivity';
import type { ScenarioRecord, ScenarioResult } from '@capbench/shared';
import type { FailureScenarioRunner, ScenarioPhaseEvent } from '../services/failure-scenario-runner';

/**
 * Registry state
 */
export interface ScenarioRegistryState {
  /** Scenarios that have not completed, by ID */
  active: Map<string, ScenarioRecord>;
  /** Completed scenarios, newest first */
  history: ScenarioRecord[];
}

/**
 * Tracks scenario phases published by runners. One instance per server.
 */
export class ScenarioRegistry {
  readonly state: ScenarioRegistryState;
  /** Active scenarios ordered by start time */
  readonly activeList: ComputedRef<ScenarioRecord[]>;
  /** Number of active scenarios */
  readonly activeCount: ComputedRef<number>;
  /** Abort controllers of scenarios not yet completed, by ID */
  private readonly controllers = new Map<string, AbortController>();

  constructor(private readonly historyLimit = 50) {
    this.state = reactive<ScenarioRegistryState>({
      active: new Map(),
      history: [],
    });
    this.activeList = computed(() =>
      [...this.state.active.values()].sort((a, b) => a.startedAt.getTime() - b.startedAt.getTime()),
    );
    this.activeCount = computed(() => this.state.active.size);
  }

  /**
   * Subscribe to a runner's events
   */
  attach(runner: FailureScenarioRunner): void {
    runner.on('phase_changed', (event: ScenarioPhaseEvent) => this.onPhase(event));
    runner.on('scenario_completed', (result: ScenarioResult) => this.onCompleted(result));
  }

  /**
   * Register a cancellation handle for a scenario about to run
   */
  register(scenarioId: string): AbortController {
    const controller = new AbortController();
    this.controllers.set(scenarioId, controller);
    return controller;
  }

  /**
   * Abort every active scenario; returns the IDs signalled
   */
  abortAll(reason = 'Stopped by operator'): string[] {
    const aborted: string[] = [];
    for (const [scenarioId, controller] of this.controllers) {
      if (!controller.signal.aborted) {
        controller.abort(reason);
        aborted.push(scenarioId);
      }
    }
    return aborted;
  }

  get(scenarioId: string): ScenarioRecord | undefined {
    return this.state.active.get(scenarioId) ?? this.state.history.find((r) => r.scenarioId === scenarioId);
  }

  recent(limit = 10): ScenarioRecord[] {
    return this.state.history.slice(0, limit);
  }

  private onPhase(event: ScenarioPhaseEvent): void {
    if (event.phase === 'completed') return;
    const existing = this.state.active.get(event.scenarioId);
    if (existing) {
      existing.phase = event.phase;
      existing.mode = event.mode;
      return;
    }
    this.state.active.set(event.scenarioId, {
      scenarioId: event.scenarioId,
      kind: event.scenario.kind,
      targets: [...event.scenario.targets],
      durationSeconds: event.scenario.durationSeconds,
      phase: event.phase,
      mode: event.mode,
      startedAt: new Date(),
    });
  }

  private onCompleted(result: ScenarioResult): void {
    this.state.active.delete(result.scenarioId);
    this.controllers.delete(result.scenarioId);
    this.state.history.unshift({
      scenarioId: result.scenarioId,
      kind: result.scenario.kind,
      targets: [...result.scenario.targets],
      durationSeconds: result.scenario.durationSeconds,
      phase: result.phase,
      outcome: result.outcome,
      mode: result.mode,
      startedAt: result.startedAt,
      completedAt: result.completedAt,
    });
    if (this.state.history.length > this.historyLimit) {
      this.state.history.length = this.historyLimit;
    }
  }
}
