/**
 * Probe exports
 * @module @capbench/core/probes
 */

export * from './task-pool';
export * from './store-probe';
