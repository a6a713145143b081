/**
 * Service exports
 * @module @capbench/core/services
 */

export * from './failure-scenario-runner';
export * from './benchmark-runner';
export * from './benchmark-summary';
export * from './record-generator';
export * from './metrics-collector';
