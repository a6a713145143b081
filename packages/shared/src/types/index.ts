/**
 * Type exports
 * @module @capbench/shared/types
 */

export * from './store.js';
export * from './infrastructure.js';
export * from './scenario.js';
export * from './benchmark.js';
export * from './report.js';
