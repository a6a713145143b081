/**
 * Store exports
 * @module @capbench/core/stores
 */

export * from './scenario-registry';
