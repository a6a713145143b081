/**
 * Store driver exports
 * @module @capbench/core/drivers
 */

export * from './driver-result';
export * from './mongo-store';
export * from './cassandra-store';
