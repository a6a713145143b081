/**
 * Infrastructure exports
 * @module @capbench/core/infrastructure
 */

export * from './command-runner';
export * from './orchestrator-backend';
export * from './docker-backend';
export * from './synthetic-backend';
export * from './infrastructure-controller';
export * from './node-lock';
