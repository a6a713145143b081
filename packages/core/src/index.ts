/**
 * capbench Core Package
 * Infrastructure control, probes, store drivers and the scenario and
 * benchmark runners
 * @module @capbench/core
 */

// Infrastructure
export * from './infrastructure';

// Probes
export * from './probes';

// Store drivers
export * from './drivers';

// Services
export * from './services';

// Reactive stores
export * from './stores';
