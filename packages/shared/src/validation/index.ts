/**
 * Validation exports
 * @module @capbench/shared/validation
 */

export * from './scenario-validation.js';
export * from './benchmark-validation.js';
