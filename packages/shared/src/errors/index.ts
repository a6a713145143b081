/**
 * Error classes for capbench
 * @module @capbench/shared/errors
 */

// Base error
export {
  CapbenchError,
  ErrorCode,
  isCapbenchError,
  wrapError,
  errorMessage,
  statusCodeFor,
} from './base-error.js';

export type { ErrorMeta } from './base-error.js';

// Validation errors
export {
  ValidationError,
  validResult,
  invalidResult,
} from './validation-error.js';

export type {
  ValidationErrorDetail,
  ValidationResult,
} from './validation-error.js';

// Scenario, infrastructure and probe errors
export {
  ResolutionError,
  InjectionError,
  PartitionVerificationError,
  RestorationError,
  RecoveryTimeoutError,
  ProbeError,
  OrchestratorUnavailableError,
  OrchestratorCommandError,
  TaskTimeoutError,
  CancelledError,
} from './scenario-error.js';
