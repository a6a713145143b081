/**
 * Failure scenario request validation
 * @module @capbench/shared/validation/scenario-validation
 */

import type { FailureType, Scenario } from '../types/scenario.js';
import { FAILURE_TYPE_TO_KIND } from '../types/scenario.js';
import type { ValidationErrorDetail, ValidationResult } from '../errors/validation-error.js';
import { invalidResult, validResult } from '../errors/validation-error.js';
import { isPlainObject, parseList } from '../utils/index.js';

/**
 * Default scenario duration in seconds
 */
export const DEFAULT_SCENARIO_DURATION = 30;

/**
 * Default upper bound on scenario duration in seconds
 */
export const DEFAULT_MAX_SCENARIO_DURATION = 300;

/**
 * Node name pattern (container names): letter or digit first, then
 * alphanumerics, dots, hyphens and underscores
 */
const NODE_NAME_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_.-]{0,127}$/;

const VALID_FAILURE_TYPES: FailureType[] = ['node', 'network'];

/**
 * Options for scenario validation
 */
export interface ScenarioValidationOptions {
  /** Upper bound on duration (default: 300) */
  maxDurationSeconds?: number;
}

/**
 * Validate the failure type
 */
export function validateFailureType(value: unknown): ValidationErrorDetail | null {
  if (typeof value !== 'string') {
    return { field: 'failureType', message: 'Failure type must be a string', code: 'INVALID_TYPE' };
  }
  if (!isFailureType(value)) {
    return {
      field: 'failureType',
      message: `Unsupported failure type: ${value}. Must be one of: ${VALID_FAILURE_TYPES.join(', ')}`,
      code: 'INVALID_VALUE',
    };
  }
  return null;
}

/**
 * Type guard for failure types
 */
export function isFailureType(value: string): value is FailureType {
  return VALID_FAILURE_TYPES.some((type) => type === value);
}

/**
 * Validate a comma-separated target list
 */
export function validateTargetNodes(value: unknown): ValidationErrorDetail[] {
  if (value === undefined || value === null) {
    return [{ field: 'targetNode', message: 'Target node is required', code: 'REQUIRED' }];
  }
  if (typeof value !== 'string') {
    return [{ field: 'targetNode', message: 'Target node must be a string', code: 'INVALID_TYPE' }];
  }

  const targets = parseList(value);
  if (targets.length === 0) {
    return [{ field: 'targetNode', message: 'At least one target node is required', code: 'EMPTY' }];
  }

  return targets
    .filter((target) => !NODE_NAME_PATTERN.test(target))
    .map((target) => ({
      field: 'targetNode',
      message: `Invalid node name: ${target}`,
      code: 'INVALID_FORMAT',
    }));
}

/**
 * Validate the scenario duration
 */
export function validateDuration(value: unknown, maxDurationSeconds: number): ValidationErrorDetail | null {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return { field: 'duration', message: 'Duration must be a number', code: 'INVALID_TYPE' };
  }
  if (!Number.isInteger(value)) {
    return { field: 'duration', message: 'Duration must be a whole number of seconds', code: 'INVALID_VALUE' };
  }
  if (value < 1 || value > maxDurationSeconds) {
    return {
      field: 'duration',
      message: `Duration must be between 1 and ${maxDurationSeconds} seconds`,
      code: 'OUT_OF_RANGE',
    };
  }
  return null;
}

/**
 * Validate a failure simulation request body and build the scenario
 */
export function validateSimulateFailureInput(
  input: unknown,
  options: ScenarioValidationOptions = {},
): ValidationResult<Scenario> {
  const maxDuration = options.maxDurationSeconds ?? DEFAULT_MAX_SCENARIO_DURATION;

  if (input === undefined || input === null) {
    return invalidResult([{ field: 'input', message: 'Input is required', code: 'REQUIRED' }]);
  }
  if (!isPlainObject(input)) {
    return invalidResult([{ field: 'input', message: 'Input must be an object', code: 'INVALID_TYPE' }]);
  }

  const errors: ValidationErrorDetail[] = [];

  const failureType = input.failureType ?? 'node';
  const failureTypeError = validateFailureType(failureType);
  if (failureTypeError) errors.push(failureTypeError);

  errors.push(...validateTargetNodes(input.targetNode));

  const duration = input.duration ?? DEFAULT_SCENARIO_DURATION;
  const durationError = validateDuration(duration, maxDuration);
  if (durationError) errors.push(durationError);

  const testOperations = input.testOperations ?? true;
  if (typeof testOperations !== 'boolean') {
    errors.push({ field: 'testOperations', message: 'testOperations must be a boolean', code: 'INVALID_TYPE' });
  }

  if (
    errors.length > 0 ||
    typeof failureType !== 'string' ||
    !isFailureType(failureType) ||
    typeof input.targetNode !== 'string' ||
    typeof duration !== 'number' ||
    typeof testOperations !== 'boolean'
  ) {
    return invalidResult(errors);
  }

  const scenario: Scenario = Object.freeze({
    kind: FAILURE_TYPE_TO_KIND[failureType],
    targets: Object.freeze(parseList(input.targetNode)),
    durationSeconds: duration,
    testOperations,
  });
  return validResult(scenario);
}
