/**
 * Benchmark configuration validation
 * @module @capbench/shared/validation/benchmark-validation
 */

import type { BenchmarkConfig, BenchmarkTestType, ConsistencyLevel } from '../types/benchmark.js';
import {
  ALL_CONSISTENCY_LEVELS,
  ALL_TEST_TYPES,
  BENCHMARK_LIMITS,
  DEFAULT_BENCHMARK_CONFIG,
} from '../types/benchmark.js';
import type { ValidationErrorDetail, ValidationResult } from '../errors/validation-error.js';
import { invalidResult, validResult } from '../errors/validation-error.js';
import { isPlainObject } from '../utils/index.js';

/**
 * Validate an integer within an inclusive range
 */
export function validateIntegerInRange(
  field: string,
  value: unknown,
  min: number,
  max: number,
): ValidationErrorDetail | null {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return { field, message: `${field} must be a number`, code: 'INVALID_TYPE' };
  }
  if (!Number.isInteger(value)) {
    return { field, message: `${field} must be an integer`, code: 'INVALID_VALUE' };
  }
  if (value < min || value > max) {
    return { field, message: `${field} must be between ${min} and ${max}`, code: 'OUT_OF_RANGE' };
  }
  return null;
}

export function isConsistencyLevel(value: unknown): value is ConsistencyLevel {
  return typeof value === 'string' && ALL_CONSISTENCY_LEVELS.some((level) => level === value);
}

export function isBenchmarkTestType(value: unknown): value is BenchmarkTestType {
  return typeof value === 'string' && ALL_TEST_TYPES.some((type) => type === value);
}

/**
 * Validate a benchmark request body, applying defaults for omitted fields
 */
export function validateBenchmarkConfigInput(input: unknown): ValidationResult<BenchmarkConfig> {
  if (input === undefined || input === null) {
    return validResult({ ...DEFAULT_BENCHMARK_CONFIG });
  }
  if (!isPlainObject(input)) {
    return invalidResult([{ field: 'input', message: 'Input must be an object', code: 'INVALID_TYPE' }]);
  }

  const errors: ValidationErrorDetail[] = [];

  const operationCount = input.operationCount ?? DEFAULT_BENCHMARK_CONFIG.operationCount;
  const operationCountError = validateIntegerInRange(
    'operationCount',
    operationCount,
    BENCHMARK_LIMITS.minOperationCount,
    BENCHMARK_LIMITS.maxOperationCount,
  );
  if (operationCountError) errors.push(operationCountError);

  const batchSize = input.batchSize ?? DEFAULT_BENCHMARK_CONFIG.batchSize;
  const batchSizeError = validateIntegerInRange(
    'batchSize',
    batchSize,
    BENCHMARK_LIMITS.minBatchSize,
    BENCHMARK_LIMITS.maxBatchSize,
  );
  if (batchSizeError) errors.push(batchSizeError);

  const consistencyLevel = input.consistencyLevel ?? DEFAULT_BENCHMARK_CONFIG.consistencyLevel;
  if (!isConsistencyLevel(consistencyLevel)) {
    errors.push({
      field: 'consistencyLevel',
      message: `consistencyLevel must be one of: ${ALL_CONSISTENCY_LEVELS.join(', ')}`,
      code: 'INVALID_VALUE',
    });
  }

  const testType = input.testType ?? DEFAULT_BENCHMARK_CONFIG.testType;
  if (!isBenchmarkTestType(testType)) {
    errors.push({
      field: 'testType',
      message: `testType must be one of: ${ALL_TEST_TYPES.join(', ')}`,
      code: 'INVALID_VALUE',
    });
  }

  if (
    errors.length > 0 ||
    typeof operationCount !== 'number' ||
    typeof batchSize !== 'number' ||
    !isConsistencyLevel(consistencyLevel) ||
    !isBenchmarkTestType(testType)
  ) {
    return invalidResult(errors);
  }

  return validResult({ operationCount, batchSize, consistencyLevel, testType });
}
