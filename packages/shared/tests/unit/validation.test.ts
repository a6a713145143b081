/**
 * Unit tests for validation module
 */

import { describe, it, expect } from 'vitest';

import {
  validateFailureType,
  validateTargetNodes,
  validateDuration,
  validateSimulateFailureInput,
  validateIntegerInRange,
  validateBenchmarkConfigInput,
} from '../../src/validation';

describe('Scenario Validation', () => {
  describe('validateFailureType', () => {
    it('should accept node and network', () => {
      expect(validateFailureType('node')).toBeNull();
      expect(validateFailureType('network')).toBeNull();
    });

    it('should reject unknown types', () => {
      expect(validateFailureType('disk')?.code).toBe('INVALID_VALUE');
      expect(validateFailureType(3)?.code).toBe('INVALID_TYPE');
    });
  });

  describe('validateTargetNodes', () => {
    it('should accept comma-separated node names', () => {
      expect(validateTargetNodes('mongo1, cassandra2')).toEqual([]);
    });

    it('should require at least one node', () => {
      expect(validateTargetNodes(undefined)[0]?.code).toBe('REQUIRED');
      expect(validateTargetNodes(' , ')[0]?.code).toBe('EMPTY');
    });

    it('should reject invalid node names', () => {
      const errors = validateTargetNodes('mongo1,bad name');
      expect(errors).toHaveLength(1);
      expect(errors[0]?.message).toBe('Invalid node name: bad name');
    });
  });

  describe('validateDuration', () => {
    it('should accept durations within range', () => {
      expect(validateDuration(1, 300)).toBeNull();
      expect(validateDuration(300, 300)).toBeNull();
    });

    it('should reject out of range and fractional durations', () => {
      expect(validateDuration(0, 300)?.code).toBe('OUT_OF_RANGE');
      expect(validateDuration(301, 300)?.code).toBe('OUT_OF_RANGE');
      expect(validateDuration(1.5, 300)?.code).toBe('INVALID_VALUE');
      expect(validateDuration('10', 300)?.code).toBe('INVALID_TYPE');
    });
  });

  describe('validateSimulateFailureInput', () => {
    it('should build a node-failure scenario with defaults', () => {
      const result = validateSimulateFailureInput({ targetNode: 'mongo1' });
      expect(result).toEqual({
        valid: true,
        value: {
          kind: 'node-failure',
          targets: ['mongo1'],
          durationSeconds: 30,
          testOperations: true,
        },
      });
    });

    it('should map network failures to partitions and dedupe targets', () => {
      const result = validateSimulateFailureInput({
        failureType: 'network',
        targetNode: 'cassandra1, cassandra1,mongo2',
        duration: 5,
        testOperations: false,
      });
      expect(result.valid).toBe(true);
      if (result.valid) {
        expect(result.value.kind).toBe('network-partition');
        expect(result.value.targets).toEqual(['cassandra1', 'mongo2']);
        expect(result.value.testOperations).toBe(false);
      }
    });

    it('should honour the configured maximum duration', () => {
      const result = validateSimulateFailureInput({ targetNode: 'mongo1', duration: 60 }, { maxDurationSeconds: 30 });
      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.errors.map((e) => e.field)).toEqual(['duration']);
      }
    });

    it('should collect every field error', () => {
      const result = validateSimulateFailureInput({ failureType: 'disk', duration: -1, testOperations: 'yes' });
      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.errors.map((e) => e.field)).toEqual(['failureType', 'targetNode', 'duration', 'testOperations']);
      }
    });

    it('should reject non-object input', () => {
      const result = validateSimulateFailureInput(null);
      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.errors[0]?.code).toBe('REQUIRED');
      }
    });
  });
});

describe('Benchmark Validation', () => {
  describe('validateIntegerInRange', () => {
    it('should check type, integrality and bounds', () => {
      expect(validateIntegerInRange('batchSize', 10, 1, 1000)).toBeNull();
      expect(validateIntegerInRange('batchSize', 0, 1, 1000)?.code).toBe('OUT_OF_RANGE');
      expect(validateIntegerInRange('batchSize', 2.5, 1, 1000)?.code).toBe('INVALID_VALUE');
      expect(validateIntegerInRange('batchSize', '10', 1, 1000)?.code).toBe('INVALID_TYPE');
    });
  });

  describe('validateBenchmarkConfigInput', () => {
    it('should apply defaults to an empty body', () => {
      expect(validateBenchmarkConfigInput({})).toEqual({
        valid: true,
        value: { operationCount: 1000, batchSize: 100, consistencyLevel: 'eventual', testType: 'mixed' },
      });
      expect(validateBenchmarkConfigInput(undefined).valid).toBe(true);
    });

    it('should accept explicit values', () => {
      const result = validateBenchmarkConfigInput({
        operationCount: 10,
        batchSize: 3,
        consistencyLevel: 'strong',
        testType: 'write',
      });
      expect(result).toEqual({
        valid: true,
        value: { operationCount: 10, batchSize: 3, consistencyLevel: 'strong', testType: 'write' },
      });
    });

    it('should reject values outside the limits', () => {
      const result = validateBenchmarkConfigInput({
        operationCount: 10_001,
        batchSize: 1_001,
        consistencyLevel: 'linearizable',
        testType: 'delete',
      });
      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.errors.map((e) => e.field)).toEqual([
          'operationCount',
          'batchSize',
          'consistencyLevel',
          'testType',
        ]);
      }
    });
  });
});
