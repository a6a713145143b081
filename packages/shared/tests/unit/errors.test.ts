/**
 * Unit tests for error classes
 */

import { describe, it, expect } from 'vitest';

import {
  CapbenchError,
  ErrorCode,
  ValidationError,
  ResolutionError,
  PartitionVerificationError,
  RestorationError,
  ProbeError,
  OrchestratorUnavailableError,
  TaskTimeoutError,
  statusCodeFor,
  wrapError,
  errorMessage,
} from '../../src/errors';

describe('statusCodeFor', () => {
  it('should map codes to HTTP statuses', () => {
    expect(statusCodeFor(ErrorCode.VALIDATION_FAILED)).toBe(400);
    expect(statusCodeFor(ErrorCode.NOT_FOUND)).toBe(404);
    expect(statusCodeFor(ErrorCode.CONFLICT)).toBe(409);
    expect(statusCodeFor(ErrorCode.TARGET_UNRESOLVED)).toBe(422);
    expect(statusCodeFor(ErrorCode.INJECTION_FAILED)).toBe(502);
    expect(statusCodeFor(ErrorCode.ORCHESTRATOR_UNAVAILABLE)).toBe(503);
    expect(statusCodeFor(ErrorCode.RECOVERY_TIMEOUT)).toBe(504);
    expect(statusCodeFor(ErrorCode.INTERNAL)).toBe(500);
  });
});

describe('CapbenchError', () => {
  it('should serialize to the API error body', () => {
    const error = new CapbenchError('boom', ErrorCode.CONFLICT, { nodeId: 'mongo1' });
    expect(error.toJSON()).toEqual({
      success: false,
      error: { code: 'CONFLICT', message: 'boom', details: { nodeId: 'mongo1' } },
    });
  });

  it('should omit empty details', () => {
    expect(new CapbenchError('boom').toJSON()).toEqual({
      success: false,
      error: { code: 'UNKNOWN', message: 'boom' },
    });
  });

  it('should carry a correlation id into the log form', () => {
    const error = new CapbenchError('boom').withCorrelationId('abc');
    expect(error.toLog().correlationId).toBe('abc');
  });
});

describe('ValidationError', () => {
  it('should keep every failure, including several on one field', () => {
    const error = new ValidationError([
      { field: 'names', message: 'Invalid node name: a b', code: 'INVALID_FORMAT' },
      { field: 'names', message: 'Invalid node name: c;d', code: 'INVALID_FORMAT' },
      { field: 'duration', message: 'bad', code: 'OUT_OF_RANGE' },
    ]);

    expect(error.statusCode).toBe(400);
    expect(error.meta).toEqual({ fields: ['names', 'duration'] });
    expect(error.toJSON()).toEqual({
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: {
          errors: [
            { field: 'names', message: 'Invalid node name: a b', code: 'INVALID_FORMAT' },
            { field: 'names', message: 'Invalid node name: c;d', code: 'INVALID_FORMAT' },
            { field: 'duration', message: 'bad', code: 'OUT_OF_RANGE' },
          ],
        },
      },
    });
  });
});

describe('scenario errors', () => {
  it('should describe unresolved networks', () => {
    const error = ResolutionError.network('db_net');
    expect(error.code).toBe(ErrorCode.NETWORK_UNRESOLVED);
    expect(error.message).toBe(
      'Network resolution failed: network db_net not found and no fallback network could be determined',
    );
  });

  it('should describe partition verification failures', () => {
    expect(new PartitionVerificationError('mongo1', 'db_net', false).message).toBe(
      'Disconnect failed - mongo1 still on network db_net',
    );
    expect(new PartitionVerificationError('mongo1', 'db_net', true).message).toBe(
      'Reconnect failed - mongo1 not on network db_net',
    );
  });

  it('should wrap the restoration cause', () => {
    const error = new RestorationError('cassandra1', new Error('no such container'));
    expect(error.message).toBe('Failed to restore cassandra1: no such container');
    expect(error.cause?.message).toBe('no such container');
  });

  it('should map timeout errors', () => {
    expect(new TaskTimeoutError(50).message).toBe('Task timed out after 50ms');
    expect(new TaskTimeoutError(50).statusCode).toBe(504);
  });

  it('should name the store of a failed probe', () => {
    const error = new ProbeError('storeA', 'insert failed', new Error('socket closed'));
    expect(error.code).toBe(ErrorCode.PROBE_FAILED);
    expect(error.toLog()).toMatchObject({ error: 'ProbeError', meta: { store: 'storeA' }, cause: 'socket closed' });
  });

  it('should report an unreachable orchestrator as unavailable', () => {
    expect(new OrchestratorUnavailableError('daemon down').statusCode).toBe(503);
  });
});

describe('wrapError', () => {
  it('should pass CapbenchErrors through', () => {
    const error = new TaskTimeoutError(10);
    expect(wrapError(error)).toBe(error);
  });

  it('should wrap plain errors and values', () => {
    expect(wrapError(new Error('x'), ErrorCode.INTERNAL).code).toBe(ErrorCode.INTERNAL);
    expect(wrapError('text').message).toBe('text');
    expect(errorMessage(42)).toBe('42');
  });
});
