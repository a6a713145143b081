/**
 * Unit tests for the failure testing API handlers
 * @module @capbench/server/tests/unit/api-failure
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CAP_REFERENCE } from '@capbench/shared';
import { createFailureHandlers, type FailureHandlers } from '../../src';
import { createTestContext, type TestContext } from '../helpers/context';
import { createMockRequest, createMockResponse } from '../helpers/express-mocks';

describe('Failure API', () => {
  let test: TestContext;
  let handlers: FailureHandlers;

  beforeEach(async () => {
    test = await createTestContext();
    handlers = createFailureHandlers(test.ctx);
  });

  afterEach(async () => {
    await test.cleanup();
  });

  describe('POST /api/failure/simulate', () => {
    it('should run a node failure in synthetic mode and summarize it', async () => {
      const req = createMockRequest({ body: { failureType: 'node', targetNode: 'mongo1', duration: 2 } });
      const res = createMockResponse();

      await handlers.simulate(req, res);

      expect(res._status).toBe(200);
      expect(res._json).toMatchObject({
        success: true,
        summary: {
          failureType: 'node',
          targetNode: 'mongo1',
          duration: 2,
          downtime: { mongodb: 2, cassandra: 0 },
          dataLoss: { mongodb: 0, cassandra: 0 },
          recoveryTime: 1,
          recoveryComplete: true,
          mode: 'synthetic',
          outcome: 'success',
          aborted: false,
        },
        recoveryMetrics: [{ time: '0s', mongodb: 100, cassandra: 100 }],
        availabilityMetrics: [
          {
            time: '0s',
            mongodb: { success: false, latency: null, error: 'Node down' },
            cassandra: { success: true, error: null },
          },
          {
            time: '1s',
            mongodb: { success: false, latency: null, error: 'Node down' },
            cassandra: { success: true, error: null },
          },
        ],
      });
      expect(test.ctx.metrics.runCounters()).toEqual({ scenariosStarted: 1, scenariosFailed: 0, benchmarksRun: 0 });
      expect(test.ctx.registry.recent()).toHaveLength(1);
    });

    it('should reject a request without a target node', async () => {
      const req = createMockRequest({ body: { failureType: 'node' } });
      const res = createMockResponse();

      await handlers.simulate(req, res);

      expect(res._status).toBe(400);
      expect(res._json).toEqual({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Validation failed',
          details: { errors: [{ field: 'targetNode', code: 'REQUIRED', message: 'Target node is required' }] },
        },
      });
      expect(test.ctx.metrics.runCounters().scenariosStarted).toBe(0);
    });

    it('should reject a duration above the configured maximum', async () => {
      const req = createMockRequest({ body: { targetNode: 'mongo1', duration: 301 } });
      const res = createMockResponse();

      await handlers.simulate(req, res);

      expect(res._status).toBe(400);
      expect(res._json).toMatchObject({
        error: { details: { errors: [expect.objectContaining({ field: 'duration', code: 'OUT_OF_RANGE' })] } },
      });
    });

    it('should answer 422 for a node outside the monitored stores', async () => {
      const req = createMockRequest({ body: { targetNode: 'redis1', duration: 1 } });
      const res = createMockResponse();

      await handlers.simulate(req, res);

      expect(res._status).toBe(422);
      expect(res._json).toMatchObject({
        success: false,
        error: {
          code: 'TARGET_UNRESOLVED',
          message: 'Cannot resolve target node redis1: node does not belong to a monitored store',
        },
        summary: { outcome: 'failed', downtime: { mongodb: 0, cassandra: 0 } },
        availabilityMetrics: [],
      });
      expect(test.ctx.metrics.runCounters()).toEqual({ scenariosStarted: 1, scenariosFailed: 1, benchmarksRun: 0 });
    });

    it('should partition the configured network and reconnect the node', async () => {
      const req = createMockRequest({ body: { failureType: 'network', targetNode: 'cassandra2', duration: 1 } });
      const res = createMockResponse();

      await handlers.simulate(req, res);

      expect(res._status).toBe(200);
      expect(res._json).toMatchObject({
        summary: { failureType: 'network', downtime: { mongodb: 0, cassandra: 1 }, outcome: 'success' },
        recoveryMetrics: [],
        detailedResults: { network: 'db_net' },
      });
      const status = await test.synthetic.inspect('cassandra2');
      expect(status.networks).toEqual(['db_net']);
    });
  });

  describe('GET /api/failure/container-uptimes', () => {
    it('should report the uptime of each named node', async () => {
      const req = createMockRequest({ query: { names: 'mongo1, cassandra2' } });
      const res = createMockResponse();

      await handlers.containerUptimes(req, res);

      expect(res._status).toBe(200);
      expect(res._json).toEqual({
        success: true,
        mode: 'synthetic',
        uptimes: {
          mongo1: { seconds: 3600, hours: 1, status: 'synthetic' },
          cassandra2: { seconds: 3600, hours: 1, status: 'synthetic' },
        },
      });
    });

    it('should require at least one name', async () => {
      const req = createMockRequest({ query: {} });
      const res = createMockResponse();

      await handlers.containerUptimes(req, res);

      expect(res._status).toBe(400);
      expect(res._json).toEqual({
        success: false,
        error: { code: 'VALIDATION_ERROR', message: 'No container names provided' },
      });
    });

    it('should reject malformed names', async () => {
      const req = createMockRequest({ query: { names: 'mongo1,-bad' } });
      const res = createMockResponse();

      await handlers.containerUptimes(req, res);

      expect(res._status).toBe(400);
      expect(res._json).toMatchObject({
        error: {
          details: { errors: [{ field: 'names', code: 'INVALID_FORMAT', message: 'Invalid node name: -bad' }] },
        },
      });
    });

    it('should report every malformed name', async () => {
      const req = createMockRequest({ query: { names: '-bad,mongo1,-worse' } });
      const res = createMockResponse();

      await handlers.containerUptimes(req, res);

      expect(res._status).toBe(400);
      expect(res._json).toEqual({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Validation failed',
          details: {
            errors: [
              { field: 'names', code: 'INVALID_FORMAT', message: 'Invalid node name: -bad' },
              { field: 'names', code: 'INVALID_FORMAT', message: 'Invalid node name: -worse' },
            ],
          },
        },
      });
    });
  });

  describe('POST /api/failure/stop', () => {
    it('should restart stopped nodes', async () => {
      await test.ctx.controller.stop('cassandra2');
      const res = createMockResponse();

      await handlers.stop(createMockRequest(), res);

      expect(res._status).toBe(200);
      expect(res._json).toEqual({
        success: true,
        message: 'Restoration complete',
        mode: 'synthetic',
        aborted: [],
        restored: ['cassandra2'],
      });
      expect(await test.ctx.controller.status('cassandra2')).toBe('running');
    });
  });

  describe('GET /api/failure/cap-analysis', () => {
    it('should return the reference scorecards', async () => {
      const res = createMockResponse();

      await handlers.capAnalysis(createMockRequest(), res);

      expect(res._json).toEqual({ success: true, ...CAP_REFERENCE });
    });
  });

  describe('GET /api/failure/status', () => {
    it('should report no mode before the orchestrator was contacted', async () => {
      const res = createMockResponse();

      await handlers.status(createMockRequest(), res);

      expect(res._json).toEqual({
        success: true,
        mode: null,
        active: [],
        lockedNodes: [],
        recent: [],
        counters: { scenariosStarted: 0, scenariosFailed: 0, benchmarksRun: 0 },
      });
    });

    it('should list finished scenarios', async () => {
      await handlers.simulate(
        createMockRequest({ body: { targetNode: 'mongo2', duration: 1 } }),
        createMockResponse(),
      );
      const res = createMockResponse();

      await handlers.status(createMockRequest(), res);

      expect(res._json).toMatchObject({
        mode: 'synthetic',
        active: [],
        recent: [{ kind: 'node-failure', targets: ['mongo2'], outcome: 'success' }],
      });
    });
  });
});
