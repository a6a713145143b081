/**
 * Unit tests for the dashboard summary handler
 * @module @capbench/server/tests/unit/api-dashboard
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createDashboardHandlers, type DashboardHandlers } from '../../src';
import { createTestContext, type TestContext } from '../helpers/context';
import { createMockRequest, createMockResponse } from '../helpers/express-mocks';

const SYNTHETIC_UPTIME = { seconds: 3600, hours: 1, status: 'synthetic' };

describe('Dashboard API', () => {
  let test: TestContext;
  let handlers: DashboardHandlers;

  beforeEach(async () => {
    test = await createTestContext();
    handlers = createDashboardHandlers(test.ctx);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await test.cleanup();
  });

  it('should gather controller, stores, uptimes and host figures', async () => {
    const res = createMockResponse();

    await handlers.summary(createMockRequest(), res);

    expect(res._status).toBe(200);
    expect(res._json).toMatchObject({
      success: true,
      controller: { status: 'healthy', mode: 'synthetic', activeScenarios: 0 },
      stores: {
        mongodb: { status: 'connected' },
        cassandra: { status: 'connected' },
      },
      uptimes: {
        mongo1: SYNTHETIC_UPTIME,
        mongo2: SYNTHETIC_UPTIME,
        mongo3: SYNTHETIC_UPTIME,
        cassandra1: SYNTHETIC_UPTIME,
        cassandra2: SYNTHETIC_UPTIME,
        cassandra3: SYNTHETIC_UPTIME,
      },
      liveMetrics: {
        timestamp: expect.any(String),
        cpuPercent: expect.any(Number),
        memoryPercent: expect.any(Number),
      },
    });
  });

  it('should report a store that refuses connections on its own', async () => {
    test.mongo.failNext('connect', 'authentication failed');
    const res = createMockResponse();

    await handlers.summary(createMockRequest(), res);

    expect(res._json).toMatchObject({
      controller: { status: 'healthy' },
      stores: {
        mongodb: { status: 'error', message: 'authentication failed' },
        cassandra: { status: 'connected' },
      },
    });
  });

  it('should degrade each failing part without failing the summary', async () => {
    vi.spyOn(test.cassandra, 'connect').mockRejectedValue(new Error('socket hang up'));
    vi.spyOn(test.ctx.controller, 'mode').mockRejectedValue(new Error('daemon gone'));
    vi.spyOn(test.ctx.controller, 'uptimes').mockRejectedValue(new Error('inspect failed'));
    const res = createMockResponse();

    await handlers.summary(createMockRequest(), res);

    expect(res._status).toBe(200);
    expect(res._json).toMatchObject({
      success: true,
      controller: { status: 'error', message: 'daemon gone' },
      stores: {
        mongodb: { status: 'connected' },
        cassandra: { status: 'error', message: 'socket hang up' },
      },
    });
    expect(res._json).toHaveProperty('uptimes', {});
  });
});
