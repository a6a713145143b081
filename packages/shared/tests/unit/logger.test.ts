/**
 * Unit tests for the structured logger
 * @module @capbench/shared/tests/unit/logger
 */

import { describe, it, expect } from 'vitest';
import { createLogger, isLogLevel, type LogEntry } from '../../src';

function capture(): { entries: LogEntry[]; output: (entry: LogEntry) => void } {
  const entries: LogEntry[] = [];
  return { entries, output: (entry) => entries.push(entry) };
}

describe('Logger', () => {
  it('should drop entries below the configured level', () => {
    const { entries, output } = capture();
    const logger = createLogger({ level: 'warn', output });

    logger.info('ignored');
    logger.warn('kept');

    expect(entries.map((entry) => [entry.level, entry.message])).toEqual([['warn', 'kept']]);
  });

  it('should carry scenario and correlation IDs into child loggers', () => {
    const { entries, output } = capture();
    const logger = createLogger({ level: 'debug', output, component: 'runner' });

    logger.withCorrelationId('corr-1').withScenarioId('scn-1').debug('Phase changed', { phase: 'monitoring' });

    expect(entries[0]?.meta).toEqual({
      component: 'runner',
      service: undefined,
      correlationId: 'corr-1',
      scenarioId: 'scn-1',
      phase: 'monitoring',
    });
  });

  it('should record the error name, message and code', () => {
    const { entries, output } = capture();
    const logger = createLogger({ level: 'info', output });
    const error = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });

    logger.error('Probe failed', error);

    expect(entries[0]?.error).toMatchObject({ name: 'Error', message: 'socket hang up', code: 'ECONNRESET' });
  });
});

describe('isLogLevel', () => {
  it('should accept known levels only', () => {
    expect(isLogLevel('fatal')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
