/**
 * Unit tests for FileReportSink
 * @module @capbench/server/tests/unit/file-report-sink
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { FileReportSink, renderMarkdown } from '../../src';

describe('renderMarkdown', () => {
  it('should render the summary and one section per series', () => {
    const markdown = renderMarkdown(
      'performance',
      '20240501_120000',
      { totalOps: 100, errors: 0, errorRate: 0.25, failedStores: null },
      [
        { title: 'Latency', rows: [{ operation: 'insert', mongodb: 0.5, cassandra: 1 }] },
        { title: 'Throughput', rows: [{ db: 'MongoDB', throughput: 250 }] },
      ],
    );

    expect(markdown).toBe(
      [
        '# Performance Report (20240501_120000)',
        '',
        '## Summary',
        '- **totalOps**: 100',
        '- **errors**: 0',
        '- **errorRate**: 0.2500',
        '- **failedStores**: null',
        '',
        '## Latency',
        '- operation: insert | mongodb: 0.5000 | cassandra: 1',
        '',
        '## Throughput',
        '- db: MongoDB | throughput: 250',
        '',
      ].join('\n'),
    );
  });
});

describe('FileReportSink', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), 'capbench-sink-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('should write markdown and JSON and return the markdown path', async () => {
    const sink = new FileReportSink(path.join(directory, 'reports'));

    const saved = await sink.save('performance', '20240501_120000', { totalOps: 10 }, [
      { title: 'Throughput', rows: [{ db: 'Cassandra', throughput: 12.5 }] },
    ]);

    expect(saved).toBe(path.join(directory, 'reports', 'performance_20240501_120000.md'));
    const json: unknown = JSON.parse(
      await readFile(path.join(directory, 'reports', 'performance_20240501_120000.json'), 'utf-8'),
    );
    expect(json).toEqual({
      timestamp: '20240501_120000',
      summary: { totalOps: 10 },
      series: [{ title: 'Throughput', rows: [{ db: 'Cassandra', throughput: 12.5 }] }],
    });
  });

  it('should keep the detailed results in the JSON report', async () => {
    const sink = new FileReportSink(directory);
    const detailedResults = { cassandra: { batchCount: 2, latenciesByOp: { insert: [0.011, 0.009] } } };

    await sink.save('performance', '20240501_120000', { totalOps: 4 }, [], detailedResults);

    const json: unknown = JSON.parse(await readFile(path.join(directory, 'performance_20240501_120000.json'), 'utf-8'));
    expect(json).toEqual({
      timestamp: '20240501_120000',
      summary: { totalOps: 4 },
      series: [],
      detailedResults: { cassandra: { batchCount: 2, latenciesByOp: { insert: [0.011, 0.009] } } },
    });
  });

  it('should list report files newest first and ignore other files', async () => {
    const sink = new FileReportSink(directory);
    await sink.save('performance', '20240101_000000', {});
    await sink.save('performance', '20240301_000000', {});
    await writeFile(path.join(directory, 'notes.txt'), 'ignored');

    await expect(sink.list()).resolves.toEqual([
      'performance_20240301_000000.md',
      'performance_20240301_000000.json',
      'performance_20240101_000000.md',
      'performance_20240101_000000.json',
    ]);
    await expect(sink.latest()).resolves.toBe(path.join(directory, 'performance_20240301_000000.md'));
  });

  it('should report nothing for a missing directory', async () => {
    const sink = new FileReportSink(path.join(directory, 'missing'));

    await expect(sink.list()).resolves.toEqual([]);
    await expect(sink.latest()).resolves.toBeNull();
  });

  it('should read a report and refuse names outside the directory', async () => {
    const sink = new FileReportSink(directory);
    await sink.save('performance', '20240101_000000', { errors: 1 });

    const report = await sink.read('performance_20240101_000000.md');
    expect(report?.contentType).toBe('text/markdown');
    expect(report?.content).toContain('- **errors**: 1');

    await expect(sink.read('../secrets.json')).resolves.toBeNull();
    await expect(sink.read('missing.md')).resolves.toBeNull();
  });
});
