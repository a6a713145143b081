/**
 * Report sink writing markdown and JSON files
 * @module @capbench/server/reports/file-report-sink
 */

import { mkdir, readdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import type { ReportSeries, ReportSink, ReportSummary, ReportValue } from '@capbench/shared';
import { createServiceLogger, type Logger } from '@capbench/shared';

const REPORT_FILE_PATTERN = /^[A-Za-z0-9_.-]+\.(md|json)$/;

/**
 * Report file content
 */
export interface ReportFile {
  filename: string;
  contentType: 'text/markdown' | 'application/json';
  content: string;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function formatValue(value: ReportValue): string {
  if (typeof value === 'number' && !Number.isInteger(value)) {
    return value.toFixed(4);
  }
  return String(value);
}

/**
 * Render a report as markdown
 */
export function renderMarkdown(
  prefix: string,
  timestamp: string,
  summary: ReportSummary,
  series: readonly ReportSeries[],
): string {
  const title = prefix.charAt(0).toUpperCase() + prefix.slice(1);
  const lines = [`# ${title} Report (${timestamp})`, '', '## Summary'];
  for (const [key, value] of Object.entries(summary)) {
    lines.push(`- **${key}**: ${formatValue(value)}`);
  }

  for (const { title: seriesTitle, rows } of series) {
    lines.push('', `## ${seriesTitle}`);
    for (const row of rows) {
      lines.push(`- ${Object.entries(row).map(([key, value]) => `${key}: ${formatValue(value)}`).join(' | ')}`);
    }
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Writes `<prefix>_<timestamp>.md` and `.json` into one directory
 */
export class FileReportSink implements ReportSink {
  private readonly logger: Logger;

  constructor(
    readonly directory: string,
    logger?: Logger,
  ) {
    this.logger = logger ?? createServiceLogger({}, { component: 'report-sink' });
  }

  async save(
    prefix: string,
    timestamp: string,
    summary: ReportSummary,
    series: readonly ReportSeries[] = [],
    detailedResults?: unknown,
  ): Promise<string> {
    await mkdir(this.directory, { recursive: true });

    const markdownPath = path.join(this.directory, `${prefix}_${timestamp}.md`);
    const jsonPath = path.join(this.directory, `${prefix}_${timestamp}.json`);

    await writeFile(markdownPath, renderMarkdown(prefix, timestamp, summary, series), 'utf-8');
    const document = {
      timestamp,
      summary,
      series,
      ...(detailedResults !== undefined && { detailedResults }),
    };
    await writeFile(jsonPath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');

    this.logger.info('Report saved', { path: markdownPath });
    return markdownPath;
  }

  /**
   * Report file names, newest first
   */
  async list(): Promise<string[]> {
    try {
      const entries = await readdir(this.directory);
      return entries.filter((name) => REPORT_FILE_PATTERN.test(name)).sort().reverse();
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }
  }

  /**
   * Path of the newest markdown report
   */
  async latest(): Promise<string | null> {
    const newest = (await this.list()).find((name) => name.endsWith('.md'));
    return newest === undefined ? null : path.join(this.directory, newest);
  }

  /**
   * Read one report by file name; null when it does not exist
   */
  async read(filename: string): Promise<ReportFile | null> {
    if (!REPORT_FILE_PATTERN.test(filename) || filename.includes('..')) {
      return null;
    }
    try {
      const content = await readFile(path.join(this.directory, filename), 'utf-8');
      return {
        filename,
        contentType: filename.endsWith('.md') ? 'text/markdown' : 'application/json',
        content,
      };
    } catch (error) {
      if (isMissing(error)) return null;
      throw error;
    }
  }
}
