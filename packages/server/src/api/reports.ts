/**
 * Report listing REST API Endpoints
 * @module @capbench/server/api/reports
 */

import { Router, type Request, type Response } from 'express';
import { createServiceLogger } from '@capbench/shared';
import type { AppContext } from '../context.js';
import { requestLoggerFor, sendError, sendFailure, sendSuccess } from './responses.js';

const logger = createServiceLogger({}, { component: 'api-reports' });

export interface ReportHandlers {
  list(req: Request, res: Response): Promise<void>;
  latest(req: Request, res: Response): Promise<void>;
  read(req: Request, res: Response): Promise<void>;
}

export function createReportHandlers(ctx: AppContext): ReportHandlers {
  /**
   * GET /api/reports - Report files, newest first
   */
  async function list(_req: Request, res: Response): Promise<void> {
    try {
      sendSuccess(res, { reports: await ctx.reports.list() });
    } catch (error) {
      requestLoggerFor(logger, res).error('Failed to list reports', error instanceof Error ? error : undefined);
      sendFailure(res, error, 'Failed to list reports');
    }
  }

  /**
   * GET /api/reports/latest - Path of the newest report
   */
  async function latest(_req: Request, res: Response): Promise<void> {
    try {
      const path = await ctx.reports.latest();
      if (path === null) {
        sendError(res, 'NOT_FOUND', 'No reports found', 404);
        return;
      }
      sendSuccess(res, { latest: path });
    } catch (error) {
      requestLoggerFor(logger, res).error('Failed to find latest report', error instanceof Error ? error : undefined);
      sendFailure(res, error, 'Failed to find latest report');
    }
  }

  /**
   * GET /api/reports/:filename - One report's content
   */
  async function read(req: Request, res: Response): Promise<void> {
    const filename = req.params.filename ?? '';
    try {
      const report = await ctx.reports.read(filename);
      if (!report) {
        sendError(res, 'NOT_FOUND', 'Report not found', 404, { filename });
        return;
      }
      res.status(200).type(report.contentType).send(report.content);
    } catch (error) {
      requestLoggerFor(logger, res).error('Failed to read report', error instanceof Error ? error : undefined);
      sendFailure(res, error, 'Failed to read report');
    }
  }

  return { list, latest, read };
}

/**
 * Create the reports router
 */
export function createReportsRouter(ctx: AppContext): Router {
  const router = Router();
  const handlers = createReportHandlers(ctx);

  router.get('/', handlers.list);
  router.get('/latest', handlers.latest);
  router.get('/:filename', handlers.read);

  return router;
}
