/**
 * capbench Server
 *
 * Entry point for the HTTP REST API.
 * @module @capbench/server
 */

import http from 'http';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import express, { type Express } from 'express';
import cors, { type CorsOptions } from 'cors';
import { createServiceLogger } from '@capbench/shared';
import { createApiRouter } from './api/router.js';
import { loadConfig, type AppConfig } from './config.js';
import { createAppContext, type AppContext, type AppContextOverrides } from './context.js';

const logger = createServiceLogger({}, { component: 'server' });

// ============================================================================
// CORS Configuration
// ============================================================================

/**
 * Whether an origin matches one of the allowed patterns (`*` wildcards)
 */
export function isOriginAllowed(origin: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => {
    if (pattern === '*') return true;
    if (pattern.includes('*')) {
      const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*');
      return new RegExp(`^${escaped}$`).test(origin);
    }
    return pattern === origin;
  });
}

/**
 * Create CORS configuration for browser clients
 */
function createCorsConfig(origins: string[]): CorsOptions {
  return {
    origin: (origin, callback) => {
      // Requests without an origin (curl, server-to-server)
      if (!origin || isOriginAllowed(origin, origins)) {
        callback(null, true);
        return;
      }
      callback(new Error(`Origin ${origin} not allowed by CORS`));
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Correlation-ID'],
    exposedHeaders: ['X-Correlation-ID'],
    maxAge: 86400,
  };
}

// ============================================================================
// Server Instance
// ============================================================================

/**
 * Server instance
 */
export interface ServerInstance {
  app: Express;
  httpServer: http.Server;
  context: AppContext;
  config: AppConfig;
  start: () => Promise<void>;
  /** Abort running scenarios, close the listener and the store connections */
  stop: () => Promise<void>;
}

/**
 * Create and configure the server
 */
export function createServer(config: AppConfig = loadConfig(), overrides: AppContextOverrides = {}): ServerInstance {
  logger.info('Creating server', {
    port: config.port,
    host: config.host,
    nodeEnv: config.nodeEnv,
    network: config.orchestrator.network,
  });

  const context = createAppContext(config, overrides);

  const app = express();
  app.set('trust proxy', true);
  app.use(express.json({ limit: '1mb' }));
  app.use(cors(createCorsConfig(config.corsOrigins)));
  app.use(createApiRouter(context));

  const httpServer = http.createServer(app);

  return {
    app,
    httpServer,
    context,
    config,

    start: () =>
      new Promise<void>((resolveStart, reject) => {
        httpServer.once('error', (error) => {
          logger.error('Server error', error);
          reject(error);
        });
        httpServer.listen(config.port, config.host, () => {
          logger.info('HTTP server started', { url: `http://${config.host}:${config.port}` });
          resolveStart();
        });
      }),

    stop: async () => {
      logger.info('Stopping server...');
      const aborted = context.registry.abortAll('Server shutting down');
      if (aborted.length > 0) {
        logger.warn('Aborted running scenarios', { scenarios: aborted });
      }

      await new Promise<void>((resolveStop, reject) => {
        httpServer.close((error) => {
          if (error) {
            logger.error('Error closing HTTP server', error);
            reject(error);
            return;
          }
          resolveStop();
        });
      });
      await context.close();
      logger.info('Server stopped');
    },
  };
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const server = createServer();

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down`);
    try {
      await server.stop();
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', error instanceof Error ? error : undefined);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', reason instanceof Error ? reason : new Error(String(reason)));
  });

  try {
    await server.start();
  } catch (error) {
    logger.error('Failed to start server', error instanceof Error ? error : undefined);
    process.exit(1);
  }
}

const currentFile = fileURLToPath(import.meta.url);
const entryFile = resolve(process.argv[1] ?? '');
if (currentFile === entryFile) {
  void main();
}

// ============================================================================
// Exports
// ============================================================================

export * from './api/index.js';
export * from './middleware/index.js';
export { loadConfig, type AppConfig, type Env } from './config.js';
export { createAppContext, storeDefinitions, type AppContext, type AppContextOverrides } from './context.js';
export { FileReportSink, renderMarkdown, type ReportFile } from './reports/file-report-sink.js';
