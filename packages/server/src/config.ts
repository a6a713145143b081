/**
 * Server configuration from environment variables
 * @module @capbench/server/config
 */

import type { LogLevel } from '@capbench/shared';
import {
  DEFAULT_MAX_SCENARIO_DURATION,
  createServiceLogger,
  isLogLevel,
  parseList,
  type Logger,
} from '@capbench/shared';

/**
 * Typed application configuration
 */
export interface AppConfig {
  /** HTTP port (default: 8000) */
  port: number;
  /** Hostname to bind to (default: '0.0.0.0') */
  host: string;
  /** CORS allowed origins; `*` wildcards allowed inside a pattern */
  corsOrigins: string[];
  logLevel: LogLevel;
  nodeEnv: 'development' | 'production' | 'test';
  mongo: {
    uri: string;
    database: string;
    nodes: string[];
  };
  cassandra: {
    contactPoints: string[];
    localDataCenter: string;
    keyspace: string;
    replicationFactor: number;
    nodes: string[];
  };
  orchestrator: {
    /** Well-known network used for partitions */
    network: string;
    binary: string;
    commandTimeoutMs: number;
    /** Never touch real infrastructure */
    forceSynthetic: boolean;
  };
  /** Upper bound of a scenario's monitoring duration in seconds */
  maxScenarioDuration: number;
  probeTimeoutMs: number;
  probePoolSize: number;
  tickIntervalMs: number;
  reportDir: string;
  rateLimit: {
    windowMs: number;
    max: number;
  };
}

/**
 * Environment variable source
 */
export type Env = Record<string, string | undefined>;

const DEFAULT_CORS_ORIGINS = 'http://localhost,http://localhost:*,http://127.0.0.1,http://127.0.0.1:*';

const NODE_ENVS: ReadonlyArray<AppConfig['nodeEnv']> = ['development', 'production', 'test'];

function isNodeEnv(value: string): value is AppConfig['nodeEnv'] {
  return NODE_ENVS.some((env) => env === value);
}

/**
 * Reads values out of one environment, warning about the ones it rejects
 */
class EnvReader {
  constructor(
    private readonly env: Env,
    private readonly logger: Logger,
  ) {}

  string(name: string, fallback: string): string {
    const value = this.env[name]?.trim();
    return value ? value : fallback;
  }

  list(name: string, fallback: string): string[] {
    const values = parseList(this.env[name] ?? '');
    return values.length > 0 ? values : parseList(fallback);
  }

  integer(name: string, fallback: number, min = 1, max = Number.MAX_SAFE_INTEGER): number {
    const raw = this.env[name]?.trim();
    if (!raw) return fallback;

    const value = /^-?\d+$/.test(raw) ? Number(raw) : Number.NaN;
    if (!Number.isSafeInteger(value) || value < min || value > max) {
      this.logger.warn('Invalid numeric configuration value, using default', { name, value: raw, default: fallback });
      return fallback;
    }
    return value;
  }

  boolean(name: string, fallback: boolean): boolean {
    const raw = this.env[name]?.trim().toLowerCase();
    if (!raw) return fallback;
    if (raw === 'true' || raw === '1') return true;
    if (raw === 'false' || raw === '0') return false;
    this.logger.warn('Invalid boolean configuration value, using default', { name, value: raw, default: fallback });
    return fallback;
  }
}

/**
 * Build the configuration from an environment
 */
export function loadConfig(env: Env = process.env, logger?: Logger): AppConfig {
  const reader = new EnvReader(env, logger ?? createServiceLogger({}, { component: 'config' }));

  const nodeEnv = reader.string('NODE_ENV', 'development');
  const logLevel = reader.string('LOG_LEVEL', 'info');

  return {
    port: reader.integer('PORT', 8000, 0, 65535),
    host: reader.string('HOST', '0.0.0.0'),
    corsOrigins: reader.list('CORS_ORIGINS', DEFAULT_CORS_ORIGINS),
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
    nodeEnv: isNodeEnv(nodeEnv) ? nodeEnv : 'development',
    mongo: {
      uri: reader.string('MONGO_URI', 'mongodb://mongo1:27017,mongo2:27017,mongo3:27017/?replicaSet=rs0'),
      database: reader.string('MONGO_DB', 'testDB'),
      nodes: reader.list('MONGO_NODES', 'mongo1,mongo2,mongo3'),
    },
    cassandra: {
      contactPoints: reader.list('CASSANDRA_CONTACT_POINTS', 'cassandra1,cassandra2,cassandra3'),
      localDataCenter: reader.string('CASSANDRA_LOCAL_DC', 'datacenter1'),
      keyspace: reader.string('CASSANDRA_KEYSPACE', 'testkeyspace'),
      replicationFactor: reader.integer('CASSANDRA_REPLICATION_FACTOR', 3),
      nodes: reader.list('CASSANDRA_NODES', 'cassandra1,cassandra2,cassandra3'),
    },
    orchestrator: {
      network: reader.string('DOCKER_NETWORK', 'distributed_db_network'),
      binary: reader.string('DOCKER_BINARY', 'docker'),
      commandTimeoutMs: reader.integer('DOCKER_COMMAND_TIMEOUT_MS', 30_000),
      forceSynthetic: reader.boolean('SYNTHETIC_MODE', false),
    },
    maxScenarioDuration: reader.integer('MAX_SCENARIO_DURATION', DEFAULT_MAX_SCENARIO_DURATION),
    probeTimeoutMs: reader.integer('PROBE_TIMEOUT_MS', 5000),
    probePoolSize: reader.integer('PROBE_POOL_SIZE', 4),
    tickIntervalMs: reader.integer('TICK_INTERVAL_MS', 1000, 0),
    reportDir: reader.string('REPORT_DIR', 'logs/performance_reports'),
    rateLimit: {
      windowMs: reader.integer('RATE_LIMIT_WINDOW_MS', 60_000),
      max: reader.integer('RATE_LIMIT_MAX', 30),
    },
  };
}
