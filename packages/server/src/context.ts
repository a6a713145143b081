/**
 * Application context: the components one server instance owns
 * @module @capbench/server/context
 */

import type { StoreDefinition, StoreDriver } from '@capbench/shared';
import { CASSANDRA_STORE_ID, MONGODB_STORE_ID, createServiceLogger, type Logger } from '@capbench/shared';
import {
  CassandraStore,
  DockerBackend,
  ExecFileCommandRunner,
  FailureScenarioRunner,
  InfrastructureController,
  MetricsCollector,
  MongoStore,
  NodeLockManager,
  PerformanceBenchmarkRunner,
  ScenarioRegistry,
  StoreProbe,
  TaskPool,
  type MonitoredStore,
  type OrchestratorBackend,
} from '@capbench/core';
import type { AppConfig } from './config.js';
import { FileReportSink } from './reports/file-report-sink.js';

/**
 * Components shared by the HTTP handlers
 */
export interface AppContext {
  config: AppConfig;
  stores: StoreDefinition[];
  drivers: StoreDriver[];
  controller: InfrastructureController;
  scenarioRunner: FailureScenarioRunner;
  benchmarkRunner: PerformanceBenchmarkRunner;
  registry: ScenarioRegistry;
  locks: NodeLockManager;
  metrics: MetricsCollector;
  reports: FileReportSink;
  /** Release store connections */
  close(): Promise<void>;
}

/**
 * Replaceable collaborators
 */
export interface AppContextOverrides {
  drivers?: StoreDriver[];
  /** Orchestrator backend tried before the synthetic fallback */
  liveBackend?: OrchestratorBackend;
  /** Fallback backend */
  syntheticBackend?: OrchestratorBackend;
  reports?: FileReportSink;
  logger?: Logger;
}

/**
 * Store definitions of the deployed pair
 */
export function storeDefinitions(config: AppConfig): StoreDefinition[] {
  return [
    { id: MONGODB_STORE_ID, label: 'MongoDB', nodePrefix: 'mongo', nodes: config.mongo.nodes },
    { id: CASSANDRA_STORE_ID, label: 'Cassandra', nodePrefix: 'cassandra', nodes: config.cassandra.nodes },
  ];
}

function createDrivers(config: AppConfig): StoreDriver[] {
  return [
    new MongoStore({
      id: MONGODB_STORE_ID,
      uri: config.mongo.uri,
      database: config.mongo.database,
      timeoutMs: config.probeTimeoutMs,
    }),
    new CassandraStore({
      id: CASSANDRA_STORE_ID,
      contactPoints: config.cassandra.contactPoints,
      localDataCenter: config.cassandra.localDataCenter,
      keyspace: config.cassandra.keyspace,
      replicationFactor: config.cassandra.replicationFactor,
      timeoutMs: config.probeTimeoutMs,
    }),
  ];
}

/**
 * Wire the controller, runners and stores for one server
 */
export function createAppContext(config: AppConfig, overrides: AppContextOverrides = {}): AppContext {
  const logger = overrides.logger ?? createServiceLogger({ level: config.logLevel }, { component: 'context' });
  const stores = storeDefinitions(config);
  const drivers = overrides.drivers ?? createDrivers(config);

  const controller = new InfrastructureController({
    live:
      overrides.liveBackend ??
      new DockerBackend(new ExecFileCommandRunner(config.orchestrator.commandTimeoutMs), {
        binary: config.orchestrator.binary,
        commandTimeoutMs: config.orchestrator.commandTimeoutMs,
      }),
    synthetic: overrides.syntheticBackend,
    network: config.orchestrator.network,
    forceMode: config.orchestrator.forceSynthetic ? 'synthetic' : undefined,
  });

  const probePool = new TaskPool({ maxConcurrency: config.probePoolSize, taskTimeout: config.probeTimeoutMs });
  const monitored: MonitoredStore[] = [];
  for (const definition of stores) {
    const driver = drivers.find((candidate) => candidate.id === definition.id);
    if (!driver) {
      logger.warn('No driver for store, it will not be monitored', { store: definition.id });
      continue;
    }
    monitored.push({
      definition,
      probe: new StoreProbe(driver, { timeoutMs: config.probeTimeoutMs, pool: probePool }),
    });
  }

  const locks = new NodeLockManager();
  const scenarioRunner = new FailureScenarioRunner({
    controller,
    stores: monitored,
    locks,
    tickIntervalMs: config.tickIntervalMs,
  });
  const registry = new ScenarioRegistry();
  registry.attach(scenarioRunner);

  const benchmarkRunner = new PerformanceBenchmarkRunner({
    drivers,
    pool: new TaskPool({ maxConcurrency: config.probePoolSize }),
  });

  logger.info('Application context created', {
    stores: stores.map((store) => store.id),
    network: config.orchestrator.network,
    forceSynthetic: config.orchestrator.forceSynthetic,
  });

  return {
    config,
    stores,
    drivers,
    controller,
    scenarioRunner,
    benchmarkRunner,
    registry,
    locks,
    metrics: new MetricsCollector(),
    reports: overrides.reports ?? new FileReportSink(config.reportDir),
    close: async () => {
      await Promise.all(drivers.map((driver) => driver.close()));
      logger.info('Store connections closed');
    },
  };
}
