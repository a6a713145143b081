/**
 * Infrastructure controller: node and network operations with verification
 * and a one-time fallback to the synthetic backend
 * @module @capbench/core/infrastructure/infrastructure-controller
 */

import { EventEmitter } from 'events';
import type {
  ExecutionMode,
  NodeStatus,
  NodeUptime,
  NodeUptimeError,
  NodeUptimeReport,
  RunState,
} from '@capbench/shared';
import {
  OrchestratorUnavailableError,
  PartitionVerificationError,
  ResolutionError,
  createServiceLogger,
  errorMessage,
  type Logger,
} from '@capbench/shared';
import type { OrchestratorBackend } from './orchestrator-backend';
import { SyntheticBackend } from './synthetic-backend';

/**
 * Controller configuration
 */
export interface InfrastructureControllerConfig {
  /** Backend used when reachable */
  live: OrchestratorBackend;
  /** Fallback backend (default: SyntheticBackend attached to `network`) */
  synthetic?: OrchestratorBackend;
  /** Well-known network used for partitions */
  network: string;
  /** Skip the live backend entirely */
  forceMode?: ExecutionMode;
  logger?: Logger;
}

/**
 * Wraps an orchestrator backend. The first call pings the live backend once;
 * when it is unreachable every later call goes to the synthetic backend.
 *
 * Events: `mode` (ExecutionMode) once the backend is selected.
 */
export class InfrastructureController extends EventEmitter {
  private readonly live: OrchestratorBackend;
  private readonly synthetic: OrchestratorBackend;
  private readonly network: string;
  private readonly logger: Logger;
  private backend: OrchestratorBackend | null = null;
  private initialization: Promise<OrchestratorBackend> | null = null;

  constructor(config: InfrastructureControllerConfig) {
    super();
    this.live = config.live;
    this.network = config.network;
    this.synthetic = config.synthetic ?? new SyntheticBackend({ networks: [config.network] });
    this.logger = config.logger ?? createServiceLogger({}, { component: 'infrastructure-controller' });

    if (config.forceMode) {
      this.forceMode(config.forceMode);
    }
  }

  /**
   * Pin the controller to one backend
   */
  forceMode(mode: ExecutionMode): void {
    const backend = mode === 'live' ? this.live : this.synthetic;
    this.backend = backend;
    this.initialization = Promise.resolve(backend);
    this.logger.info('Execution mode forced', { mode });
    this.emit('mode', mode);
  }

  /**
   * Execution mode, selecting the backend if needed
   */
  async mode(): Promise<ExecutionMode> {
    return (await this.getBackend()).mode;
  }

  /**
   * Execution mode if already selected
   */
  currentMode(): ExecutionMode | null {
    return this.backend?.mode ?? null;
  }

  /**
   * Configured well-known network
   */
  get configuredNetwork(): string {
    return this.network;
  }

  async stop(nodeId: string): Promise<void> {
    const backend = await this.getBackend();
    this.logger.info('Stopping node', { nodeId, mode: backend.mode });
    await backend.stop(nodeId);
  }

  async start(nodeId: string): Promise<void> {
    const backend = await this.getBackend();
    this.logger.info('Starting node', { nodeId, mode: backend.mode });
    await backend.start(nodeId);
  }

  /**
   * Live node status. Never cached.
   */
  async inspect(nodeId: string): Promise<NodeStatus> {
    const backend = await this.getBackend();
    return backend.inspect(nodeId);
  }

  /**
   * Run state of a node; `unknown` when it cannot be inspected
   */
  async status(nodeId: string): Promise<RunState> {
    try {
      return (await this.inspect(nodeId)).state;
    } catch (error) {
      this.logger.warn('Status check failed', { nodeId, error: errorMessage(error) });
      return 'unknown';
    }
  }

  /**
   * Detach a node from a network and verify it no longer lists it
   */
  async disconnect(nodeId: string, network: string): Promise<void> {
    const backend = await this.getBackend();
    this.logger.info('Disconnecting node', { nodeId, network, mode: backend.mode });
    await backend.disconnect(nodeId, network);

    const after = await backend.inspect(nodeId);
    if (after.networks.includes(network)) {
      throw new PartitionVerificationError(nodeId, network, false);
    }
  }

  /**
   * Attach a node to a network and verify it lists it
   */
  async connect(nodeId: string, network: string): Promise<void> {
    const backend = await this.getBackend();
    this.logger.info('Connecting node', { nodeId, network, mode: backend.mode });
    await backend.connect(nodeId, network);

    const after = await backend.inspect(nodeId);
    if (!after.networks.includes(network)) {
      throw new PartitionVerificationError(nodeId, network, true);
    }
  }

  /**
   * Uptime of a node, or the lookup error
   */
  async uptime(nodeId: string): Promise<NodeUptime | NodeUptimeError> {
    try {
      const backend = await this.getBackend();
      return await backend.uptime(nodeId);
    } catch (error) {
      return { error: errorMessage(error) };
    }
  }

  /**
   * Uptimes of several nodes keyed by node
   */
  async uptimes(nodeIds: readonly string[]): Promise<NodeUptimeReport> {
    const entries = await Promise.all(
      nodeIds.map(async (nodeId) => [nodeId, await this.uptime(nodeId)] as const),
    );
    return Object.fromEntries(entries);
  }

  /**
   * Network to partition on: the configured network when it exists,
   * otherwise the first network the first target is attached to.
   */
  async resolveNetwork(targets: readonly string[]): Promise<string> {
    const backend = await this.getBackend();

    try {
      if (await backend.networkExists(this.network)) {
        return this.network;
      }
      this.logger.warn('Configured network not found', { network: this.network });
    } catch (error) {
      this.logger.warn('Configured network lookup failed', { network: this.network, error: errorMessage(error) });
    }

    const first = targets[0];
    if (first === undefined) {
      throw ResolutionError.network(this.network);
    }

    try {
      const status = await backend.inspect(first);
      const fallback = status.networks[0];
      if (fallback !== undefined) {
        this.logger.info('Using network of first target', { network: fallback, nodeId: first });
        return fallback;
      }
    } catch (error) {
      throw ResolutionError.network(this.network, error instanceof Error ? error : undefined);
    }

    throw ResolutionError.network(this.network);
  }

  private getBackend(): Promise<OrchestratorBackend> {
    if (this.backend) {
      return Promise.resolve(this.backend);
    }
    if (!this.initialization) {
      this.initialization = this.selectBackend();
    }
    return this.initialization;
  }

  private async selectBackend(): Promise<OrchestratorBackend> {
    let selected: OrchestratorBackend;
    try {
      await this.live.ping();
      selected = this.live;
      this.logger.info('Orchestrator reachable', { mode: selected.mode });
    } catch (error) {
      selected = this.synthetic;
      const unavailable = new OrchestratorUnavailableError(
        errorMessage(error),
        error instanceof Error ? error : undefined,
      );
      this.logger.warn('Orchestrator unreachable, switching to synthetic mode', {
        error: unavailable.toLog(),
      });
    }
    this.backend = selected;
    this.emit('mode', selected.mode);
    return selected;
  }
}
