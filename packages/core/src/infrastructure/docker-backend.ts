/**
 * Docker CLI orchestrator backend
 * @module @capbench/core/infrastructure/docker-backend
 */

import type { NodeStatus, NodeUptime } from '@capbench/shared';
import { OrchestratorCommandError, errorMessage, isPlainObject, round } from '@capbench/shared';
import type { CommandRunner } from './command-runner';
import type { OrchestratorBackend } from './orchestrator-backend';

/**
 * Docker backend configuration
 */
export interface DockerBackendConfig {
  /** Docker executable (default: 'docker') */
  binary?: string;
  /** Timeout for each CLI call in milliseconds (default: 30000) */
  commandTimeoutMs?: number;
  /** Clock used to compute uptimes */
  now?: () => number;
}

/** Docker reports this start time for containers that never started */
const ZERO_TIME_PREFIX = '0001-01-01';

const NOT_FOUND_PATTERN = /no such (object|container|network)/i;
const NOT_CONNECTED_PATTERN = /is not connected/i;
const ALREADY_CONNECTED_PATTERN = /already exists in network|already connected/i;

/**
 * Drives containers and networks through the docker CLI
 */
export class DockerBackend implements OrchestratorBackend {
  readonly mode = 'live' as const;
  private readonly binary: string;
  private readonly commandTimeoutMs: number;
  private readonly now: () => number;

  constructor(private readonly runner: CommandRunner, config: DockerBackendConfig = {}) {
    this.binary = config.binary ?? 'docker';
    this.commandTimeoutMs = config.commandTimeoutMs ?? 30_000;
    this.now = config.now ?? Date.now;
  }

  async ping(): Promise<void> {
    await this.exec(['version', '--format', '{{.Server.Version}}']);
  }

  async stop(nodeId: string): Promise<void> {
    await this.exec(['stop', nodeId]);
  }

  async start(nodeId: string): Promise<void> {
    await this.exec(['start', nodeId]);
  }

  async inspect(nodeId: string): Promise<NodeStatus> {
    let stdout: string;
    try {
      ({ stdout } = await this.exec(['inspect', '--type', 'container', nodeId]));
    } catch (error) {
      if (NOT_FOUND_PATTERN.test(errorMessage(error))) {
        return { nodeId, state: 'unknown', networks: [], startedAt: null };
      }
      throw error;
    }
    return parseContainerInspect(nodeId, stdout);
  }

  async networkExists(network: string): Promise<boolean> {
    try {
      await this.exec(['network', 'inspect', network]);
      return true;
    } catch (error) {
      if (NOT_FOUND_PATTERN.test(errorMessage(error))) {
        return false;
      }
      throw error;
    }
  }

  async disconnect(nodeId: string, network: string): Promise<void> {
    try {
      await this.exec(['network', 'disconnect', network, nodeId]);
    } catch (error) {
      if (!NOT_CONNECTED_PATTERN.test(errorMessage(error))) {
        throw error;
      }
    }
  }

  async connect(nodeId: string, network: string): Promise<void> {
    try {
      await this.exec(['network', 'connect', network, nodeId]);
    } catch (error) {
      if (!ALREADY_CONNECTED_PATTERN.test(errorMessage(error))) {
        throw error;
      }
    }
  }

  async uptime(nodeId: string): Promise<NodeUptime> {
    const status = await this.inspect(nodeId);
    if (status.state === 'unknown') {
      throw new OrchestratorCommandError('docker inspect', `No such container: ${nodeId}`, { nodeId });
    }
    if (!status.startedAt) {
      throw new OrchestratorCommandError('docker inspect', 'No start time', { nodeId });
    }
    const seconds = Math.max(0, Math.floor((this.now() - status.startedAt.getTime()) / 1000));
    return { seconds, hours: round(seconds / 3600), status: status.rawStatus ?? status.state };
  }

  private exec(args: string[]): ReturnType<CommandRunner['run']> {
    return this.runner.run(this.binary, args, { timeoutMs: this.commandTimeoutMs });
  }
}

/**
 * Parse the JSON array printed by `docker inspect` for one container
 */
export function parseContainerInspect(nodeId: string, stdout: string): NodeStatus {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (error) {
    throw new OrchestratorCommandError('docker inspect', `Unparseable output: ${errorMessage(error)}`, { nodeId });
  }

  const container: unknown = Array.isArray(parsed) ? parsed[0] : parsed;
  if (!isPlainObject(container)) {
    return { nodeId, state: 'unknown', networks: [], startedAt: null };
  }

  const state = isPlainObject(container.State) ? container.State : {};
  const rawStatus = typeof state.Status === 'string' ? state.Status : undefined;
  const running = state.Running === true;

  let startedAt: Date | null = null;
  if (typeof state.StartedAt === 'string' && !state.StartedAt.startsWith(ZERO_TIME_PREFIX)) {
    const parsedDate = new Date(state.StartedAt);
    startedAt = Number.isNaN(parsedDate.getTime()) ? null : parsedDate;
  }

  const settings = isPlainObject(container.NetworkSettings) ? container.NetworkSettings : {};
  const networks = isPlainObject(settings.Networks) ? Object.keys(settings.Networks) : [];

  return {
    nodeId,
    state: running ? 'running' : 'stopped',
    networks,
    startedAt,
    rawStatus,
  };
}
