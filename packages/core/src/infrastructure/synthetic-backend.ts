/**
 * In-memory orchestrator used when no real orchestrator is reachable
 * @module @capbench/core/infrastructure/synthetic-backend
 */

import type { NodeStatus, NodeUptime } from '@capbench/shared';
import { round } from '@capbench/shared';
import type { OrchestratorBackend } from './orchestrator-backend';

const HOUR_SECONDS = 3600;
const MAX_UPTIME_HOURS = 72;
const MAX_RESTART_CHECKS = 3;

/**
 * Synthetic backend options
 */
export interface SyntheticBackendOptions {
  /** Networks every node starts attached to */
  networks?: string[];
  /** Random source in [0, 1) */
  random?: () => number;
  now?: () => number;
}

interface SyntheticNode {
  running: boolean;
  /** Status checks left before a restarted node reports running */
  pendingChecks: number;
  networks: Set<string>;
  startedAt: Date;
}

/**
 * Every node exists and starts running. Stopped nodes come back 1 to 3
 * status checks after start(); uptimes are random between 1 and 72 hours.
 */
export class SyntheticBackend implements OrchestratorBackend {
  readonly mode = 'synthetic' as const;
  private readonly nodes = new Map<string, SyntheticNode>();
  private readonly networks: string[];
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(options: SyntheticBackendOptions = {}) {
    this.networks = options.networks ?? [];
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  async ping(): Promise<void> {
    return;
  }

  async stop(nodeId: string): Promise<void> {
    const node = this.node(nodeId);
    node.running = false;
    node.pendingChecks = 0;
  }

  async start(nodeId: string): Promise<void> {
    const node = this.node(nodeId);
    if (!node.running && node.pendingChecks === 0) {
      node.pendingChecks = 1 + Math.floor(this.random() * MAX_RESTART_CHECKS);
    }
  }

  async inspect(nodeId: string): Promise<NodeStatus> {
    const node = this.node(nodeId);
    if (!node.running && node.pendingChecks > 0) {
      node.pendingChecks -= 1;
      if (node.pendingChecks === 0) {
        node.running = true;
        node.startedAt = new Date(this.now());
      }
    }
    return {
      nodeId,
      state: node.running ? 'running' : 'stopped',
      networks: [...node.networks],
      startedAt: node.running ? node.startedAt : null,
      rawStatus: node.running ? 'running' : 'exited',
    };
  }

  async networkExists(network: string): Promise<boolean> {
    return this.networks.includes(network);
  }

  async disconnect(nodeId: string, network: string): Promise<void> {
    this.node(nodeId).networks.delete(network);
  }

  async connect(nodeId: string, network: string): Promise<void> {
    this.node(nodeId).networks.add(network);
  }

  async uptime(_nodeId: string): Promise<NodeUptime> {
    const seconds = HOUR_SECONDS + Math.floor(this.random() * HOUR_SECONDS * (MAX_UPTIME_HOURS - 1));
    return { seconds, hours: round(seconds / HOUR_SECONDS), status: 'synthetic' };
  }

  private node(nodeId: string): SyntheticNode {
    let node = this.nodes.get(nodeId);
    if (!node) {
      node = {
        running: true,
        pendingChecks: 0,
        networks: new Set(this.networks),
        startedAt: new Date(this.now() - HOUR_SECONDS * 1000),
      };
      this.nodes.set(nodeId, node);
    }
    return node;
  }
}
