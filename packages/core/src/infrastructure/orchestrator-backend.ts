/**
 * Orchestrator backend contract
 * @module @capbench/core/infrastructure/orchestrator-backend
 */

import type { ExecutionMode, NodeStatus, NodeUptime } from '@capbench/shared';

/**
 * Low-level operations on nodes and networks. The InfrastructureController
 * adds verification, mode selection and network resolution on top.
 */
export interface OrchestratorBackend {
  readonly mode: ExecutionMode;
  /** Resolves when the backend is reachable */
  ping(): Promise<void>;
  stop(nodeId: string): Promise<void>;
  start(nodeId: string): Promise<void>;
  /** Live node state; `state: 'unknown'` when the node does not exist */
  inspect(nodeId: string): Promise<NodeStatus>;
  networkExists(network: string): Promise<boolean>;
  /** Detach a node; a node already detached is not an error */
  disconnect(nodeId: string, network: string): Promise<void>;
  /** Attach a node; a node already attached is not an error */
  connect(nodeId: string, network: string): Promise<void>;
  uptime(nodeId: string): Promise<NodeUptime>;
}
