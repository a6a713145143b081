/**
 * Infrastructure (orchestrator) type definitions
 * @module @capbench/shared/types/infrastructure
 */

/**
 * Whether results come from real infrastructure or from the synthetic fallback
 */
export type ExecutionMode = 'live' | 'synthetic';

/**
 * Run state of a node as reported by the orchestrator
 */
export type RunState = 'running' | 'stopped' | 'unknown';

/**
 * All run states
 */
export const ALL_RUN_STATES: readonly RunState[] = ['running', 'stopped', 'unknown'] as const;

/**
 * Live view of a node. Read on demand, never cached across ticks.
 */
export interface NodeStatus {
  nodeId: string;
  state: RunState;
  /** Networks the node is currently attached to */
  networks: string[];
  /** When the node's current process started, if known */
  startedAt: Date | null;
  /** Raw orchestrator status string (e.g. 'running', 'exited') */
  rawStatus?: string;
}

/**
 * Uptime of a node
 */
export interface NodeUptime {
  seconds: number;
  hours: number;
  /** Orchestrator status, or 'synthetic' for simulated values */
  status: string;
}

/**
 * Uptime lookup failure
 */
export interface NodeUptimeError {
  error: string;
}

/**
 * Uptime lookup outcome keyed by node
 */
export type NodeUptimeReport = Record<string, NodeUptime | NodeUptimeError>;

/**
 * Type guard for a successful uptime lookup
 */
export function isNodeUptime(value: NodeUptime | NodeUptimeError): value is NodeUptime {
  return 'seconds' in value;
}
