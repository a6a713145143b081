/**
 * Scenario, infrastructure and probe error classes
 * @module @capbench/shared/errors/scenario-error
 */

import { CapbenchError, ErrorCode, type ErrorMeta } from './base-error.js';

/**
 * A target node or network could not be identified. Raised before any
 * infrastructure is mutated.
 */
export class ResolutionError extends CapbenchError {
  constructor(message: string, code: ErrorCode.TARGET_UNRESOLVED | ErrorCode.NETWORK_UNRESOLVED, meta: ErrorMeta = {}, cause?: Error) {
    super(message, code, meta, cause);
    this.name = 'ResolutionError';
  }

  static target(nodeId: string, reason: string): ResolutionError {
    return new ResolutionError(`Cannot resolve target node ${nodeId}: ${reason}`, ErrorCode.TARGET_UNRESOLVED, { nodeId });
  }

  static network(configured: string, cause?: Error): ResolutionError {
    return new ResolutionError(
      `Network resolution failed: network ${configured} not found and no fallback network could be determined` +
        (cause ? ` (${cause.message})` : ''),
      ErrorCode.NETWORK_UNRESOLVED,
      { network: configured },
      cause,
    );
  }
}

/**
 * Stopping or disconnecting a target failed part-way through injection
 */
export class InjectionError extends CapbenchError {
  /** Nodes that were mutated before the failure */
  public readonly mutated: string[];

  constructor(message: string, nodeId: string, mutated: string[] = [], cause?: Error) {
    super(message, ErrorCode.INJECTION_FAILED, { nodeId, mutated }, cause);
    this.name = 'InjectionError';
    this.mutated = mutated;
  }
}

/**
 * A node still (or no longer) lists a network after disconnect / connect
 */
export class PartitionVerificationError extends CapbenchError {
  constructor(nodeId: string, network: string, expectAttached: boolean) {
    super(
      expectAttached
        ? `Reconnect failed - ${nodeId} not on network ${network}`
        : `Disconnect failed - ${nodeId} still on network ${network}`,
      ErrorCode.PARTITION_VERIFICATION_FAILED,
      { nodeId, network },
    );
    this.name = 'PartitionVerificationError';
  }
}

/**
 * Restarting or reconnecting a node after the scenario failed
 */
export class RestorationError extends CapbenchError {
  constructor(nodeId: string, cause: Error) {
    super(`Failed to restore ${nodeId}: ${cause.message}`, ErrorCode.RESTORATION_FAILED, { nodeId }, cause);
    this.name = 'RestorationError';
  }
}

/**
 * The recovery ceiling was reached before the node reported running
 */
export class RecoveryTimeoutError extends CapbenchError {
  constructor(nodes: readonly string[], ceilingTicks: number) {
    super(
      `Recovery incomplete: ${nodes.join(', ')} not running after ${ceilingTicks} checks`,
      ErrorCode.RECOVERY_TIMEOUT,
      { nodes: [...nodes], ceilingTicks },
    );
    this.name = 'RecoveryTimeoutError';
  }
}

/**
 * A single store probe failed
 */
export class ProbeError extends CapbenchError {
  constructor(store: string, message: string, cause?: Error) {
    super(message, ErrorCode.PROBE_FAILED, { store }, cause);
    this.name = 'ProbeError';
  }
}

/**
 * The orchestrator backend cannot be reached
 */
export class OrchestratorUnavailableError extends CapbenchError {
  constructor(message: string, cause?: Error) {
    super(message, ErrorCode.ORCHESTRATOR_UNAVAILABLE, {}, cause);
    this.name = 'OrchestratorUnavailableError';
  }
}

/**
 * An orchestrator command returned an error
 */
export class OrchestratorCommandError extends CapbenchError {
  constructor(command: string, message: string, meta: ErrorMeta = {}, cause?: Error) {
    super(`${command} failed: ${message}`, ErrorCode.ORCHESTRATOR_COMMAND_FAILED, { command, ...meta }, cause);
    this.name = 'OrchestratorCommandError';
  }
}

/**
 * A pooled task exceeded its time budget
 */
export class TaskTimeoutError extends CapbenchError {
  constructor(timeoutMs: number) {
    super(`Task timed out after ${timeoutMs}ms`, ErrorCode.TIMEOUT, { timeoutMs });
    this.name = 'TaskTimeoutError';
  }
}

/**
 * A wait was cancelled through its abort signal
 */
export class CancelledError extends CapbenchError {
  constructor(message = 'Operation cancelled') {
    super(message, ErrorCode.CANCELLED);
    this.name = 'CancelledError';
  }
}
