/**
 * Store type definitions
 * @module @capbench/shared/types/store
 */

/**
 * Identifier of one of the two data stores under test
 */
export type StoreId = string;

/**
 * The deployed store pair
 */
export const MONGODB_STORE_ID: StoreId = 'mongodb';
export const CASSANDRA_STORE_ID: StoreId = 'cassandra';

/**
 * Describes a store and the nodes (containers) that host it
 */
export interface StoreDefinition {
  /** Store identifier used as the key in samples and reports */
  id: StoreId;
  /** Human readable name (e.g. 'MongoDB') */
  label: string;
  /** Node names starting with this prefix belong to the store */
  nodePrefix: string;
  /** Known node names of the store's cluster */
  nodes: string[];
}

/**
 * Whether a node belongs to the given store
 */
export function isStoreNode(store: StoreDefinition, nodeId: string): boolean {
  return store.nodes.includes(nodeId) || nodeId.startsWith(store.nodePrefix);
}

/**
 * Find the store a node belongs to
 */
export function findStoreForNode(
  stores: readonly StoreDefinition[],
  nodeId: string,
): StoreDefinition | undefined {
  return stores.find((store) => isStoreNode(store, nodeId));
}

// ============================================================================
// Driver contract
// ============================================================================

/**
 * Scalar value a row column may hold
 */
export type StoreValue = string | number | boolean | null;

/**
 * One row / document
 */
export type StoreRow = Record<string, StoreValue>;

/**
 * Column filter. An array value matches any of its members.
 */
export type StoreFilter = Record<string, StoreValue | StoreValue[]>;

/**
 * Column types understood by the drivers' schema creation
 */
export type ColumnType = 'text' | 'double' | 'int' | 'boolean';

/**
 * Fixed table / collection schema
 */
export interface TableSchema {
  /** Table or collection name */
  name: string;
  /** Primary key column */
  primaryKey: string;
  /** Columns by name */
  columns: Record<string, ColumnType>;
}

/**
 * Explicit outcome of a driver call
 */
export type StoreResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: Error };

/**
 * Create a successful store result
 */
export function storeOk<T>(value: T): StoreResult<T> {
  return { ok: true, value };
}

/**
 * Create a failed store result
 */
export function storeFailure<T>(error: unknown): StoreResult<T> {
  return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
}

/**
 * Data-store driver consumed by probes and benchmarks.
 * Every call resolves to a StoreResult; drivers never reject.
 */
export interface StoreDriver {
  /** Store this driver talks to */
  readonly id: StoreId;
  /**
   * Whether the driver's calls should be dispatched to the bounded task pool
   * instead of being awaited directly on the monitoring loop.
   */
  readonly blocking: boolean;
  connect(): Promise<StoreResult<void>>;
  ensureTable(schema: TableSchema): Promise<StoreResult<void>>;
  insert(table: string, row: StoreRow): Promise<StoreResult<void>>;
  insertMany(table: string, rows: StoreRow[]): Promise<StoreResult<number>>;
  find(table: string, filter: StoreFilter): Promise<StoreResult<StoreRow[]>>;
  update(table: string, filter: StoreFilter, patch: StoreRow): Promise<StoreResult<number>>;
  truncate(table: string): Promise<StoreResult<void>>;
  close(): Promise<void>;
}

/**
 * Result of a single health probe
 */
export interface ProbeResult {
  store: StoreId;
  success: boolean;
  /** Round-trip latency in milliseconds, null on failure */
  latencyMs: number | null;
  /** Failure message, null on success */
  error: string | null;
}

/**
 * Health-check table written and read by probes
 */
export const PROBE_TABLE: TableSchema = {
  name: 'failure_monitor',
  primaryKey: 'id',
  columns: {
    id: 'text',
    name: 'text',
    status: 'text',
    type: 'text',
    checked_at: 'text',
  },
};

/**
 * Benchmark table written by the performance runner
 */
export const BENCHMARK_TABLE: TableSchema = {
  name: 'performance_test',
  primaryKey: 'id',
  columns: {
    id: 'text',
    name: 'text',
    status: 'text',
    type: 'text',
    value: 'double',
    timestamp: 'text',
  },
};
