/**
 * Cassandra store driver
 * @module @capbench/core/drivers/cassandra-store
 */

import { Client, concurrent, type types } from 'cassandra-driver';
import type {
  ColumnType,
  StoreDriver,
  StoreFilter,
  StoreId,
  StoreResult,
  StoreRow,
  StoreValue,
  TableSchema,
} from '@capbench/shared';
import { CASSANDRA_STORE_ID } from '@capbench/shared';
import { assertIdentifier, capture, toStoreRow } from './driver-result';

const CQL_TYPES: Record<ColumnType, string> = {
  text: 'text',
  double: 'double',
  int: 'int',
  boolean: 'boolean',
};

/**
 * Cassandra connection configuration
 */
export interface CassandraStoreConfig {
  contactPoints: string[];
  localDataCenter: string;
  keyspace: string;
  replicationFactor?: number;
  /** Connect timeout in milliseconds (default: 5000) */
  timeoutMs?: number;
  /** Concurrent statements for multi-row inserts (default: 32) */
  concurrencyLevel?: number;
  /** Store identifier (default: 'cassandra') */
  id?: StoreId;
}

/**
 * Driver over the DataStax client. Marked blocking so probes and benchmark
 * batches are dispatched through the task pool.
 */
export class CassandraStore implements StoreDriver {
  readonly id: StoreId;
  readonly blocking = true;
  private readonly keyspace: string;
  private readonly schemas = new Map<string, TableSchema>();
  private client: Client | null = null;
  private connecting: Promise<Client> | null = null;

  constructor(private readonly config: CassandraStoreConfig) {
    this.id = config.id ?? CASSANDRA_STORE_ID;
    this.keyspace = assertIdentifier(config.keyspace);
  }

  connect(): Promise<StoreResult<void>> {
    return capture(async () => {
      await this.session();
    });
  }

  ensureTable(schema: TableSchema): Promise<StoreResult<void>> {
    return capture(async () => {
      const client = await this.session();
      const columns = Object.entries(schema.columns)
        .map(([column, type]) => {
          const definition = `${assertIdentifier(column)} ${CQL_TYPES[type]}`;
          return column === schema.primaryKey ? `${definition} PRIMARY KEY` : definition;
        })
        .join(', ');
      await client.execute(`CREATE TABLE IF NOT EXISTS ${this.table(schema.name)} (${columns})`);
      this.schemas.set(schema.name, schema);
    });
  }

  insert(table: string, row: StoreRow): Promise<StoreResult<void>> {
    return capture(async () => {
      const client = await this.session();
      const columns = Object.keys(row).map(assertIdentifier);
      await client.execute(this.insertQuery(table, columns), columns.map((c) => row[c] ?? null), { prepare: true });
    });
  }

  insertMany(table: string, rows: StoreRow[]): Promise<StoreResult<number>> {
    return capture(async () => {
      const first = rows[0];
      if (!first) return 0;
      const client = await this.session();
      const schema = this.schemas.get(table);
      const columns = (schema ? Object.keys(schema.columns) : Object.keys(first)).map(assertIdentifier);
      const parameters = rows.map((row) => columns.map((c) => row[c] ?? null));

      const result = await concurrent.executeConcurrent(client, this.insertQuery(table, columns), parameters, {
        concurrencyLevel: this.config.concurrencyLevel ?? 32,
        raiseOnFirstError: true,
      });
      return result.totalExecuted;
    });
  }

  find(table: string, filter: StoreFilter): Promise<StoreResult<StoreRow[]>> {
    return capture(() => this.select(table, filter));
  }

  update(table: string, filter: StoreFilter, patch: StoreRow): Promise<StoreResult<number>> {
    return capture(async () => {
      const client = await this.session();
      const primaryKey = this.schemas.get(table)?.primaryKey ?? 'id';
      const keyFilter = filter[primaryKey];

      let keys: StoreValue[];
      if (keyFilter !== undefined && Object.keys(filter).length === 1) {
        keys = Array.isArray(keyFilter) ? keyFilter : [keyFilter];
      } else {
        const rows = await this.select(table, filter);
        keys = rows.map((row) => row[primaryKey] ?? null);
      }
      if (keys.length === 0) return 0;

      const columns = Object.keys(patch).map(assertIdentifier);
      const assignments = columns.map((c) => `${c} = ?`).join(', ');
      await client.execute(
        `UPDATE ${this.table(table)} SET ${assignments} WHERE ${assertIdentifier(primaryKey)} IN ?`,
        [...columns.map((c) => patch[c] ?? null), keys],
        { prepare: true },
      );
      return keys.length;
    });
  }

  truncate(table: string): Promise<StoreResult<void>> {
    return capture(async () => {
      const client = await this.session();
      await client.execute(`TRUNCATE ${this.table(table)}`);
    });
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    this.connecting = null;
    if (client) {
      await client.shutdown();
    }
  }

  private async select(table: string, filter: StoreFilter): Promise<StoreRow[]> {
    const client = await this.session();
    const clauses: string[] = [];
    const params: Array<StoreValue | StoreValue[]> = [];
    for (const [column, value] of Object.entries(filter)) {
      clauses.push(Array.isArray(value) ? `${assertIdentifier(column)} IN ?` : `${assertIdentifier(column)} = ?`);
      params.push(value);
    }
    const where = clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')} ALLOW FILTERING` : '';
    const result = await client.execute(`SELECT * FROM ${this.table(table)}${where}`, params, { prepare: true });
    return result.rows.map((row: types.Row) => toStoreRow(row.keys().map((key) => [key, row.get(key)] as const)));
  }

  private insertQuery(table: string, columns: string[]): string {
    const placeholders = columns.map(() => '?').join(', ');
    return `INSERT INTO ${this.table(table)} (${columns.join(', ')}) VALUES (${placeholders})`;
  }

  private table(name: string): string {
    return `${this.keyspace}.${assertIdentifier(name)}`;
  }

  private session(): Promise<Client> {
    if (!this.connecting) {
      this.connecting = this.open().catch((error: unknown) => {
        this.connecting = null;
        throw error;
      });
    }
    return this.connecting;
  }

  private async open(): Promise<Client> {
    const timeoutMs = this.config.timeoutMs ?? 5000;
    const client = new Client({
      contactPoints: this.config.contactPoints,
      localDataCenter: this.config.localDataCenter,
      socketOptions: { connectTimeout: timeoutMs },
    });
    try {
      await client.connect();
      const replication = this.config.replicationFactor ?? 3;
      await client.execute(
        `CREATE KEYSPACE IF NOT EXISTS ${this.keyspace} ` +
          `WITH replication = {'class': 'SimpleStrategy', 'replication_factor': ${replication}}`,
      );
    } catch (error) {
      await client.shutdown();
      throw error;
    }
    this.client = client;
    return client;
  }
}
