/**
 * MongoDB store driver
 * @module @capbench/core/drivers/mongo-store
 */

import { MongoClient, MongoServerError, type Db, type Document, type Filter } from 'mongodb';
import type {
  StoreDriver,
  StoreFilter,
  StoreId,
  StoreResult,
  StoreRow,
  TableSchema,
} from '@capbench/shared';
import { MONGODB_STORE_ID } from '@capbench/shared';
import { capture, toStoreRow } from './driver-result';

/** Server error code for an existing collection */
const NAMESPACE_EXISTS = 48;

/**
 * MongoDB connection configuration
 */
export interface MongoStoreConfig {
  uri: string;
  database: string;
  /** Server selection and connect timeout (default: 5000) */
  timeoutMs?: number;
  /** Store identifier (default: 'mongodb') */
  id?: StoreId;
}

/**
 * Non-blocking driver over the official MongoDB client. The client is
 * connected on first use and shared by every call.
 */
export class MongoStore implements StoreDriver {
  readonly id: StoreId;
  readonly blocking = false;
  private client: MongoClient | null = null;
  private connecting: Promise<Db> | null = null;

  constructor(private readonly config: MongoStoreConfig) {
    this.id = config.id ?? MONGODB_STORE_ID;
  }

  connect(): Promise<StoreResult<void>> {
    return capture(async () => {
      await this.db();
    });
  }

  ensureTable(schema: TableSchema): Promise<StoreResult<void>> {
    return capture(async () => {
      const db = await this.db();
      const existing = await db.listCollections({ name: schema.name }, { nameOnly: true }).toArray();
      if (existing.length === 0) {
        try {
          await db.createCollection(schema.name);
        } catch (error) {
          if (!(error instanceof MongoServerError && error.code === NAMESPACE_EXISTS)) {
            throw error;
          }
        }
      }
      await db.collection(schema.name).createIndex({ [schema.primaryKey]: 1 }, { unique: true });
    });
  }

  insert(table: string, row: StoreRow): Promise<StoreResult<void>> {
    return capture(async () => {
      const db = await this.db();
      await db.collection(table).insertOne({ ...row });
    });
  }

  insertMany(table: string, rows: StoreRow[]): Promise<StoreResult<number>> {
    return capture(async () => {
      if (rows.length === 0) return 0;
      const db = await this.db();
      const result = await db.collection(table).insertMany(rows.map((row) => ({ ...row })));
      return result.insertedCount;
    });
  }

  find(table: string, filter: StoreFilter): Promise<StoreResult<StoreRow[]>> {
    return capture(async () => {
      const db = await this.db();
      const documents = await db
        .collection(table)
        .find(toMongoFilter(filter), { projection: { _id: 0 } })
        .toArray();
      return documents.map((document) => toStoreRow(Object.entries(document)));
    });
  }

  update(table: string, filter: StoreFilter, patch: StoreRow): Promise<StoreResult<number>> {
    return capture(async () => {
      const db = await this.db();
      const result = await db.collection(table).updateMany(toMongoFilter(filter), { $set: { ...patch } });
      return result.modifiedCount;
    });
  }

  truncate(table: string): Promise<StoreResult<void>> {
    return capture(async () => {
      const db = await this.db();
      await db.collection(table).deleteMany({});
    });
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    this.connecting = null;
    if (client) {
      await client.close();
    }
  }

  private db(): Promise<Db> {
    if (!this.connecting) {
      this.connecting = this.open().catch((error: unknown) => {
        this.connecting = null;
        throw error;
      });
    }
    return this.connecting;
  }

  private async open(): Promise<Db> {
    const timeoutMs = this.config.timeoutMs ?? 5000;
    const client = new MongoClient(this.config.uri, {
      serverSelectionTimeoutMS: timeoutMs,
      connectTimeoutMS: timeoutMs,
    });
    await client.connect();
    this.client = client;
    return client.db(this.config.database);
  }
}

/**
 * Translate a column filter; array values become `$in`
 */
export function toMongoFilter(filter: StoreFilter): Filter<Document> {
  const query: Filter<Document> = {};
  for (const [column, value] of Object.entries(filter)) {
    query[column] = Array.isArray(value) ? { $in: value } : value;
  }
  return query;
}
