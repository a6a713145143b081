/**
 * In-memory StoreDriver for unit tests
 */

import type {
  StoreDriver,
  StoreFilter,
  StoreId,
  StoreResult,
  StoreRow,
  TableSchema,
} from '@capbench/shared';
import { storeFailure, storeOk } from '@capbench/shared';

export type DriverMethod = 'connect' | 'ensureTable' | 'insert' | 'insertMany' | 'find' | 'update' | 'truncate';

interface PlannedFailure {
  error: Error;
  remaining: number;
}

export class MemoryStore implements StoreDriver {
  readonly tables = new Map<string, StoreRow[]>();
  readonly calls: DriverMethod[] = [];
  private readonly failures = new Map<DriverMethod, PlannedFailure>();

  constructor(
    readonly id: StoreId,
    readonly blocking = false,
  ) {}

  /**
   * Make the next `times` calls of a method fail
   */
  failNext(method: DriverMethod, message = `${method} failed`, times = 1): void {
    this.failures.set(method, { error: new Error(message), remaining: times });
  }

  failAlways(method: DriverMethod, message = `${method} failed`): void {
    this.failNext(method, message, Number.POSITIVE_INFINITY);
  }

  rows(table: string): StoreRow[] {
    return this.tables.get(table) ?? [];
  }

  async connect(): Promise<StoreResult<void>> {
    return this.call('connect', () => undefined);
  }

  async ensureTable(schema: TableSchema): Promise<StoreResult<void>> {
    return this.call('ensureTable', () => {
      if (!this.tables.has(schema.name)) this.tables.set(schema.name, []);
    });
  }

  async insert(table: string, row: StoreRow): Promise<StoreResult<void>> {
    return this.call('insert', () => {
      this.table(table).push({ ...row });
    });
  }

  async insertMany(table: string, rows: StoreRow[]): Promise<StoreResult<number>> {
    return this.call('insertMany', () => {
      this.table(table).push(...rows.map((row) => ({ ...row })));
      return rows.length;
    });
  }

  async find(table: string, filter: StoreFilter): Promise<StoreResult<StoreRow[]>> {
    return this.call('find', () => this.table(table).filter((row) => matches(row, filter)));
  }

  async update(table: string, filter: StoreFilter, patch: StoreRow): Promise<StoreResult<number>> {
    return this.call('update', () => {
      const rows = this.table(table).filter((row) => matches(row, filter));
      rows.forEach((row) => Object.assign(row, patch));
      return rows.length;
    });
  }

  async truncate(table: string): Promise<StoreResult<void>> {
    return this.call('truncate', () => {
      if (this.tables.has(table)) this.tables.set(table, []);
    });
  }

  async close(): Promise<void> {
    this.tables.clear();
  }

  private table(name: string): StoreRow[] {
    const rows = this.tables.get(name);
    if (!rows) throw new Error(`Table ${name} does not exist`);
    return rows;
  }

  private call<T>(method: DriverMethod, operation: () => T): StoreResult<T> {
    this.calls.push(method);
    const planned = this.failures.get(method);
    if (planned && planned.remaining > 0) {
      planned.remaining -= 1;
      return storeFailure<T>(planned.error);
    }
    try {
      return storeOk(operation());
    } catch (error) {
      return storeFailure<T>(error);
    }
  }
}

function matches(row: StoreRow, filter: StoreFilter): boolean {
  return Object.entries(filter).every(([column, expected]) => {
    const actual = row[column] ?? null;
    return Array.isArray(expected) ? expected.includes(actual) : actual === expected;
  });
}
