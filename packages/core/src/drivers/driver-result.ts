/**
 * Helpers shared by the store drivers
 * @module @capbench/core/drivers/driver-result
 */

import type { StoreResult, StoreRow, StoreValue } from '@capbench/shared';
import { storeFailure, storeOk } from '@capbench/shared';

/**
 * Run a driver call and convert a rejection into a failed StoreResult
 */
export async function capture<T>(operation: () => Promise<T>): Promise<StoreResult<T>> {
  try {
    return storeOk(await operation());
  } catch (error) {
    return storeFailure<T>(error);
  }
}

/**
 * Keep the scalar columns of a driver row
 */
export function toStoreRow(entries: Iterable<readonly [string, unknown]>): StoreRow {
  const row: StoreRow = {};
  for (const [column, value] of entries) {
    const scalar = toStoreValue(value);
    if (scalar !== undefined) {
      row[column] = scalar;
    }
  }
  return row;
}

function toStoreValue(value: unknown): StoreValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return undefined;
}

const IDENTIFIER_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]{0,47}$/;

/**
 * Reject table and column names that cannot be used as bare identifiers
 */
export function assertIdentifier(name: string): string {
  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new Error(`Invalid identifier: ${name}`);
  }
  return name;
}
