/**
 * Unit tests for the store driver helpers
 * @module @capbench/core/tests/unit/drivers
 */

import { describe, it, expect } from 'vitest';

import { CassandraStore, MongoStore, assertIdentifier, capture, toMongoFilter, toStoreRow } from '../../src';

describe('capture', () => {
  it('should wrap a resolved value', async () => {
    await expect(capture(async () => 3)).resolves.toEqual({ ok: true, value: 3 });
  });

  it('should turn a rejection into a failed result', async () => {
    const outcome = await capture(async () => {
      throw new Error('connection reset');
    });

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.message).toBe('connection reset');
    }
  });
});

describe('toStoreRow', () => {
  it('should keep scalar columns and serialize dates', () => {
    const row = toStoreRow([
      ['id', 'r-1'],
      ['value', 42],
      ['checked_at', new Date(0)],
      ['nested', { deep: true }],
      ['note', null],
    ]);

    expect(row).toEqual({ id: 'r-1', value: 42, checked_at: '1970-01-01T00:00:00.000Z', note: null });
  });
});

describe('assertIdentifier', () => {
  it('should accept plain identifiers', () => {
    expect(assertIdentifier('performance_test')).toBe('performance_test');
  });

  it.each(['drop table', '1abc', 'a;b', ''])('should reject %j', (name) => {
    expect(() => assertIdentifier(name)).toThrow(`Invalid identifier: ${name}`);
  });
});

describe('toMongoFilter', () => {
  it('should turn array values into $in', () => {
    expect(toMongoFilter({ status: 'ACTIVE', id: ['a', 'b'] })).toEqual({
      status: 'ACTIVE',
      id: { $in: ['a', 'b'] },
    });
  });
});

describe('MongoStore', () => {
  it('should report a malformed connection string as a failed connect', async () => {
    const store = new MongoStore({ uri: 'not-a-mongo-uri', database: 'testDB' });

    expect(store.id).toBe('mongodb');
    expect(store.blocking).toBe(false);
    const first = await store.connect();
    const second = await store.connect();
    expect(first.ok).toBe(false);
    expect(second.ok).toBe(false);
    await store.close();
  });
});

describe('CassandraStore', () => {
  it('should be marked blocking', () => {
    const store = new CassandraStore({ contactPoints: ['127.0.0.1'], localDataCenter: 'datacenter1', keyspace: 'testkeyspace' });

    expect(store.id).toBe('cassandra');
    expect(store.blocking).toBe(true);
  });

  it('should refuse a keyspace that is not a plain identifier', () => {
    expect(
      () => new CassandraStore({ contactPoints: ['127.0.0.1'], localDataCenter: 'datacenter1', keyspace: 'ks; DROP' }),
    ).toThrow('Invalid identifier: ks; DROP');
  });
});
