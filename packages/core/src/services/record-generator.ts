/**
 * Synthetic benchmark records
 * @module @capbench/core/services/record-generator
 */

import type { BenchmarkRecord } from '@capbench/shared';
import { generateUUID, round } from '@capbench/shared';

export const RECORD_STATUSES = ['ACTIVE', 'INACTIVE', 'MAINTENANCE'] as const;
export const RECORD_TYPES = ['sensor', 'actuator', 'controller'] as const;

/**
 * Generator sources, injectable for tests
 */
export interface RecordGeneratorOptions {
  /** Random source in [0, 1) */
  random?: () => number;
  idFactory?: () => string;
  now?: () => Date;
}

function pick<T>(values: readonly T[], random: () => number, fallback: T): T {
  return values[Math.floor(random() * values.length)] ?? fallback;
}

/**
 * Generate `count` fixed-schema device records
 */
export function generateRecords(count: number, options: RecordGeneratorOptions = {}): BenchmarkRecord[] {
  const random = options.random ?? Math.random;
  const idFactory = options.idFactory ?? generateUUID;
  const timestamp = (options.now ?? (() => new Date()))().toISOString();

  const records: BenchmarkRecord[] = [];
  for (let i = 0; i < count; i++) {
    records.push({
      id: idFactory(),
      name: `Device ${i}`,
      status: pick(RECORD_STATUSES, random, 'ACTIVE'),
      type: pick(RECORD_TYPES, random, 'sensor'),
      value: round(random() * 100, 4),
      timestamp,
    });
  }
  return records;
}
