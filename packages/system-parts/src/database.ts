import type { ClickHouseSettings } from '@clickhouse/client';
import { InvalidArgumentError } from './errors';

export type QuerySettings = ClickHouseSettings;

export type RowDecoder<T> = (row: unknown) => T;

/**
 * Connection capability the system table models run against. `raw` executes
 * statements that return nothing; `select` runs a query and decodes each row.
 */
export interface PartsDatabase {
  readonly dbName: string;
  raw(sql: string, settings?: QuerySettings): Promise<void>;
  select<T>(sql: string, decode: RowDecoder<T>, settings?: QuerySettings): Promise<T[]>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isPartsDatabase(value: unknown): value is PartsDatabase {
  return (
    isRecord(value) &&
    typeof value.dbName === 'string' &&
    typeof value.raw === 'function' &&
    typeof value.select === 'function'
  );
}

export function assertPartsDatabase(value: unknown): asserts value is PartsDatabase {
  if (!isPartsDatabase(value)) {
    throw new InvalidArgumentError('database must implement PartsDatabase (dbName, raw, select)');
  }
}
