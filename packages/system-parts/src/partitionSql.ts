import { InvalidArgumentError } from './errors';
import { escapeStringLiteral, quoteIdentifier } from './clickhouse/util';

export const PARTITION_OPERATIONS = ['DETACH', 'DROP', 'ATTACH', 'FREEZE', 'FETCH'] as const;

export type PartitionOperation = (typeof PARTITION_OPERATIONS)[number];

function isPartitionOperation(value: string): value is PartitionOperation {
  return PARTITION_OPERATIONS.some((operation) => operation === value);
}

export function normalizePartitionOperation(value: string): PartitionOperation {
  const normalized = value.trim().toUpperCase();
  if (!isPartitionOperation(normalized)) {
    throw new InvalidArgumentError(
      `operation must be one of [${PARTITION_OPERATIONS.join(', ')}], received '${value}'`
    );
  }
  return normalized;
}

function requireName(label: string, value: string): string {
  if (value.trim().length === 0) {
    throw new InvalidArgumentError(`${label} must be a non-empty string`);
  }
  return value;
}

/**
 * Builds an `ALTER TABLE ... PARTITION` statement for one of the partition
 * manipulation operations. `fromPath` is appended verbatim as the `FROM` clause
 * and is required for FETCH, where it names the replica path to download from.
 */
export function buildPartitionSql(
  operation: string,
  databaseName: string,
  tableName: string,
  partition: string,
  fromPath?: string
): string {
  const normalized = normalizePartitionOperation(operation);
  const database = requireName('databaseName', databaseName);
  const table = requireName('tableName', tableName);
  const partitionId = requireName('partition', partition);

  if (normalized === 'FETCH' && (fromPath === undefined || fromPath.trim().length === 0)) {
    throw new InvalidArgumentError('FETCH PARTITION requires a source path');
  }

  let sql = `ALTER TABLE ${quoteIdentifier(database)}.${quoteIdentifier(table)} ${normalized} PARTITION '${escapeStringLiteral(partitionId)}'`;
  if (fromPath !== undefined) {
    sql += ` FROM ${fromPath}`;
  }
  return sql;
}
