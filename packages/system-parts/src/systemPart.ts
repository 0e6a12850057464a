import { z } from 'zod';
import { escapeStringLiteral } from './clickhouse/util';
import { assertPartsDatabase, type PartsDatabase, type QuerySettings } from './database';
import { InvalidArgumentError, SystemPartDecodeError } from './errors';
import { dateTimeField, flagField, stringField, uint32Field, uint64Field } from './fields';
import { buildPartitionSql, type PartitionOperation } from './partitionSql';

export const SYSTEM_PARTS_TABLE = 'system.parts';

export const DEFAULT_INDEX_GRANULARITY = 8192;

/**
 * Columns of `system.parts` this model reads, in the order they are selected.
 * Other columns the server exposes are ignored.
 */
export const systemPartRowSchema = z.object({
  database: stringField,
  table: stringField,
  engine: stringField,
  partition: stringField,
  name: stringField,
  replicated: flagField,
  active: flagField,
  marks: uint64Field,
  bytes: uint64Field,
  modification_time: dateTimeField,
  remove_time: dateTimeField,
  refcount: uint32Field
});

export type SystemPartRow = z.infer<typeof systemPartRowSchema>;

export type SystemPartColumn = keyof SystemPartRow;

export const SYSTEM_PART_COLUMNS = systemPartRowSchema.keyof().options;

export interface SystemPartsQueryOptions {
  databaseName: string;
  activeOnly: boolean;
}

export function buildSystemPartsQuery(options: SystemPartsQueryOptions): string {
  const conditions = [`database='${escapeStringLiteral(options.databaseName)}'`];
  if (options.activeOnly) {
    conditions.unshift('active');
  }
  return `SELECT ${SYSTEM_PART_COLUMNS.join(',')} FROM ${SYSTEM_PARTS_TABLE} WHERE ${conditions.join(' AND ')}`;
}

/**
 * A data part of a MergeTree-family table, as reported by `system.parts`.
 *
 * Instances only come from decoding query rows and are never written back;
 * the partition methods issue `ALTER TABLE` statements through a database instead.
 */
export class SystemPart implements Readonly<SystemPartRow> {
  readonly database: string;
  readonly table: string;
  readonly engine: string;
  readonly partition: string;
  readonly name: string;
  readonly replicated: boolean;
  /** False once the part has been merged away and awaits removal. */
  readonly active: boolean;
  readonly marks: number;
  /** Compressed size. */
  readonly bytes: number;
  readonly modification_time: Date;
  /** Only meaningful for inactive parts. */
  readonly remove_time: Date;
  readonly refcount: number;

  private constructor(row: SystemPartRow) {
    this.database = row.database;
    this.table = row.table;
    this.engine = row.engine;
    this.partition = row.partition;
    this.name = row.name;
    this.replicated = row.replicated;
    this.active = row.active;
    this.marks = row.marks;
    this.bytes = row.bytes;
    this.modification_time = row.modification_time;
    this.remove_time = row.remove_time;
    this.refcount = row.refcount;
  }

  static fromRow(row: unknown): SystemPart {
    const result = systemPartRowSchema.safeParse(row);
    if (!result.success) {
      throw new SystemPartDecodeError(
        `Invalid ${SYSTEM_PARTS_TABLE} row: ${result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`,
        result.error.issues
      );
    }
    return new SystemPart(result.data);
  }

  static async fetchActive(database: PartsDatabase, databaseName?: string): Promise<SystemPart[]> {
    assertPartsDatabase(database);
    const sql = buildSystemPartsQuery({ databaseName: databaseName ?? database.dbName, activeOnly: true });
    return database.select(sql, SystemPart.fromRow);
  }

  static async fetchAll(database: PartsDatabase, databaseName?: string): Promise<SystemPart[]> {
    assertPartsDatabase(database);
    const sql = buildSystemPartsQuery({ databaseName: databaseName ?? database.dbName, activeOnly: false });
    return database.select(sql, SystemPart.fromRow);
  }

  /** More than two references means queries or merges are holding the part. */
  get isInUse(): boolean {
    return this.refcount > 2;
  }

  approximateRowCount(indexGranularity: number = DEFAULT_INDEX_GRANULARITY): number {
    if (!Number.isInteger(indexGranularity) || indexGranularity <= 0) {
      throw new InvalidArgumentError('indexGranularity must be a positive integer');
    }
    return this.marks * indexGranularity;
  }

  /** Moves the partition to the `detached` directory and forgets it. */
  detach(database: PartsDatabase, settings?: QuerySettings): Promise<string> {
    return this.runPartitionOperation(database, 'DETACH', settings);
  }

  drop(database: PartsDatabase, settings?: QuerySettings): Promise<string> {
    return this.runPartitionOperation(database, 'DROP', settings);
  }

  /** Adds the partition back from the `detached` directory. */
  attach(database: PartsDatabase, settings?: QuerySettings): Promise<string> {
    return this.runPartitionOperation(database, 'ATTACH', settings);
  }

  /** Creates a local backup of the partition under `shadow/`. */
  freeze(database: PartsDatabase, settings?: QuerySettings): Promise<string> {
    return this.runPartitionOperation(database, 'FREEZE', settings);
  }

  /**
   * Downloads the partition from another replica.
   *
   * @param zookeeperPath coordination-service path of the table on the donor replica
   */
  fetch(database: PartsDatabase, zookeeperPath: string, settings?: QuerySettings): Promise<string> {
    return this.runPartitionOperation(database, 'FETCH', settings, zookeeperPath);
  }

  private async runPartitionOperation(
    database: PartsDatabase,
    operation: PartitionOperation,
    settings?: QuerySettings,
    fromPath?: string
  ): Promise<string> {
    assertPartsDatabase(database);
    const sql = buildPartitionSql(operation, database.dbName, this.table, this.partition, fromPath);
    await database.raw(sql, settings);
    return sql;
  }
}
