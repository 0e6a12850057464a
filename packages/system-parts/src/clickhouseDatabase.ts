import { getClickHouseTransport, type ClickHouseTransport } from './clickhouse/client';
import { loadClickHouseConfig, type SystemPartsConfig } from './config';
import { InvalidArgumentError } from './errors';
import type { PartsDatabase, QuerySettings, RowDecoder } from './database';
import { createLogger, type Logger } from './logger';

export interface ClickHouseDatabaseOptions {
  dbName: string;
  transport: ClickHouseTransport;
  logger?: Logger;
}

export class ClickHouseDatabase implements PartsDatabase {
  readonly dbName: string;
  private readonly transport: ClickHouseTransport;
  private readonly logger: Logger;

  constructor(options: ClickHouseDatabaseOptions) {
    if (!options.dbName) {
      throw new InvalidArgumentError('ClickHouseDatabase requires a dbName');
    }
    this.dbName = options.dbName;
    this.transport = options.transport;
    this.logger = options.logger ?? createLogger('info');
  }

  async raw(sql: string, settings?: QuerySettings): Promise<void> {
    this.logger.info({ sql, settings }, 'executing clickhouse statement');
    try {
      await this.transport.command(sql, settings);
    } catch (error) {
      this.logger.error({ err: error, sql }, 'clickhouse statement failed');
      throw error;
    }
  }

  async select<T>(sql: string, decode: RowDecoder<T>, settings?: QuerySettings): Promise<T[]> {
    this.logger.debug({ sql, settings }, 'running clickhouse query');
    let rows: unknown[];
    try {
      rows = await this.transport.queryRows(sql, settings);
    } catch (error) {
      this.logger.error({ err: error, sql }, 'clickhouse query failed');
      throw error;
    }
    return rows.map((row) => decode(row));
  }
}

export interface ConnectOptions {
  config?: SystemPartsConfig;
  logger?: Logger;
}

export function connectClickHouseDatabase(options: ConnectOptions = {}): ClickHouseDatabase {
  const config = options.config ?? loadClickHouseConfig();
  return new ClickHouseDatabase({
    dbName: config.clickhouse.database,
    transport: getClickHouseTransport(config.clickhouse),
    logger: options.logger ?? createLogger(config.logLevel)
  });
}
