export * from './errors';
export * from './database';
export * from './partitionSql';
export * from './systemPart';
export * from './clickhouseDatabase';
export { createLogger, type Logger } from './logger';
export { loadClickHouseConfig, resetCachedConfig } from './config';
export type { SystemPartsConfig, ClickHouseConnectionConfig } from './config';
export {
  CONNECTION_SETTINGS,
  closeClickHouseTransport,
  createInlineTransport,
  getClickHouseTransport,
  type ClickHouseTransport
} from './clickhouse/client';
export {
  getInlineStatements,
  isInlineModeEnabled,
  resetInlineClickHouseStore,
  seedInlineRows,
  type InlineStatement
} from './clickhouse/inlineStore';
export { quoteIdentifier, escapeStringLiteral, parseClickHouseDateTime } from './clickhouse/util';
