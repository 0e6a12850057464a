import { createClient, type ClickHouseSettings } from '@clickhouse/client';
import type { ClickHouseConnectionConfig } from '../config';
import { isInlineModeEnabled, readInlineRows, recordInlineStatement } from './inlineStore';

export interface ClickHouseTransport {
  command(query: string, settings?: ClickHouseSettings): Promise<void>;
  queryRows(query: string, settings?: ClickHouseSettings): Promise<unknown[]>;
  close(): Promise<void>;
}

// DateTime columns come back as UTC ISO text whatever the server timezone.
export const CONNECTION_SETTINGS: ClickHouseSettings = {
  date_time_output_format: 'iso'
};

let cached: { key: string; transport: ClickHouseTransport } | null = null;

function buildKey(settings: ClickHouseConnectionConfig): string {
  return [
    settings.host,
    settings.httpPort,
    settings.username,
    settings.password,
    settings.database,
    settings.secure ? 'secure' : 'insecure'
  ].join('|');
}

export function createInlineTransport(): ClickHouseTransport {
  return {
    async command(query, settings) {
      recordInlineStatement({ query, settings });
    },
    async queryRows(query, settings) {
      recordInlineStatement({ query, settings });
      return readInlineRows(query);
    },
    async close() {
      return;
    }
  };
}

function createHttpTransport(settings: ClickHouseConnectionConfig): ClickHouseTransport {
  const protocol = settings.secure ? 'https' : 'http';
  const client = createClient({
    url: `${protocol}://${settings.host}:${settings.httpPort}`,
    username: settings.username,
    password: settings.password,
    database: settings.database,
    request_timeout: settings.requestTimeoutMs,
    application: 'clickhouse-parts',
    clickhouse_settings: CONNECTION_SETTINGS
  });

  return {
    async command(query, clickhouseSettings) {
      await client.command({ query, clickhouse_settings: clickhouseSettings });
    },
    async queryRows(query, clickhouseSettings) {
      const result = await client.query({
        query,
        format: 'JSONEachRow',
        clickhouse_settings: clickhouseSettings
      });
      return result.json<Record<string, unknown>>();
    },
    async close() {
      await client.close();
    }
  };
}

export function getClickHouseTransport(settings: ClickHouseConnectionConfig): ClickHouseTransport {
  const key = buildKey(settings);
  if (cached && cached.key === key) {
    return cached.transport;
  }

  const transport = isInlineModeEnabled(settings) ? createInlineTransport() : createHttpTransport(settings);

  const previous = cached;
  cached = { key, transport };
  if (previous) {
    void previous.transport.close().catch(() => undefined);
  }
  return transport;
}

export async function closeClickHouseTransport(): Promise<void> {
  if (!cached) {
    return;
  }
  const { transport } = cached;
  cached = null;
  await transport.close();
}
