import { z } from 'zod';

const clickhouseSchema = z.object({
  host: z.string().min(1),
  httpPort: z.number().int().positive(),
  username: z.string().min(1),
  password: z.string(),
  database: z.string().min(1),
  secure: z.boolean(),
  requestTimeoutMs: z.number().int().positive()
});

const configSchema = z.object({
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
  clickhouse: clickhouseSchema
});

export type SystemPartsConfig = z.infer<typeof configSchema>;
export type ClickHouseConnectionConfig = SystemPartsConfig['clickhouse'];

let cachedConfig: SystemPartsConfig | null = null;

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
}

function parseLogLevel(value: string | undefined): string {
  const normalized = value?.trim().toLowerCase();
  return normalized || 'info';
}

export function loadClickHouseConfig(): SystemPartsConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const env = process.env;
  const candidateConfig = {
    logLevel: parseLogLevel(env.CLICKHOUSE_PARTS_LOG_LEVEL),
    clickhouse: {
      host: env.CLICKHOUSE_HOST?.trim() || 'localhost',
      httpPort: parseNumber(env.CLICKHOUSE_HTTP_PORT, 8123),
      username: env.CLICKHOUSE_USER?.trim() || 'default',
      password: env.CLICKHOUSE_PASSWORD ?? '',
      database: env.CLICKHOUSE_DATABASE?.trim() || 'default',
      secure: parseBoolean(env.CLICKHOUSE_SECURE, false),
      requestTimeoutMs: parseNumber(env.CLICKHOUSE_REQUEST_TIMEOUT_MS, 30_000)
    }
  };

  const parsed = configSchema.parse(candidateConfig);
  cachedConfig = parsed;
  return parsed;
}

export function resetCachedConfig(): void {
  cachedConfig = null;
}
