import type { ClickHouseSettings } from '@clickhouse/client';

type InlineRow = Record<string, unknown>;

export interface InlineStatement {
  query: string;
  settings?: ClickHouseSettings;
}

const inlineTables = new Map<string, InlineRow[]>();
const inlineStatements: InlineStatement[] = [];

function cloneRow(row: InlineRow): InlineRow {
  return JSON.parse(JSON.stringify(row));
}

function normalizeTableName(value: string): string {
  return value.replace(/`/g, '').trim().toLowerCase();
}

export function isInlineModeEnabled(settings?: { host: string }): boolean {
  if (process.env.CLICKHOUSE_INLINE === 'true') {
    return true;
  }
  if (settings?.host && settings.host.trim().toLowerCase() === 'inline') {
    return true;
  }
  return false;
}

export function resetInlineClickHouseStore(): void {
  inlineTables.clear();
  inlineStatements.length = 0;
}

export function seedInlineRows(tableName: string, rows: InlineRow[]): void {
  const key = normalizeTableName(tableName);
  const existing = inlineTables.get(key) ?? [];
  for (const row of rows) {
    existing.push(cloneRow(row));
  }
  inlineTables.set(key, existing);
}

export function recordInlineStatement(statement: InlineStatement): void {
  inlineStatements.push({ ...statement });
}

export function getInlineStatements(): InlineStatement[] {
  return inlineStatements.map((statement) => ({ ...statement }));
}

/**
 * Returns the rows seeded for the table named in the query's FROM clause.
 * WHERE clauses are not evaluated.
 */
export function readInlineRows(query: string): InlineRow[] {
  const match = /\bFROM\s+([`\w.]+)/i.exec(query);
  if (!match) {
    return [];
  }
  const rows = inlineTables.get(normalizeTableName(match[1]));
  if (!rows || rows.length === 0) {
    return [];
  }
  return rows.map((row) => cloneRow(row));
}
