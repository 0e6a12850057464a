export function quoteIdentifier(value: string): string {
  return `\`${value.replace(/`/g, '``')}\``;
}

export function escapeStringLiteral(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "''");
}

const ZERO_DATETIME = '0000-00-00 00:00:00';
const DATETIME_PATTERN = /^(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2})$/;
const ISO_DATETIME_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/i;

function fromEpochSeconds(seconds: number): Date | null {
  if (!Number.isFinite(seconds) || seconds < 0) {
    return null;
  }
  const date = new Date(seconds * 1000);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Reads a ClickHouse `DateTime` value as returned in JSON output.
 *
 * ISO-8601 text must carry `Z` or an explicit offset. Plain `YYYY-MM-DD hh:mm:ss`
 * text is taken as UTC. The zero date the server reports for unset values maps to
 * the Unix epoch, and bare numbers are Unix seconds.
 */
export function parseClickHouseDateTime(value: Date | number | string): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : new Date(value.getTime());
  }
  if (typeof value === 'number') {
    return fromEpochSeconds(value);
  }

  const trimmed = value.trim();
  if (trimmed === ZERO_DATETIME) {
    return new Date(0);
  }
  if (/^\d+$/.test(trimmed)) {
    return fromEpochSeconds(Number(trimmed));
  }

  const match = DATETIME_PATTERN.exec(trimmed);
  let parsed = Number.NaN;
  if (match) {
    parsed = Date.parse(`${match[1]}T${match[2]}Z`);
  } else if (ISO_DATETIME_PATTERN.test(trimmed)) {
    parsed = Date.parse(trimmed);
  }
  return Number.isNaN(parsed) ? null : new Date(parsed);
}
