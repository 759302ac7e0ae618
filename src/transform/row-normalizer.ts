import { MalformedRowError } from '../common/errors';
import { ParsedRow } from '../reader/chunked-row-reader';
import { SourceRow, SourceTable } from '../vocabulary/source-tables';

const INTEGER = /^[+-]?\d+$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/;
const ISO_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})[T ]/;

/**
 * Canonical integer text, or undefined when the value is not a safe integer.
 * '' stays ''.
 */
export function normalizeInteger(raw: string): string | undefined {
  const value = raw.trim();
  if (value === '') return '';
  if (!INTEGER.test(value)) return undefined;
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? String(parsed) : undefined;
}

/**
 * YYYY-MM-DD from YYYY-MM-DD, YYYYMMDD or an ISO timestamp; undefined when the
 * value is not a calendar date. '' stays ''.
 */
export function normalizeDate(raw: string): string | undefined {
  const value = raw.trim();
  if (value === '') return '';

  const match =
    ISO_DATE.exec(value) ?? COMPACT_DATE.exec(value) ?? ISO_TIMESTAMP.exec(value);
  if (!match) return undefined;

  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day)
  ) {
    return undefined;
  }
  return `${year}-${month}-${day}`;
}

/**
 * Applies the column policy of `table` to a parsed row. Both emitters write
 * the returned values, so their artifacts agree on every property.
 *
 * @throws MalformedRowError when an integer or date column cannot be read.
 */
export function normalizeRow(table: SourceTable, row: ParsedRow): SourceRow {
  const values: Record<string, string> = { ...row.values };

  for (const column of table.integerColumns) {
    const normalized = normalizeInteger(values[column] ?? '');
    if (normalized === undefined) {
      throw new MalformedRowError(
        table.name,
        row.record,
        `${column} is not an integer: "${values[column]}"`,
      );
    }
    values[column] = normalized;
  }

  for (const column of table.dateColumns) {
    const normalized = normalizeDate(values[column] ?? '');
    if (normalized === undefined) {
      throw new MalformedRowError(
        table.name,
        row.record,
        `${column} is not a date: "${values[column]}"`,
      );
    }
    values[column] = normalized;
  }

  return values;
}
