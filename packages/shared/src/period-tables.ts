/**
 * Period Tables
 *
 * Storage layout shared by the persistence worker and the query API:
 * one table per reporting period (lohnjournal_<month>_<year>), one column per
 * declared field, primary key (identifier, year, month). EMPTY is stored as NULL.
 */

import { quoteIdent } from './db';
import { formatMinor, parseDecimalToMinor } from './lohnjournal/number-decoder';
import {
  EMPTY,
  type EmployeeRow,
  type FieldDefinition,
  type FieldKind,
  type FieldValue,
  type ReportingPeriod,
} from './lohnjournal/types';

/** Fields and identifier of the layout the rows were extracted with */
export interface TableSchema {
  fields: readonly FieldDefinition[];
  identifierField: string;
}

export interface StoredEmployeeRow extends EmployeeRow {
  documentId: string;
  updatedAt: string;
}

export interface SqlStatement {
  text: string;
  values: unknown[];
}

/** Bookkeeping columns present in every period table */
export const RECORD_COLUMNS = [
  'month',
  'year',
  'month_number',
  'page_number',
  'row_index',
  'sub_row_codes',
  'raw_lines',
  'document_id',
  'updated_at',
] as const;

const COLUMN_TYPES: Record<FieldKind, string> = {
  text: 'TEXT',
  integer: 'INTEGER',
  currency: 'NUMERIC(14,2)',
};

const TRANSLITERATIONS: Record<string, string> = { ä: 'ae', ö: 'oe', ü: 'ue', ß: 'ss' };

/**
 * Table name for a reporting period: lowercase ASCII, umlauts transliterated.
 * März 2025 -> lohnjournal_maerz_2025
 */
export function periodTableName(period: Pick<ReportingPeriod, 'month' | 'year'>): string {
  const month = period.month
    .normalize('NFC')
    .toLowerCase()
    .replace(/[äöüß]/g, (char) => TRANSLITERATIONS[char] ?? char);
  return `lohnjournal_${month}_${period.year}`.replace(/[^a-z0-9_]/g, '_');
}

function assertNoReservedColumns(schema: TableSchema): void {
  const reserved = new Set<string>(RECORD_COLUMNS);
  const clashes = schema.fields.filter((field) => reserved.has(field.name)).map((field) => field.name);
  if (clashes.length > 0) {
    throw new Error(`Field names clash with period table columns: ${clashes.join(', ')}`);
  }
}

/**
 * DDL for a period table. Later statements add columns for fields that a newer
 * layout declares, so tables created by an older layout keep working.
 */
export function periodTableStatements(tableName: string, schema: TableSchema): string[] {
  assertNoReservedColumns(schema);
  const table = quoteIdent(tableName);
  const identifier = quoteIdent(schema.identifierField);

  const fieldColumns = schema.fields.map((field) => {
    const notNull = field.name === schema.identifierField ? ' NOT NULL' : '';
    return `${quoteIdent(field.name)} ${COLUMN_TYPES[field.kind]}${notNull}`;
  });

  const create = `CREATE TABLE IF NOT EXISTS ${table} (
  ${[
    ...fieldColumns,
    'month TEXT NOT NULL',
    'year INTEGER NOT NULL',
    'month_number INTEGER NOT NULL',
    'page_number INTEGER NOT NULL',
    'row_index INTEGER NOT NULL',
    "sub_row_codes TEXT[] NOT NULL DEFAULT '{}'",
    "raw_lines TEXT[] NOT NULL DEFAULT '{}'",
    'document_id TEXT NOT NULL',
    'updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()',
    `PRIMARY KEY (${identifier}, year, month)`,
  ].join(',\n  ')}
)`;

  const additions = schema.fields
    .filter((field) => field.name !== schema.identifierField)
    .map(
      (field) =>
        `ALTER TABLE ${table} ADD COLUMN IF NOT EXISTS ${quoteIdent(field.name)} ${COLUMN_TYPES[field.kind]}`
    );

  return [create, ...additions];
}

/**
 * Column value for a field value. Currency goes to NUMERIC as a decimal string.
 */
export function toColumnValue(value: FieldValue): string | number | null {
  switch (value.kind) {
    case 'empty':
      return null;
    case 'text':
      return value.value;
    case 'integer':
      return value.value;
    case 'currency':
      return formatMinor(value.minor);
  }
}

/**
 * Field value for a column value as returned by pg (NUMERIC arrives as a string).
 */
export function fromColumnValue(raw: unknown, kind: FieldKind): FieldValue {
  if (raw === null || raw === undefined) return EMPTY;

  switch (kind) {
    case 'text':
      return { kind: 'text', value: String(raw) };
    case 'integer': {
      const value = typeof raw === 'number' ? raw : Number.parseInt(String(raw), 10);
      if (!Number.isSafeInteger(value)) {
        throw new Error(`Invalid integer column value: ${String(raw)}`);
      }
      return { kind: 'integer', value };
    }
    case 'currency':
      return {
        kind: 'currency',
        minor: typeof raw === 'number' ? Math.round(raw * 100) : parseDecimalToMinor(String(raw)),
      };
  }
}

/**
 * INSERT ... ON CONFLICT DO UPDATE for one row. Re-importing a document
 * overwrites the stored values instead of adding rows.
 */
export function upsertRowStatement(
  tableName: string,
  schema: TableSchema,
  row: EmployeeRow,
  documentId: string
): SqlStatement {
  const columns: string[] = [];
  const values: unknown[] = [];

  for (const field of schema.fields) {
    columns.push(field.name);
    values.push(toColumnValue(row.fields[field.name] ?? EMPTY));
  }
  columns.push('month', 'year', 'month_number', 'page_number', 'row_index', 'sub_row_codes', 'raw_lines', 'document_id');
  values.push(
    row.month,
    row.year,
    row.monthNumber,
    row.pageNumber,
    row.rowIndex,
    [...row.subRowCodes],
    [...row.rawLines],
    documentId
  );

  const conflictKey = [schema.identifierField, 'year', 'month'];
  const updates = columns
    .filter((column) => !conflictKey.includes(column))
    .map((column) => `${quoteIdent(column)} = EXCLUDED.${quoteIdent(column)}`);
  updates.push('updated_at = NOW()');

  const text = `INSERT INTO ${quoteIdent(tableName)} (${columns.map(quoteIdent).join(', ')})
VALUES (${values.map((_, i) => `$${i + 1}`).join(', ')})
ON CONFLICT (${conflictKey.map(quoteIdent).join(', ')}) DO UPDATE SET
  ${updates.join(',\n  ')}`;

  return { text, values };
}

function readString(record: Record<string, unknown>, column: string): string {
  const value = record[column];
  if (typeof value !== 'string') {
    throw new Error(`Column ${column} is not text`);
  }
  return value;
}

function readInteger(record: Record<string, unknown>, column: string): number {
  const value = record[column];
  const parsed = typeof value === 'number' ? value : Number.parseInt(String(value), 10);
  if (!Number.isSafeInteger(parsed)) {
    throw new Error(`Column ${column} is not an integer`);
  }
  return parsed;
}

function readStringArray(record: Record<string, unknown>, column: string): string[] {
  const value = record[column];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}

function readTimestamp(record: Record<string, unknown>, column: string): string {
  const value = record[column];
  if (value instanceof Date) return value.toISOString();
  return typeof value === 'string' ? value : '';
}

/**
 * Rebuild a row from a period table record.
 */
export function rowFromRecord(record: Record<string, unknown>, schema: TableSchema): StoredEmployeeRow {
  const fields: Record<string, FieldValue> = {};
  for (const field of schema.fields) {
    fields[field.name] = fromColumnValue(record[field.name], field.kind);
  }

  return {
    pageNumber: readInteger(record, 'page_number'),
    rowIndex: readInteger(record, 'row_index'),
    month: readString(record, 'month'),
    year: readInteger(record, 'year'),
    monthNumber: readInteger(record, 'month_number'),
    fields,
    subRowCodes: readStringArray(record, 'sub_row_codes'),
    rawLines: readStringArray(record, 'raw_lines'),
    documentId: readString(record, 'document_id'),
    updatedAt: readTimestamp(record, 'updated_at'),
  };
}
