/**
 * Database Queries
 *
 * Read access to the period registry and the per-period tables.
 */

import { Pool } from 'pg';
import {
  config,
  createDatabase,
  quoteIdent,
  rowFromRecord,
  dbQueryDurationHistogram,
  type Database,
  type SqlExecutor,
  type PeriodSummary,
  type StoredEmployeeRow,
  type TableSchema,
} from '@lohnjournal/shared';

const pool = new Pool({
  connectionString: config.databaseUrl,
  max: 20,
  idleTimeoutMillis: 30000,
});

export const database: Database = createDatabase(pool);

export interface PeriodRows {
  period: PeriodSummary;
  rows: StoredEmployeeRow[];
}

async function timed<T>(operation: string, work: () => Promise<T>): Promise<T> {
  const startTime = Date.now();
  try {
    return await work();
  } finally {
    dbQueryDurationHistogram.observe({ operation }, (Date.now() - startTime) / 1000);
  }
}

function toPeriodSummary(record: Record<string, unknown>): PeriodSummary {
  const updatedAt = record.updated_at;
  return {
    table_name: String(record.table_name),
    month: String(record.month),
    year: Number(record.year),
    month_number: Number(record.month_number),
    row_count: Number(record.row_count),
    document_id: typeof record.document_id === 'string' ? record.document_id : null,
    updated_at: updatedAt instanceof Date ? updatedAt.toISOString() : String(updatedAt),
  };
}

const PERIOD_COLUMNS = 'table_name, month, year, month_number, row_count, document_id, updated_at';

/**
 * All persisted periods, oldest first
 */
export async function listPeriods(db: SqlExecutor = database): Promise<PeriodSummary[]> {
  const result = await timed('list_periods', () =>
    db.query(`SELECT ${PERIOD_COLUMNS} FROM lohnjournal_periods ORDER BY year, month_number`)
  );
  return result.rows.map(toPeriodSummary);
}

export async function findPeriod(
  year: number,
  monthNumber: number,
  db: SqlExecutor = database
): Promise<PeriodSummary | null> {
  const result = await timed('find_period', () =>
    db.query(`SELECT ${PERIOD_COLUMNS} FROM lohnjournal_periods WHERE year = $1 AND month_number = $2`, [
      year,
      monthNumber,
    ])
  );
  return result.rows.length > 0 ? toPeriodSummary(result.rows[0]) : null;
}

/**
 * Rows of one period in page order
 */
export async function getPeriodRows(
  period: PeriodSummary,
  schema: TableSchema,
  db: SqlExecutor = database
): Promise<StoredEmployeeRow[]> {
  const result = await timed('period_rows', () =>
    db.query(`SELECT * FROM ${quoteIdent(period.table_name)} ORDER BY page_number, row_index`)
  );
  return result.rows.map((record) => rowFromRecord(record, schema));
}

/**
 * One employee's rows across all periods, oldest first
 */
export async function getEmployeeHistory(
  identifier: string,
  schema: TableSchema,
  db: SqlExecutor = database
): Promise<StoredEmployeeRow[]> {
  const periods = await listPeriods(db);
  const rows: StoredEmployeeRow[] = [];

  for (const period of periods) {
    const result = await timed('employee_rows', () =>
      db.query(`SELECT * FROM ${quoteIdent(period.table_name)} WHERE ${quoteIdent(schema.identifierField)} = $1`, [
        identifier,
      ])
    );
    rows.push(...result.rows.map((record) => rowFromRecord(record, schema)));
  }

  return rows;
}

/**
 * Every period with its rows, for the spreadsheet export
 */
export async function loadAllPeriodRows(schema: TableSchema, db: SqlExecutor = database): Promise<PeriodRows[]> {
  const periods = await listPeriods(db);
  const result: PeriodRows[] = [];
  for (const period of periods) {
    result.push({ period, rows: await getPeriodRows(period, schema, db) });
  }
  return result;
}
