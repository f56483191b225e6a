/**
 * Database Operations
 *
 * Persists an extraction result in one transaction: the document registry
 * entry, one upsert per employee row into its period table, and the period
 * registry. Rows are keyed by (pers_nr, year, month), so re-importing a
 * document updates rows instead of duplicating them.
 */

import { Pool } from 'pg';
import {
  logger,
  config,
  createDatabase,
  quoteIdent,
  periodTableName,
  periodTableStatements,
  upsertRowStatement,
  type Database,
  type SqlExecutor,
  type EmployeeRow,
  type ExtractionResult,
  type TableSchema,
} from '@lohnjournal/shared';

const pool = new Pool({
  connectionString: config.databaseUrl,
  max: 20,
  idleTimeoutMillis: 30000,
});

export const database: Database = createDatabase(pool);

export interface PeriodBatch {
  tableName: string;
  month: string;
  year: number;
  monthNumber: number;
  rows: EmployeeRow[];
}

export interface PersistSummary {
  documentId: string;
  periods: Array<{ tableName: string; rowCount: number }>;
  rowCount: number;
}

/**
 * Group rows by reporting period, oldest first. A document normally covers
 * one period, but every row carries its own.
 */
export function groupRowsByPeriod(rows: readonly EmployeeRow[]): PeriodBatch[] {
  const batches = new Map<string, PeriodBatch>();

  for (const row of rows) {
    const tableName = periodTableName(row);
    let batch = batches.get(tableName);
    if (!batch) {
      batch = { tableName, month: row.month, year: row.year, monthNumber: row.monthNumber, rows: [] };
      batches.set(tableName, batch);
    }
    batch.rows.push(row);
  }

  return [...batches.values()].sort((a, b) => a.year - b.year || a.monthNumber - b.monthNumber);
}

/**
 * Upsert document record
 */
async function upsertDocument(tx: SqlExecutor, result: ExtractionResult, correlationId: string): Promise<void> {
  const { document, metadata } = result;

  await tx.query(
    `INSERT INTO lohnjournal_documents (
       document_id, source_filename, raw_uri, layout_version,
       berater, mandant, datum, period,
       row_count, rejected_count, header_error_count, skipped_pages, diagnostics,
       correlation_id, processed_at)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, NOW())
     ON CONFLICT (document_id) DO UPDATE SET
       source_filename = EXCLUDED.source_filename,
       raw_uri = EXCLUDED.raw_uri,
       layout_version = EXCLUDED.layout_version,
       berater = EXCLUDED.berater,
       mandant = EXCLUDED.mandant,
       datum = EXCLUDED.datum,
       period = EXCLUDED.period,
       row_count = EXCLUDED.row_count,
       rejected_count = EXCLUDED.rejected_count,
       header_error_count = EXCLUDED.header_error_count,
       skipped_pages = EXCLUDED.skipped_pages,
       diagnostics = EXCLUDED.diagnostics,
       correlation_id = EXCLUDED.correlation_id,
       processed_at = NOW()`,
    [
      document.document_id,
      document.source_filename,
      document.raw_uri,
      result.layout_version,
      metadata.berater,
      metadata.mandant,
      metadata.datum,
      metadata.period,
      result.rows.length,
      result.rejections.length,
      result.header_errors.length,
      result.skipped_pages,
      JSON.stringify({ rejections: result.rejections, header_errors: result.header_errors }),
      correlationId,
    ]
  );
}

/**
 * Create the period table if needed, upsert its rows and refresh the period registry
 */
async function persistPeriod(
  tx: SqlExecutor,
  batch: PeriodBatch,
  schema: TableSchema,
  result: ExtractionResult
): Promise<void> {
  const documentId = result.document.document_id;

  // Concurrent jobs for the same period must not race on CREATE TABLE
  await tx.query('SELECT pg_advisory_xact_lock(hashtext($1))', [batch.tableName]);

  for (const statement of periodTableStatements(batch.tableName, schema)) {
    await tx.query(statement);
  }

  for (const row of batch.rows) {
    const { text, values } = upsertRowStatement(batch.tableName, schema, row, documentId);
    await tx.query(text, values);
  }

  await tx.query(
    `INSERT INTO lohnjournal_periods (table_name, month, year, month_number, layout_version, document_id, row_count, updated_at)
     VALUES ($1, $2, $3, $4, $5, $6, (SELECT COUNT(*) FROM ${quoteIdent(batch.tableName)}), NOW())
     ON CONFLICT (table_name) DO UPDATE SET
       layout_version = EXCLUDED.layout_version,
       document_id = EXCLUDED.document_id,
       row_count = EXCLUDED.row_count,
       updated_at = NOW()`,
    [batch.tableName, batch.month, batch.year, batch.monthNumber, result.layout_version, documentId]
  );
}

/**
 * Persist extraction result to database
 */
export async function persistExtractionResult(
  result: ExtractionResult,
  schema: TableSchema,
  correlationId: string,
  db: Database = database
): Promise<PersistSummary> {
  const batches = groupRowsByPeriod(result.rows);

  await db.transaction('persist_extraction', async (tx) => {
    await upsertDocument(tx, result, correlationId);
    for (const batch of batches) {
      await persistPeriod(tx, batch, schema, result);
    }
  });

  const summary: PersistSummary = {
    documentId: result.document.document_id,
    periods: batches.map((batch) => ({ tableName: batch.tableName, rowCount: batch.rows.length })),
    rowCount: result.rows.length,
  };

  logger.info('Persisted extraction result', {
    document_id: summary.documentId,
    periods: summary.periods.map((period) => period.tableName),
    row_count: summary.rowCount,
  });

  return summary;
}

