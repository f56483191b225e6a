/**
 * Database Access
 *
 * Thin layer over a pg Pool: plain queries plus BEGIN/COMMIT/ROLLBACK
 * transactions on a dedicated client. Services depend on the Database
 * interface so persistence logic can run against an in-process fake in tests.
 */

import type { Pool } from 'pg';
import { logger } from './logger';
import { dbQueryDurationHistogram } from './metrics';

export interface SqlResult {
  rows: Array<Record<string, unknown>>;
  rowCount: number | null;
}

export interface SqlExecutor {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
}

export interface Database extends SqlExecutor {
  /** Run work inside a transaction; rolls back and rethrows on failure */
  transaction<T>(operation: string, work: (tx: SqlExecutor) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export function createDatabase(pool: Pool): Database {
  return {
    async query(text, values) {
      const result = await pool.query(text, values);
      return { rows: result.rows, rowCount: result.rowCount };
    },

    async transaction(operation, work) {
      const client = await pool.connect();
      const startTime = Date.now();

      try {
        await client.query('BEGIN');
        const tx: SqlExecutor = {
          async query(text, values) {
            const result = await client.query(text, values);
            return { rows: result.rows, rowCount: result.rowCount };
          },
        };
        const result = await work(tx);
        await client.query('COMMIT');

        dbQueryDurationHistogram.observe({ operation }, (Date.now() - startTime) / 1000);
        return result;
      } catch (error) {
        await client.query('ROLLBACK');
        logger.error('Transaction rolled back', error, { operation });
        throw error;
      } finally {
        client.release();
      }
    },

    async close() {
      await pool.end();
    },
  };
}

/**
 * Quote an SQL identifier (table or column name).
 */
export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}
