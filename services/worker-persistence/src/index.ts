/**
 * Persistence Worker
 *
 * Consumes persist_rows queue and upserts the rows into their period tables.
 */

import { Job, UnrecoverableError } from 'bullmq';
import {
  logger,
  config,
  runWithContextAsync,
  createWorker,
  serveMetrics,
  validateExtraction,
  loadLayout,
  LayoutConfigError,
  QUEUE_NAMES,
  type PersistRowsJob,
  type TableSchema,
  jobsProcessedCounter,
  jobDurationHistogram,
} from '@lohnjournal/shared';
import { persistExtractionResult, database } from './lib/db';

const tableSchemas = new Map<string, TableSchema>();

/**
 * Column layout for rows extracted with a layout version
 */
function tableSchemaFor(layoutVersion: string): TableSchema {
  let schema = tableSchemas.get(layoutVersion);
  if (!schema) {
    const profile = loadLayout(layoutVersion);
    schema = { fields: profile.fields, identifierField: profile.identifierField };
    tableSchemas.set(layoutVersion, schema);
  }
  return schema;
}

/**
 * Process persist_rows job
 */
async function processPersistRows(job: Job<PersistRowsJob, void>): Promise<void> {
  const { correlation_id } = job.data;

  const validation = validateExtraction(job.data.extraction_result);
  if (!validation.valid) {
    throw new UnrecoverableError(`Invalid extraction result: ${validation.errors.join('; ')}`);
  }
  const result = validation.value;

  return runWithContextAsync(
    {
      correlationId: correlation_id,
      documentId: result.document.document_id,
      sourceFilename: result.document.source_filename,
      layoutVersion: result.layout_version,
    },
    async () => {
      const startTime = Date.now();

      logger.info('Processing persist_rows', {
        jobId: job.id,
        document_id: result.document.document_id,
        layout_version: result.layout_version,
        row_count: result.rows.length,
        attempt: job.attemptsMade + 1,
      });

      try {
        let schema: TableSchema;
        try {
          schema = tableSchemaFor(result.layout_version);
        } catch (err) {
          if (err instanceof LayoutConfigError) throw new UnrecoverableError(err.message);
          throw err;
        }

        // Persist to database
        const summary = await persistExtractionResult(result, schema, correlation_id);

        // Record metrics
        const duration = (Date.now() - startTime) / 1000;
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.PERSIST_ROWS, status: 'success' });
        jobDurationHistogram.observe({ queue: QUEUE_NAMES.PERSIST_ROWS, status: 'success' }, duration);

        logger.info('Persist complete', {
          document_id: summary.documentId,
          periods: summary.periods,
          duration_seconds: duration,
        });
      } catch (error) {
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.PERSIST_ROWS, status: 'failed' });
        throw error;
      }
    }
  );
}

// Expose /metrics for Prometheus
const metricsServer = serveMetrics(config.metricsPort);

// Create and start the worker
const worker = createWorker<PersistRowsJob, void>(QUEUE_NAMES.PERSIST_ROWS, processPersistRows);

logger.info('Persistence worker started');

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  await database.close();
  metricsServer.close();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
