/**
 * Extractor Worker
 *
 * Reads a Lohnjournal PDF, runs the coordinate-based record extraction and
 * enqueues the rows for persistence. One job per document; documents run in
 * parallel up to WORKER_CONCURRENCY, pages of one document never do.
 */

import { Job, UnrecoverableError } from 'bullmq';
import {
  logger,
  config,
  runWithContextAsync,
  createWorker,
  createQueue,
  serveMetrics,
  validateExtraction,
  loadLayout,
  withRowTolerance,
  RecordExtractor,
  QUEUE_NAMES,
  type ExtractDocumentJob,
  type PersistRowsJob,
  type DocumentInfo,
  type DocumentExtraction,
  jobsProcessedCounter,
  jobDurationHistogram,
  extractionDurationHistogram,
  documentsProcessedCounter,
} from '@lohnjournal/shared';
import { readPdfPages, passwordCandidates, isDocumentFailure } from './lib/pdf';
import { buildExtractionResult, reportExtraction } from './lib/result';

// Layout errors are fatal at startup
const baseProfile = loadLayout(config.layoutVersion);
const profile = config.rowTolerance === null ? baseProfile : withRowTolerance(baseProfile, config.rowTolerance);
const extractor = new RecordExtractor(profile, { strict: config.strictRows });

logger.info('Layout loaded', {
  layout_version: profile.version,
  row_tolerance: profile.rowTolerance,
  strict: config.strictRows,
});

const persistRowsQueue = createQueue<PersistRowsJob, void>(QUEUE_NAMES.PERSIST_ROWS);

async function readAndExtract(filePath: string, jobPasswords: readonly string[]): Promise<DocumentExtraction> {
  const pdfResult = await readPdfPages(filePath, passwordCandidates(jobPasswords, config.pdfPasswords));
  return extractor.extractDocument(pdfResult.pages);
}

/**
 * Process extract_document job
 */
async function processExtractDocument(job: Job<ExtractDocumentJob, void>): Promise<void> {
  const { correlation_id, document_id, raw_uri, source_filename, discovered_at, passwords } = job.data;

  return runWithContextAsync(
    {
      correlationId: correlation_id,
      documentId: document_id,
      sourceFilename: source_filename,
      layoutVersion: extractor.profile.version,
    },
    async () => {
      const startTime = Date.now();

      logger.info('Processing extract_document', {
        jobId: job.id,
        document_id,
        source_filename,
        attempt: job.attemptsMade + 1,
      });

      try {
        const filePath = raw_uri.replace('file://', '');

        const extraction = await readAndExtract(filePath, passwords ?? []).catch((err: unknown) => {
          if (isDocumentFailure(err)) {
            logger.error('Document cannot be extracted', err, { document_id });
            throw new UnrecoverableError(err instanceof Error ? err.message : String(err));
          }
          throw err;
        });

        const extractionSeconds = (Date.now() - startTime) / 1000;
        extractionDurationHistogram.observe({ layout_version: profile.version }, extractionSeconds);

        const check = reportExtraction(extraction, config.layoutMismatchRatio);

        if (extraction.processedPages.length === 0) {
          logger.warn('Document has no Lohnjournal pages', {
            document_id,
            skipped_pages: extraction.skippedPages.length,
          });
        }

        const documentInfo: DocumentInfo = { document_id, source_filename, raw_uri, discovered_at };
        const extractionResult = buildExtractionResult(extraction, documentInfo, correlation_id);

        const validation = validateExtraction(extractionResult);
        if (!validation.valid) {
          throw new UnrecoverableError(`Extraction result failed validation: ${validation.errors.join('; ')}`);
        }

        const persistPayload: PersistRowsJob = {
          event_type: 'extraction.complete',
          correlation_id,
          extraction_result: validation.value,
        };

        await persistRowsQueue.add('persist_rows', persistPayload, {
          jobId: `persist_${correlation_id}_${document_id.replace(':', '_')}`,
        });

        logger.info('Enqueued persist_rows', {
          document_id,
          period: extraction.metadata.period,
          row_count: extraction.rows.length,
          rejected_count: check.rejected,
          header_error_count: extraction.headerErrors.length,
        });

        // Record metrics
        const duration = (Date.now() - startTime) / 1000;
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.EXTRACT_DOCUMENT, status: 'success' });
        jobDurationHistogram.observe({ queue: QUEUE_NAMES.EXTRACT_DOCUMENT, status: 'success' }, duration);
        documentsProcessedCounter.inc({ layout_version: profile.version, status: 'success' });
      } catch (error) {
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.EXTRACT_DOCUMENT, status: 'failed' });
        documentsProcessedCounter.inc({ layout_version: profile.version, status: 'error' });
        throw error;
      }
    }
  );
}

// Expose /metrics for Prometheus
const metricsServer = serveMetrics(config.metricsPort);

// Create and start the worker
const worker = createWorker<ExtractDocumentJob, void>(QUEUE_NAMES.EXTRACT_DOCUMENT, processExtractDocument);

logger.info('Extractor worker started');

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  await persistRowsQueue.close();
  metricsServer.close();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
