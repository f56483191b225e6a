/**
 * Ingestion Worker
 *
 * Consumes document_available queue, validates that raw_uri points at a PDF,
 * and enqueues extract_document job.
 */

import fs from 'fs';
import { Job, UnrecoverableError } from 'bullmq';
import {
  logger,
  config,
  runWithContextAsync,
  createWorker,
  createQueue,
  serveMetrics,
  QUEUE_NAMES,
  type DocumentAvailableJob,
  type ExtractDocumentJob,
  jobsProcessedCounter,
  jobDurationHistogram,
} from '@lohnjournal/shared';

const PDF_MAGIC = '%PDF-';

// Create queues
const extractDocumentQueue = createQueue<ExtractDocumentJob, void>(QUEUE_NAMES.EXTRACT_DOCUMENT);

function readMagic(filePath: string): string {
  const fd = fs.openSync(filePath, 'r');
  try {
    const buffer = Buffer.alloc(PDF_MAGIC.length);
    fs.readSync(fd, buffer, 0, buffer.length, 0);
    return buffer.toString('latin1');
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Process document_available job
 */
async function processDocumentAvailable(job: Job<DocumentAvailableJob, void>): Promise<void> {
  const { correlation_id, document_id, raw_uri, source_filename } = job.data;

  return runWithContextAsync(
    { correlationId: correlation_id, documentId: document_id, sourceFilename: source_filename },
    async () => {
      const startTime = Date.now();

      logger.info('Processing document_available', {
        jobId: job.id,
        document_id,
        source_filename,
        attempt: job.attemptsMade + 1,
      });

      try {
        // Validate raw_uri exists
        const filePath = raw_uri.replace('file://', '');

        if (!fs.existsSync(filePath)) {
          throw new Error(`Raw file not found: ${filePath}`);
        }

        if (readMagic(filePath) !== PDF_MAGIC) {
          throw new UnrecoverableError(`Not a PDF file: ${source_filename}`);
        }

        const stats = fs.statSync(filePath);
        logger.info('Validated raw file', {
          document_id,
          size_bytes: stats.size,
        });

        // Enqueue extract_document job
        const extractPayload: ExtractDocumentJob = {
          ...job.data,
          size_bytes: stats.size,
        };

        await extractDocumentQueue.add('extract_document', extractPayload, {
          jobId: `extract_${correlation_id}_${document_id.replace(':', '_')}`,
        });

        logger.info('Enqueued extract_document job', { document_id });

        // Record metrics
        const duration = (Date.now() - startTime) / 1000;
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.DOCUMENT_AVAILABLE, status: 'success' });
        jobDurationHistogram.observe({ queue: QUEUE_NAMES.DOCUMENT_AVAILABLE, status: 'success' }, duration);
      } catch (error) {
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.DOCUMENT_AVAILABLE, status: 'failed' });
        throw error;
      }
    }
  );
}

// Expose /metrics for Prometheus
const metricsServer = serveMetrics(config.metricsPort);

// Create and start the worker
const worker = createWorker<DocumentAvailableJob, void>(QUEUE_NAMES.DOCUMENT_AVAILABLE, processDocumentAvailable);

logger.info('Ingestion worker started');

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  await extractDocumentQueue.close();
  metricsServer.close();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
