/**
 * Adapter API
 *
 * POST /imports - Scans a folder of Lohnjournal PDFs and enqueues them for extraction
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  config,
  runWithContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  reportQueueMetrics,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  backpressureRejectionsCounter,
  createQueue,
  checkBackpressure,
  QUEUE_NAMES,
  type DocumentAvailableJob,
  type ErrorEnvelope,
} from '@lohnjournal/shared';
import { importFolder, parseImportRequest, resolveImportFolder, ImportRequestError } from './lib/import';

const app = express();
const port = config.adapterApiPort;

// Create the document_available queue
const documentAvailableQueue = createQueue<DocumentAvailableJob, void>(QUEUE_NAMES.DOCUMENT_AVAILABLE);

function errorEnvelope(code: string, message: string): ErrorEnvelope {
  return { error: { code, message, correlation_id: getCorrelationId() } };
}

// Middleware
app.use(express.json());

// Correlation ID middleware
app.use((req: Request, res: Response, next: NextFunction) => {
  const header = req.headers['x-correlation-id'];
  const correlationId = typeof header === 'string' && /^[\w-]{1,64}$/.test(header) ? header : ulid();
  res.setHeader('X-Correlation-Id', correlationId);

  runWithContext({ correlationId }, () => {
    next();
  });
});

// Request timing middleware
app.use((req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();

  res.on('finish', () => {
    const duration = (Date.now() - start) / 1000;
    const route: unknown = req.route;
    const path =
      route !== null && typeof route === 'object' && 'path' in route && typeof route.path === 'string'
        ? route.path
        : req.path;

    httpRequestDurationHistogram.observe({ method: req.method, path, status: res.statusCode.toString() }, duration);
    httpRequestsCounter.inc({ method: req.method, path, status: res.statusCode.toString() });

    logger.info('Request completed', {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration_ms: Math.round(duration * 1000),
    });
  });

  next();
});

// Health check
app.get('/health', async (req: Request, res: Response) => {
  try {
    // Check Redis connection via queue
    const metrics = await checkBackpressure(documentAvailableQueue);

    res.json({
      status: 'healthy',
      service: 'adapter-api',
      queue_depth: metrics.depth,
      timestamp: new Date().toISOString(),
    });
  } catch (error) {
    res.status(503).json({
      status: 'unhealthy',
      service: 'adapter-api',
      error: error instanceof Error ? error.message : 'Unknown error',
      timestamp: new Date().toISOString(),
    });
  }
});

// Metrics endpoint
app.get('/metrics', async (req: Request, res: Response) => {
  try {
    await reportQueueMetrics([{ name: QUEUE_NAMES.DOCUMENT_AVAILABLE, queue: documentAvailableQueue }]);
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  } catch (error) {
    logger.error('Metrics scrape failed', error);
    res.status(500).end();
  }
});

/**
 * POST /imports
 * Enqueues every PDF of the import folder (default: LOHNJOURNAL_PDF_FOLDER)
 */
app.post('/imports', async (req: Request, res: Response) => {
  try {
    const body = parseImportRequest(req.body);
    const folder = resolveImportFolder(body.folder, config.pdfFolder);

    // Check backpressure
    const backpressure = await checkBackpressure(documentAvailableQueue);

    if (backpressure.shouldReject) {
      backpressureRejectionsCounter.inc();
      logger.warn('Request rejected due to backpressure', { queue_depth: backpressure.depth });
      res.status(503).json(errorEnvelope('service_unavailable', 'System is under heavy load. Please retry later.'));
      return;
    }

    if (backpressure.shouldWarn) {
      logger.warn('Queue depth approaching threshold', { queue_depth: backpressure.depth });
    }

    logger.info('Starting import', { folder });

    const response = await importFolder(
      {
        folder,
        passwords: body.passwords ?? [],
        maxDocuments: body.max_documents ?? config.maxDocumentsPerImport,
      },
      getCorrelationId(),
      documentAvailableQueue
    );

    logger.info('Import enqueued', { enqueued: response.enqueued, skipped: response.skipped.length });

    res.status(202).json(response);
  } catch (error) {
    if (error instanceof ImportRequestError) {
      res.status(400).json(errorEnvelope('invalid_request', error.message));
      return;
    }

    logger.error('Import failed', error);
    res.status(500).json(errorEnvelope('internal_error', error instanceof Error ? error.message : 'Unknown error'));
  }
});

// Start server
const server = app.listen(port, () => {
  logger.info('Adapter API started', { port });
});

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  server.close();
  await documentAvailableQueue.close();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
