/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Types
export * from './types';

// Extraction core
export * from './lohnjournal';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type DocumentAvailableJob,
  type ExtractDocumentJob,
  type PersistRowsJob,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  checkBackpressure,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  queueDepthGauge,
  queueMetricsGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  documentsProcessedCounter,
  extractionDurationHistogram,
  pagesCounter,
  rowsExtractedCounter,
  rowsRejectedCounter,
  backpressureRejectionsCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  dbQueryDurationHistogram,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export { validateExtraction, validateLayoutDefinition, type ValidationResult } from './schemas';

// Database
export { createDatabase, quoteIdent, type Database, type SqlExecutor, type SqlResult } from './db';
export {
  RECORD_COLUMNS,
  periodTableName,
  periodTableStatements,
  upsertRowStatement,
  toColumnValue,
  fromColumnValue,
  rowFromRecord,
  type TableSchema,
  type StoredEmployeeRow,
  type SqlStatement,
} from './period-tables';
