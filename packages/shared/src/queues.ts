/**
 * BullMQ Queue Definitions
 *
 * Queue names, job interfaces, and queue factory functions.
 * One job per document: documents are extracted in parallel, pages never are.
 */

import { Queue, Worker, Job, UnrecoverableError, type ConnectionOptions } from 'bullmq';
import { config } from './config';
import { logger } from './logger';
import type { ExtractionResult } from './types';

// ============================================================================
// Queue Names
// ============================================================================

export const QUEUE_NAMES = {
  DOCUMENT_AVAILABLE: 'document_available',
  EXTRACT_DOCUMENT: 'extract_document',
  PERSIST_ROWS: 'persist_rows',
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

// ============================================================================
// Job Payloads
// ============================================================================

/**
 * document.available - Enqueued by the adapter for each PDF found in the import folder
 */
export interface DocumentAvailableJob {
  event_type: 'document.available';
  correlation_id: string;
  document_id: string;
  raw_uri: string;
  source_filename: string;
  discovered_at: string;
  /** Candidate passwords supplied with the import request */
  passwords?: string[];
}

/**
 * extract_document - Enqueued by ingestion worker
 */
export interface ExtractDocumentJob extends DocumentAvailableJob {
  size_bytes: number;
}

/**
 * persist_rows - Enqueued after successful extraction
 */
export interface PersistRowsJob {
  event_type: 'extraction.complete';
  correlation_id: string;
  extraction_result: ExtractionResult;
}

// ============================================================================
// Redis Connection
// ============================================================================

/**
 * Connection options from REDIS_URL (redis:// or rediss://, with optional
 * credentials and database index), else REDIS_HOST/REDIS_PORT.
 */
export function getRedisConnection(): ConnectionOptions {
  const redisUrl = config.redisUrl;

  if (/^rediss?:\/\//.test(redisUrl)) {
    try {
      const url = new URL(redisUrl);
      const db = url.pathname.length > 1 ? Number.parseInt(url.pathname.slice(1), 10) : 0;
      return {
        host: url.hostname,
        port: parseInt(url.port || '6379', 10),
        ...(url.username ? { username: decodeURIComponent(url.username) } : {}),
        ...(url.password ? { password: decodeURIComponent(url.password) } : {}),
        ...(Number.isInteger(db) && db > 0 ? { db } : {}),
        ...(url.protocol === 'rediss:' ? { tls: {} } : {}),
        maxRetriesPerRequest: null, // Required for BullMQ
      };
    } catch (err) {
      logger.warn('Invalid REDIS_URL, using host/port', {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  return {
    host: config.redisHost,
    port: config.redisPort,
    maxRetriesPerRequest: null,
  };
}

// ============================================================================
// Queue Factory
// ============================================================================

const defaultJobOptions = {
  attempts: config.maxJobAttempts,
  backoff: {
    type: 'exponential' as const,
    delay: config.backoffBaseMs,
  },
  removeOnComplete: 100, // Keep last 100 completed jobs
  removeOnFail: 1000, // Keep last 1000 failed jobs
};

export function createQueue<TData, TResult>(queueName: QueueName): Queue<TData, TResult> {
  return new Queue<TData, TResult>(queueName, {
    connection: getRedisConnection(),
    defaultJobOptions,
  });
}

// ============================================================================
// Worker Factory
// ============================================================================

export interface WorkerOptions {
  concurrency?: number;
}

export function createWorker<TData, TResult>(
  queueName: QueueName,
  processor: (job: Job<TData, TResult>) => Promise<TResult>,
  options: WorkerOptions = {}
): Worker<TData, TResult> {
  const worker = new Worker<TData, TResult>(queueName, processor, {
    connection: getRedisConnection(),
    concurrency: options.concurrency || config.workerConcurrency,
  });

  worker.on('completed', (job) => {
    logger.info('Job completed', {
      queue: queueName,
      jobId: job.id,
    });
  });

  worker.on('failed', (job, err) => {
    // UnrecoverableError marks document-level failures that retrying cannot fix
    const final = err instanceof UnrecoverableError || (job ? job.attemptsMade >= (job.opts.attempts ?? 1) : true);
    logger.error(final ? 'Job failed permanently' : 'Job failed, will retry', err, {
      queue: queueName,
      jobId: job?.id,
      attempts: job?.attemptsMade,
    });
  });

  worker.on('error', (err) => {
    logger.error('Worker error', err, { queue: queueName });
  });

  logger.info('Worker started', {
    queue: queueName,
    concurrency: options.concurrency || config.workerConcurrency,
  });

  return worker;
}

// ============================================================================
// Queue Metrics
// ============================================================================

export async function getQueueMetrics(queue: Queue): Promise<{
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}> {
  const [waiting, active, completed, failed, delayed] = await Promise.all([
    queue.getWaitingCount(),
    queue.getActiveCount(),
    queue.getCompletedCount(),
    queue.getFailedCount(),
    queue.getDelayedCount(),
  ]);

  return { waiting, active, completed, failed, delayed };
}

/**
 * Check backpressure thresholds
 */
export async function checkBackpressure(queue: Queue): Promise<{
  shouldWarn: boolean;
  shouldReject: boolean;
  depth: number;
}> {
  const metrics = await getQueueMetrics(queue);
  const depth = metrics.waiting + metrics.active;

  return {
    shouldWarn: depth >= config.maxQueueDepthWarning,
    shouldReject: depth >= config.maxQueueDepthReject,
    depth,
  };
}
