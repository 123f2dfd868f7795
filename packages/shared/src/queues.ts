/**
 * BullMQ Queue Definitions
 *
 * Queue names, job payloads, and queue/worker factories for the
 * extraction pipeline:
 *
 *   extract_aum  (company + scraped sources)  -> extractor worker
 *   persist_aum  (one result per source)      -> persistence worker
 */

import { Queue, Worker } from 'bullmq';
import type { ConnectionOptions, Job } from 'bullmq';
import { config } from './config';
import { logger } from './logger';
import type { AumExtractionResult, CompanyRef, ScrapedSource } from './types';

// ============================================================================
// Queue Names
// ============================================================================

export const QUEUE_NAMES = {
  EXTRACT_AUM: 'extract_aum',
  PERSIST_AUM: 'persist_aum',
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

// ============================================================================
// Job Payloads
// ============================================================================

/**
 * extract_aum - Enqueued by the scraping layer once a company's pages are fetched
 */
export interface ExtractAumJob {
  correlation_id: string;
  company: CompanyRef;
  sources: ScrapedSource[];
}

/**
 * Source as stored with its result; the page content itself is not carried on.
 */
export interface PersistedSource {
  url: string;
  sourceType: ScrapedSource['sourceType'];
  status: ScrapedSource['status'];
  /** Length of the page text in characters */
  contentLength?: number;
  isBlocked?: boolean;
}

/**
 * persist_aum - Enqueued by the extractor worker, one per source
 */
export interface PersistAumJob {
  correlation_id: string;
  company: CompanyRef;
  source: PersistedSource;
  result: AumExtractionResult;
  chunks_count: number;
  error_message?: string;
}

export interface ExtractAumJobResult {
  sources: number;
  persisted: number;
}

// ============================================================================
// Redis Connection
// ============================================================================

export function getRedisConnection(): ConnectionOptions {
  const redisUrl = config.redisUrl;

  if (redisUrl && redisUrl.startsWith('redis://')) {
    try {
      const url = new URL(redisUrl);
      return {
        host: url.hostname,
        port: parseInt(url.port || '6379', 10),
        maxRetriesPerRequest: null, // Required for BullMQ
      };
    } catch (err) {
      logger.warn('Invalid REDIS_URL, using REDIS_HOST/REDIS_PORT', {
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
  removeOnComplete: 100,
  removeOnFail: 1000,
};

export function createQueue<TData, TResult = void>(queueName: QueueName): Queue<TData, TResult> {
  return new Queue<TData, TResult>(queueName, {
    connection: getRedisConnection(),
    defaultJobOptions,
  });
}

// ============================================================================
// Worker Factory
// ============================================================================

export interface WorkerOptions {
  /** Jobs processed at once; bounds how many companies are extracted concurrently */
  concurrency?: number;
}

export function createWorker<TData, TResult>(
  queueName: QueueName,
  processor: (job: Job<TData, TResult>) => Promise<TResult>,
  options: WorkerOptions = {}
): Worker<TData, TResult> {
  const concurrency = options.concurrency || config.workerConcurrency;
  const worker = new Worker<TData, TResult>(queueName, processor, {
    connection: getRedisConnection(),
    concurrency,
  });

  worker.on('completed', (job) => {
    logger.info('Job completed', { queue: queueName, jobId: job.id });
  });

  worker.on('failed', (job, err) => {
    logger.error('Job failed', err, {
      queue: queueName,
      jobId: job?.id,
      attempts: job?.attemptsMade,
    });
  });

  worker.on('error', (err) => {
    logger.error('Worker error', err, { queue: queueName });
  });

  logger.info('Worker started', { queue: queueName, concurrency });

  return worker;
}

// ============================================================================
// Queue Metrics
// ============================================================================

export interface QueueCounts {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}

export async function getQueueMetrics(queue: Queue): Promise<QueueCounts> {
  const [waiting, active, completed, failed, delayed] = await Promise.all([
    queue.getWaitingCount(),
    queue.getActiveCount(),
    queue.getCompletedCount(),
    queue.getFailedCount(),
    queue.getDelayedCount(),
  ]);

  return { waiting, active, completed, failed, delayed };
}
