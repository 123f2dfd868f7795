/**
 * AUM Extractor Worker
 *
 * Consumes extract_aum jobs (one company with its scraped pages), runs the
 * two-tier extraction on each page and enqueues persist_aum. Hosts the
 * usage API on the same process so it reports the live token budget.
 */

import { Job } from 'bullmq';
import {
  logger,
  config,
  assertValidConfig,
  runWithContextAsync,
  createWorker,
  createQueue,
  createAumExtractor,
  enableDefaultMetrics,
  reportQueueMetrics,
  QUEUE_NAMES,
  type ExtractAumJob,
  type ExtractAumJobResult,
  type PersistAumJob,
  jobsProcessedCounter,
  jobDurationHistogram,
} from '@aum-scraper/shared';
import { processCompanySources } from './lib/process-sources';
import { createUsageApp } from './lib/usage-api';

assertValidConfig();
enableDefaultMetrics();

const extractor = createAumExtractor();
const persistQueue = createQueue<PersistAumJob, void>(QUEUE_NAMES.PERSIST_AUM);

/**
 * Process extract_aum job
 */
async function processExtractAum(
  job: Job<ExtractAumJob, ExtractAumJobResult>
): Promise<ExtractAumJobResult> {
  const { correlation_id, company, sources } = job.data;

  return runWithContextAsync(
    { correlationId: correlation_id, companyId: company.id, companyName: company.name },
    async () => {
      const startTime = Date.now();

      logger.info('Processing extract_aum', {
        jobId: job.id,
        source_count: sources.length,
        attempt: job.attemptsMade + 1,
      });

      try {
        const result = await processCompanySources(job.data, extractor, persistQueue);

        const duration = (Date.now() - startTime) / 1000;
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.EXTRACT_AUM, status: 'success' });
        jobDurationHistogram.observe({ queue: QUEUE_NAMES.EXTRACT_AUM, status: 'success' }, duration);

        return result;
      } catch (error) {
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.EXTRACT_AUM, status: 'failed' });
        throw error;
      }
    }
  );
}

// Worker concurrency bounds how many companies are extracted at once
const worker = createWorker<ExtractAumJob, ExtractAumJobResult>(
  QUEUE_NAMES.EXTRACT_AUM,
  processExtractAum
);

const app = createUsageApp(extractor, {
  beforeMetrics: () => reportQueueMetrics([{ name: QUEUE_NAMES.PERSIST_AUM, queue: persistQueue }]),
});

const server = app.listen(config.usageApiPort, () => {
  logger.info('Usage API listening', { port: config.usageApiPort });
});

logger.info('AUM extractor worker started', {
  model: config.llmModel,
  max_tokens_per_day: config.maxTokensPerDay,
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  await persistQueue.close();
  server.close();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
