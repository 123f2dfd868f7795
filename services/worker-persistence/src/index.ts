/**
 * Persistence Worker
 *
 * Consumes the persist_aum queue and writes snapshots to Postgres.
 */

import { Job } from 'bullmq';
import {
  logger,
  config,
  assertValidConfig,
  runWithContextAsync,
  createWorker,
  serveMetrics,
  validatePersistJob,
  QUEUE_NAMES,
  type PersistAumJob,
  jobsProcessedCounter,
  jobDurationHistogram,
} from '@aum-scraper/shared';
import { persistWithPool, pool } from './lib/db';

/**
 * Process persist_aum job
 */
async function processPersistAum(job: Job<PersistAumJob, void>): Promise<void> {
  const { correlation_id, company, source } = job.data;

  return runWithContextAsync(
    {
      correlationId: correlation_id,
      companyId: company.id,
      companyName: company.name,
      sourceType: source.sourceType,
    },
    async () => {
      const startTime = Date.now();

      logger.info('Processing persist_aum', {
        jobId: job.id,
        source_url: source.url,
        extraction_method: job.data.result.extractionMethod,
        attempt: job.attemptsMade + 1,
      });

      try {
        const validation = validatePersistJob(job.data);
        if (!validation.valid) {
          // Retrying cannot fix a malformed payload
          jobsProcessedCounter.inc({ queue: QUEUE_NAMES.PERSIST_AUM, status: 'invalid' });
          logger.error('Discarding invalid persist_aum payload', undefined, {
            errors: validation.errors,
          });
          return;
        }

        await persistWithPool(job.data);

        const duration = (Date.now() - startTime) / 1000;
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.PERSIST_AUM, status: 'success' });
        jobDurationHistogram.observe({ queue: QUEUE_NAMES.PERSIST_AUM, status: 'success' }, duration);
      } catch (error) {
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.PERSIST_AUM, status: 'failed' });
        throw error;
      }
    }
  );
}

assertValidConfig();

const metricsServer = serveMetrics(config.metricsPort);

const worker = createWorker<PersistAumJob, void>(QUEUE_NAMES.PERSIST_AUM, processPersistAum);

logger.info('Persistence worker started');

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  await pool.end();
  metricsServer.close();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
