/**
 * Prometheus Metrics
 *
 * Metrics for extraction outcomes, LLM usage, the daily token budget,
 * queue depth and job processing.
 */

import http from 'node:http';
import type { Queue } from 'bullmq';
import * as promClient from 'prom-client';
import { logger } from './logger';
import { getQueueMetrics } from './queues';

export const register = new promClient.Registry();

let defaultMetricsEnabled = false;

/**
 * Process metrics (CPU, memory, event loop). Enabled by long-running
 * services only; wrapped to avoid crashes on restricted environments.
 */
export function enableDefaultMetrics(): void {
  if (defaultMetricsEnabled) return;
  try {
    promClient.collectDefaultMetrics({ register });
    defaultMetricsEnabled = true;
  } catch (err) {
    logger.warn('Default Prometheus metrics collection skipped', {
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

// ============================================================================
// Queue Metrics
// ============================================================================

export const queueDepthGauge = new promClient.Gauge({
  name: 'aum_scraper_queue_depth',
  help: 'Current queue depth (waiting + active jobs)',
  labelNames: ['queue'],
  registers: [register],
});

export const queueMetricsGauge = new promClient.Gauge({
  name: 'aum_scraper_queue_jobs',
  help: 'Queue jobs by state',
  labelNames: ['queue', 'state'],
  registers: [register],
});

// ============================================================================
// Job Processing Metrics
// ============================================================================

export const jobDurationHistogram = new promClient.Histogram({
  name: 'aum_scraper_job_duration_seconds',
  help: 'Duration of job processing in seconds',
  labelNames: ['queue', 'status'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60, 120],
  registers: [register],
});

export const jobsProcessedCounter = new promClient.Counter({
  name: 'aum_scraper_jobs_processed_total',
  help: 'Total number of jobs processed',
  labelNames: ['queue', 'status'],
  registers: [register],
});

// ============================================================================
// Extraction Metrics
// ============================================================================

export const extractionsCounter = new promClient.Counter({
  name: 'aum_scraper_extractions_total',
  help: 'AUM extractions by resulting method',
  labelNames: ['method'],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'aum_scraper_extraction_duration_seconds',
  help: 'Duration of one AUM extraction across all chunks',
  labelNames: ['method'],
  buckets: [0.01, 0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [register],
});

export const sourcesProcessedCounter = new promClient.Counter({
  name: 'aum_scraper_sources_processed_total',
  help: 'Scraped sources handled by the extractor worker',
  labelNames: ['source_type', 'status'],
  registers: [register],
});

export const llmRequestsCounter = new promClient.Counter({
  name: 'aum_scraper_llm_requests_total',
  help: 'Total number of LLM requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'aum_scraper_llm_request_duration_seconds',
  help: 'Duration of LLM requests',
  labelNames: ['model'],
  buckets: [0.5, 1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

// ============================================================================
// Token Budget Metrics
// ============================================================================

export const budgetTokensUsedGauge = new promClient.Gauge({
  name: 'aum_scraper_budget_tokens_used',
  help: 'Tokens spent on the primary strategy today',
  registers: [register],
});

export const budgetUsagePercentageGauge = new promClient.Gauge({
  name: 'aum_scraper_budget_usage_percentage',
  help: 'Share of the daily token limit spent today (0-100)',
  registers: [register],
});

export const budgetAlertsCounter = new promClient.Counter({
  name: 'aum_scraper_budget_alerts_total',
  help: 'Commits that left usage at or above the alert threshold',
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'aum_scraper_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'aum_scraper_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

// ============================================================================
// Database Metrics
// ============================================================================

export const dbQueryDurationHistogram = new promClient.Histogram({
  name: 'aum_scraper_db_query_duration_seconds',
  help: 'Duration of database queries',
  labelNames: ['operation'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2],
  registers: [register],
});

/**
 * Report queue depths and state metrics to Prometheus gauges.
 * Call before getMetrics() so scrapes include current queue state.
 */
export async function reportQueueMetrics(
  queues: Array<{ name: string; queue: Queue }>
): Promise<void> {
  for (const { name, queue } of queues) {
    try {
      const m = await getQueueMetrics(queue);
      queueDepthGauge.set({ queue: name }, m.waiting + m.active);
      for (const [state, count] of Object.entries(m)) {
        queueMetricsGauge.set({ queue: name, state }, count);
      }
    } catch (err) {
      logger.warn('Queue metrics unavailable', {
        queue: name,
        error: err instanceof Error ? err.message : String(err),
      });
      queueDepthGauge.set({ queue: name }, -1);
    }
  }
}

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * Start a minimal HTTP server for /metrics (for worker processes).
 * Uses Node built-in http - no express required.
 */
export function serveMetrics(
  port: number,
  beforeScrape?: () => Promise<void>
): http.Server {
  enableDefaultMetrics();

  const server = http.createServer((req, res) => {
    if (req.url !== '/metrics' || req.method !== 'GET') {
      res.statusCode = 404;
      res.end();
      return;
    }

    (beforeScrape ? beforeScrape() : Promise.resolve())
      .then(() => getMetrics())
      .then((body) => {
        res.setHeader('Content-Type', getMetricsContentType());
        res.end(body);
      })
      .catch((err: unknown) => {
        logger.error('Metrics scrape failed', err);
        res.statusCode = 500;
        res.end();
      });
  });

  server.listen(port, () => {
    logger.info('Metrics server listening', { port });
  });

  return server;
}
