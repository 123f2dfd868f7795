/**
 * Usage API
 *
 * Small Express app hosted by the extractor worker: health, today's token
 * usage from the in-process budget, and Prometheus metrics.
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  runWithContext,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  toDayAnchor,
  type DailyStats,
} from '@aum-scraper/shared';

/**
 * What the API reads usage from; satisfied by AumExtractor.
 */
export interface UsageSource {
  dailyStats(): DailyStats;
  isBudgetExceeded(): boolean;
  readonly budget: { readonly alertThreshold: number };
}

export interface UsageAppOptions {
  /** Runs before each /metrics scrape, e.g. to refresh queue gauges */
  beforeMetrics?: () => Promise<void>;
  now?: () => Date;
}

export interface UsageTodayResponse {
  date: string;
  tokens_used: number;
  tokens_limit: number;
  usage_percentage: number;
  api_calls: number;
  budget_exceeded: boolean;
  budget_warning: boolean;
}

export function createUsageApp(source: UsageSource, options: UsageAppOptions = {}): express.Express {
  const app = express();
  const now = options.now ?? (() => new Date());

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = req.header('x-correlation-id') || ulid();
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
      const labels = { method: req.method, path: req.path, status: res.statusCode.toString() };

      httpRequestDurationHistogram.observe(labels, duration);
      httpRequestsCounter.inc(labels);

      logger.debug('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: 'worker-aum-extractor',
      timestamp: now().toISOString(),
    });
  });

  /**
   * GET /usage/today
   * Token usage of the primary strategy for the current day
   */
  app.get('/usage/today', (_req: Request, res: Response) => {
    const stats = source.dailyStats();

    const body: UsageTodayResponse = {
      date: toDayAnchor(now()),
      tokens_used: stats.tokensUsed,
      tokens_limit: stats.tokensLimit,
      usage_percentage: Number(stats.usagePercentage.toFixed(2)),
      api_calls: stats.callsToday,
      budget_exceeded: source.isBudgetExceeded(),
      budget_warning: stats.usagePercentage >= source.budget.alertThreshold * 100,
    };

    res.json(body);
  });

  app.get('/metrics', (_req: Request, res: Response, next: NextFunction) => {
    (options.beforeMetrics ? options.beforeMetrics() : Promise.resolve())
      .then(() => getMetrics())
      .then((metrics) => {
        res.setHeader('Content-Type', getMetricsContentType());
        res.send(metrics);
      })
      .catch(next);
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled request error', err);
    res.status(500).json({ error: { code: 'internal_error', message: 'Internal error' } });
  });

  return app;
}
