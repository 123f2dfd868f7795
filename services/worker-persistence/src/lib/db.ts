/**
 * Database Operations
 *
 * Writes one extraction outcome: the scrape log, the AUM snapshot and, when
 * the primary strategy spent tokens, a usage row. All three go in a single
 * transaction.
 */

import { Pool } from 'pg';
import {
  logger,
  config,
  dbQueryDurationHistogram,
  NOT_AVAILABLE,
  type PersistAumJob,
} from '@aum-scraper/shared';

const pool = new Pool({
  connectionString: process.env.DATABASE_URL || config.databaseUrl,
  max: 20,
  idleTimeoutMillis: 30000,
});

export interface SqlResult {
  rows: Array<Record<string, unknown>>;
  rowCount: number | null;
}

/**
 * The part of a pg client the persistence layer uses.
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
}

export interface UsageLimits {
  tokensLimit: number;
  /** Fraction of tokensLimit that raises a warning */
  alertThreshold: number;
}

export interface UsageSummary {
  tokensUsedToday: number;
  usagePercentage: number;
  thresholdReached: boolean;
}

export interface PersistOutcome {
  scrapeLogId: number;
  snapshotId: number;
  /** Present when a usage row was written */
  usage?: UsageSummary;
}

const defaultLimits: UsageLimits = {
  tokensLimit: config.maxTokensPerDay,
  alertThreshold: config.budgetAlertThreshold,
};

function returnedId(result: SqlResult, table: string): number {
  const id = Number(result.rows[0]?.id);
  if (!Number.isInteger(id)) {
    throw new Error(`Insert into ${table} returned no id`);
  }
  return id;
}

async function insertScrapeLog(
  client: SqlClient,
  job: PersistAumJob
): Promise<number> {
  const { company, source, error_message, correlation_id } = job;
  const status = source.isBlocked ? 'blocked' : source.status;

  const result = await client.query(
    `INSERT INTO scrape_logs
       (company_id, source_url, source_type, status, content_length, error_message, is_blocked, correlation_id)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
     RETURNING id`,
    [
      company.id,
      source.url,
      source.sourceType,
      status,
      source.contentLength ?? null,
      error_message ?? null,
      source.isBlocked ?? false,
      correlation_id,
    ]
  );

  return returnedId(result, 'scrape_logs');
}

async function insertSnapshot(
  client: SqlClient,
  job: PersistAumJob,
  scrapeLogId: number
): Promise<number> {
  const { company, source, result } = job;

  const inserted = await client.query(
    `INSERT INTO aum_snapshots
       (company_id, scrape_log_id, aum_value, aum_currency, aum_unit, aum_text,
        source_url, source_type, confidence_score, extraction_method, tokens_used)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
     RETURNING id`,
    [
      company.id,
      scrapeLogId,
      result.value ?? null,
      result.currency,
      result.unit ?? null,
      result.rawText || NOT_AVAILABLE,
      source.url,
      source.sourceType,
      result.confidence,
      result.extractionMethod,
      result.tokensUsed,
    ]
  );

  return returnedId(inserted, 'aum_snapshots');
}

/**
 * Record tokens spent and check today's total against the alert threshold.
 */
async function recordUsage(
  client: SqlClient,
  job: PersistAumJob,
  limits: UsageLimits
): Promise<UsageSummary> {
  await client.query(
    `INSERT INTO usage (tokens_used, tokens_limit, company_id, operation_type)
     VALUES ($1, $2, $3, 'extraction')`,
    [job.result.tokensUsed, limits.tokensLimit, job.company.id]
  );

  const totals = await client.query(
    `SELECT COALESCE(SUM(tokens_used), 0) AS tokens_used
       FROM usage
      WHERE date >= date_trunc('day', now())`
  );

  // SUM over INTEGER comes back as a bigint string
  const tokensUsedToday = Number(totals.rows[0]?.tokens_used ?? 0);
  const usagePercentage =
    limits.tokensLimit > 0 ? (tokensUsedToday / limits.tokensLimit) * 100 : 0;
  const thresholdReached = usagePercentage >= limits.alertThreshold * 100;

  if (thresholdReached) {
    logger.warn('Daily token usage above alert threshold', {
      tokens_used_today: tokensUsedToday,
      tokens_limit: limits.tokensLimit,
      usage_percentage: Number(usagePercentage.toFixed(2)),
    });
  }

  return { tokensUsedToday, usagePercentage, thresholdReached };
}

/**
 * Persist one persist_aum job on the given client, inside a transaction.
 * The client is neither acquired nor released here.
 */
export async function persistAumSnapshot(
  client: SqlClient,
  job: PersistAumJob,
  limits: UsageLimits = defaultLimits
): Promise<PersistOutcome> {
  const startTime = Date.now();

  try {
    await client.query('BEGIN');

    const scrapeLogId = await insertScrapeLog(client, job);
    const snapshotId = await insertSnapshot(client, job, scrapeLogId);
    const usage =
      job.result.tokensUsed > 0 ? await recordUsage(client, job, limits) : undefined;

    await client.query('COMMIT');

    const duration = (Date.now() - startTime) / 1000;
    dbQueryDurationHistogram.observe({ operation: 'persist_aum' }, duration);

    logger.info('Persisted AUM snapshot', {
      scrape_log_id: scrapeLogId,
      snapshot_id: snapshotId,
      extraction_method: job.result.extractionMethod,
      tokens_used: job.result.tokensUsed,
      duration_seconds: duration,
    });

    return { scrapeLogId, snapshotId, usage };
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      logger.error('Rollback failed', rollbackError, { source_url: job.source.url });
    }
    logger.error('Failed to persist AUM snapshot', error, { source_url: job.source.url });
    throw error;
  }
}

/**
 * Persist a job on a pooled connection.
 */
export async function persistWithPool(job: PersistAumJob): Promise<PersistOutcome> {
  const poolClient = await pool.connect();
  const client: SqlClient = {
    query: (text, values) => poolClient.query(text, values),
  };

  try {
    return await persistAumSnapshot(client, job);
  } finally {
    poolClient.release();
  }
}

export { pool };
