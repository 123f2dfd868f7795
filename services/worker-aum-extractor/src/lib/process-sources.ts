/**
 * Per-company source processing.
 *
 * Runs the extractor over each scraped source of a company in turn and
 * hands one persist_aum payload per source to the persistence queue.
 * Sources that failed to scrape are still recorded, with an empty result.
 */

import {
  logger,
  runWithChildContextAsync,
  validateAumResult,
  sourcesProcessedCounter,
  emptyResult,
  errorResult,
  ERROR_MARKER_PREFIX,
  type AumExtractionResult,
  type AumExtractor,
  type ExtractAumJob,
  type ExtractAumJobResult,
  type PersistAumJob,
  type ScrapedSource,
} from '@aum-scraper/shared';

/**
 * Where persist_aum payloads go; a BullMQ queue in production.
 */
export interface PersistEnqueuer {
  add(name: string, data: PersistAumJob, opts?: { jobId?: string }): Promise<unknown>;
}

type SourceExtractor = Pick<AumExtractor, 'extractAum' | 'chunkCount'>;

interface SourceOutcome {
  result: AumExtractionResult;
  chunksCount: number;
  skipped: boolean;
  errorMessage?: string;
}

function skipReason(source: ScrapedSource): string | null {
  if (source.isBlocked) return source.errorMessage || 'Source blocked';
  if (source.status !== 'success') return source.errorMessage || 'Scrape failed';
  if (!source.content || !source.content.trim()) return 'Empty content';
  return null;
}

async function extractSource(
  extractor: SourceExtractor,
  companyName: string,
  source: ScrapedSource
): Promise<SourceOutcome> {
  const reason = skipReason(source);
  if (reason || !source.content) {
    logger.info('Source skipped', { url: source.url, reason });
    return { result: emptyResult(), chunksCount: 0, skipped: true, errorMessage: reason ?? undefined };
  }

  const chunksCount = extractor.chunkCount(source.content);
  const extracted = await extractor.extractAum(companyName, source.content);

  const validation = validateAumResult(extracted);
  const result = validation.valid
    ? extracted
    : errorResult(`invalid extraction result: ${(validation.errors ?? []).join('; ')}`, extracted.tokensUsed);

  const errorMessage =
    result.extractionMethod === 'error'
      ? result.rawText.slice(ERROR_MARKER_PREFIX.length)
      : undefined;

  return { result, chunksCount, skipped: false, errorMessage };
}

/**
 * Extract every source of one company, sequentially, and enqueue the
 * outcomes for persistence.
 */
export async function processCompanySources(
  data: ExtractAumJob,
  extractor: SourceExtractor,
  persistQueue: PersistEnqueuer
): Promise<ExtractAumJobResult> {
  const { correlation_id, company, sources } = data;
  let persisted = 0;

  for (const [index, source] of sources.entries()) {
    await runWithChildContextAsync({ sourceType: source.sourceType }, async () => {
      const { result, chunksCount, skipped, errorMessage } = await extractSource(
        extractor,
        company.name,
        source
      );

      const payload: PersistAumJob = {
        correlation_id,
        company,
        source: {
          url: source.url,
          sourceType: source.sourceType,
          status: source.status,
          contentLength: source.content?.length ?? 0,
          isBlocked: source.isBlocked ?? false,
        },
        result,
        chunks_count: chunksCount,
        ...(errorMessage ? { error_message: errorMessage } : {}),
      };

      await persistQueue.add('persist_aum', payload, {
        jobId: `persist_${correlation_id}_${index}`,
      });
      persisted += 1;

      sourcesProcessedCounter.inc({
        source_type: source.sourceType,
        status: skipped ? 'skipped' : result.extractionMethod,
      });

      logger.info('Enqueued persist_aum', {
        url: source.url,
        extraction_method: result.extractionMethod,
        value: result.value,
        confidence: result.confidence,
        chunks_count: chunksCount,
      });
    });
  }

  return { sources: sources.length, persisted };
}
