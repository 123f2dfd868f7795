/**
 * AUM Extraction Orchestrator
 *
 * Runs the two-tier extraction for one company page:
 *
 *   chunks -> primary strategy (LLM) -> parse -> score
 *                  | failure / budget refusal
 *                  v
 *             regex fallback
 *
 * Chunks are tried in relevance order; the best-scoring result wins and a
 * confident result stops the loop early. Every primary attempt that reached
 * the provider is committed to the daily budget.
 */

import { config, assertValidConfig } from '../config';
import type { Config } from '../config';
import { PrimaryExtractionTimeoutError } from '../errors';
import { logger } from '../logger';
import {
  budgetAlertsCounter,
  budgetTokensUsedGauge,
  budgetUsagePercentageGauge,
  extractionDurationHistogram,
  extractionsCounter,
} from '../metrics';
import { Err, toError, tryCatchAsync } from '../result';
import { AUM_TEMPLATE } from '../templates';
import type { ExtractionTemplate } from '../templates';
import { emptyResult, errorResult } from '../types';
import type { AumExtractionResult, DailyStats, TextChunk } from '../types';
import { BudgetTracker } from './budget-tracker';
import { DEFAULT_MAX_CHARS_PER_CHUNK, DEFAULT_MAX_CHUNKS, selectChunks } from './chunk-selector';
import { scoreConfidence } from './confidence';
import { OpenAiAumStrategy } from './llm-strategy';
import { parseMonetaryValue } from './monetary-parser';
import { PROMPT_OVERHEAD_TOKENS, buildAumPrompt, promptTokens, truncateToTokens } from './prompt';
import { extractWithRegexFallback } from './regex-fallback';
import { estimateTokens as defaultEstimateTokens } from './token-estimator';
import type {
  AumPrompt,
  PrimaryExtractionOutcome,
  PrimaryExtractionStrategy,
  TokenEstimator,
} from './types';

export const DEFAULT_MAX_TOKENS_PER_REQUEST = 1500;
export const DEFAULT_PRIMARY_TIMEOUT_MS = 30_000;
export const DEFAULT_EARLY_EXIT_CONFIDENCE = 0.8;

export interface AumExtractorOptions {
  strategy: PrimaryExtractionStrategy;
  budget: BudgetTracker;
  estimateTokens?: TokenEstimator;
  template?: ExtractionTemplate;
  maxChunks?: number;
  maxCharsPerChunk?: number;
  maxTokensPerRequest?: number;
  timeoutMs?: number;
  /** Stop trying further chunks once a result reaches this confidence */
  earlyExitConfidence?: number;
}

interface ChunkAttempt {
  result: AumExtractionResult;
  /** Tokens committed for this chunk */
  tokensUsed: number;
}

export class AumExtractor {
  readonly strategy: PrimaryExtractionStrategy;
  readonly budget: BudgetTracker;

  private readonly estimateTokens: TokenEstimator;
  private readonly template: ExtractionTemplate;
  private readonly maxChunks: number;
  private readonly maxCharsPerChunk: number;
  private readonly maxTokensPerRequest: number;
  private readonly timeoutMs: number;
  private readonly earlyExitConfidence: number;

  constructor(options: AumExtractorOptions) {
    this.strategy = options.strategy;
    this.budget = options.budget;
    this.estimateTokens = options.estimateTokens ?? defaultEstimateTokens;
    this.template = options.template ?? AUM_TEMPLATE;
    this.maxChunks = options.maxChunks ?? DEFAULT_MAX_CHUNKS;
    this.maxCharsPerChunk = options.maxCharsPerChunk ?? DEFAULT_MAX_CHARS_PER_CHUNK;
    this.maxTokensPerRequest = options.maxTokensPerRequest ?? DEFAULT_MAX_TOKENS_PER_REQUEST;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PRIMARY_TIMEOUT_MS;
    this.earlyExitConfidence = options.earlyExitConfidence ?? DEFAULT_EARLY_EXIT_CONFIDENCE;
  }

  /**
   * Extract the AUM figure announced by a company from raw page text.
   * Resolves with a result in every case; faults become an `error` result.
   */
  async extractAum(companyName: string, rawContent: string): Promise<AumExtractionResult> {
    const startTime = Date.now();
    let tokensUsed = 0;

    try {
      const chunks = selectChunks(rawContent, this.maxChunks, this.maxCharsPerChunk);

      if (chunks.length === 0) {
        logger.info('No relevant chunks found', { content_length: rawContent?.length ?? 0 });
        return this.finish(emptyResult(), startTime);
      }

      logger.debug('Chunks selected', {
        chunks: chunks.length,
        scores: chunks.map((c) => c.score),
      });

      let best: AumExtractionResult | null = null;

      for (const [index, chunk] of chunks.entries()) {
        const attempt = await this.extractFromChunk(companyName, chunk);
        tokensUsed += attempt.tokensUsed;

        if (attempt.result.value !== undefined && (!best || attempt.result.confidence > best.confidence)) {
          best = attempt.result;
        }

        if (best && best.confidence >= this.earlyExitConfidence) {
          logger.debug('Confident result, skipping remaining chunks', {
            chunk_index: index,
            confidence: best.confidence,
            skipped_chunks: chunks.length - index - 1,
          });
          break;
        }
      }

      const final = best ? { ...best, tokensUsed } : emptyResult(tokensUsed);
      return this.finish(final, startTime);
    } catch (error) {
      const err = toError(error);
      logger.error('AUM extraction failed unexpectedly', err, { company: companyName });
      return this.finish(errorResult(err.message, tokensUsed), startTime);
    }
  }

  /** Number of chunks extractAum would consider for this text. */
  chunkCount(rawContent: string): number {
    return selectChunks(rawContent, this.maxChunks, this.maxCharsPerChunk).length;
  }

  dailyStats(): DailyStats {
    return this.budget.dailyStats();
  }

  isBudgetExceeded(): boolean {
    return this.budget.isBudgetExceeded();
  }

  private async extractFromChunk(companyName: string, chunk: TextChunk): Promise<ChunkAttempt> {
    const prompt = this.boundedPrompt(companyName, chunk.text);
    const estimated = promptTokens(prompt, this.estimateTokens);

    if (!this.budget.checkAndReserve(estimated)) {
      const fallback = extractWithRegexFallback(chunk.text);
      logger.info('Primary extraction skipped by token budget', {
        estimated_tokens: estimated,
        paragraph_index: chunk.paragraphIndex,
        fallback_method: fallback.extractionMethod,
      });
      return { result: fallback, tokensUsed: 0 };
    }

    let committed = false;
    try {
      const outcome = await this.callPrimary(prompt);
      committed = true;
      return this.settleAttempt(outcome, estimated, chunk);
    } finally {
      // The reservation must not outlive the attempt
      if (!committed) this.budget.release(estimated);
    }
  }

  private settleAttempt(
    outcome: PrimaryExtractionOutcome,
    estimated: number,
    chunk: TextChunk
  ): ChunkAttempt {
    if (outcome.ok) {
      const tokens = outcome.value.tokensUsed;
      this.commit(tokens, estimated);

      const parsed = parseMonetaryValue(outcome.value.text);
      if (!parsed) {
        logger.debug('Primary reply carried no figure', {
          reply: outcome.value.text,
          paragraph_index: chunk.paragraphIndex,
        });
        return { result: emptyResult(tokens), tokensUsed: tokens };
      }

      return {
        result: {
          value: parsed.value,
          currency: parsed.currency,
          unit: parsed.unit,
          rawText: outcome.value.text,
          confidence: scoreConfidence(outcome.value.text, parsed.value, chunk.text),
          tokensUsed: tokens,
          extractionMethod: 'llm',
        },
        tokensUsed: tokens,
      };
    }

    const tokens = outcome.error.tokensUsed;
    this.commit(tokens, estimated);

    logger.warn('Primary extraction failed, using regex fallback', {
      strategy: this.strategy.name,
      error: outcome.error.error.message,
      paragraph_index: chunk.paragraphIndex,
    });

    return {
      result: { ...extractWithRegexFallback(chunk.text), tokensUsed: tokens },
      tokensUsed: tokens,
    };
  }

  /**
   * Build the prompt, truncating the chunk when the whole prompt would go
   * over the per-request limit.
   */
  private boundedPrompt(companyName: string, chunkText: string): AumPrompt {
    const prompt = buildAumPrompt(companyName, chunkText, this.template);
    const tokens = promptTokens(prompt, this.estimateTokens);
    if (tokens <= this.maxTokensPerRequest) return prompt;

    const truncated = truncateToTokens(
      chunkText,
      this.maxTokensPerRequest - PROMPT_OVERHEAD_TOKENS,
      this.estimateTokens
    );

    logger.debug('Chunk truncated to fit request limit', {
      prompt_tokens: tokens,
      max_tokens_per_request: this.maxTokensPerRequest,
      original_chars: chunkText.length,
      truncated_chars: truncated.length,
    });

    return buildAumPrompt(companyName, truncated, this.template);
  }

  /**
   * Call the primary strategy, aborting it after timeoutMs. A rejection is
   * turned into a failure so the fallback still runs.
   */
  private async callPrimary(prompt: AumPrompt): Promise<PrimaryExtractionOutcome> {
    const controller = new AbortController();

    // A strategy that throws, synchronously or not, counts as a failed call
    const call = tryCatchAsync(() => this.strategy.extract(prompt, controller.signal)).then(
      (settled): PrimaryExtractionOutcome =>
        settled.ok ? settled.value : Err({ error: settled.error, tokensUsed: 0 })
    );

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<PrimaryExtractionOutcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve(Err({ error: new PrimaryExtractionTimeoutError(this.timeoutMs), tokensUsed: 0 }));
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([call, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private commit(actualTokens: number, reservedTokens: number): void {
    const { thresholdReached, stats } = this.budget.commit(actualTokens, reservedTokens);

    budgetTokensUsedGauge.set(stats.tokensUsed);
    budgetUsagePercentageGauge.set(stats.usagePercentage);
    if (thresholdReached) budgetAlertsCounter.inc();
  }

  private finish(result: AumExtractionResult, startTime: number): AumExtractionResult {
    extractionsCounter.inc({ method: result.extractionMethod });
    extractionDurationHistogram.observe(
      { method: result.extractionMethod },
      (Date.now() - startTime) / 1000
    );

    logger.info('AUM extraction complete', {
      template: this.template.name,
      template_version: this.template.version,
      method: result.extractionMethod,
      value: result.value,
      currency: result.currency,
      unit: result.unit,
      confidence: result.confidence,
      tokens_used: result.tokensUsed,
    });

    return result;
  }
}

/**
 * Build an extractor from the process configuration, with the OpenAI
 * strategy and a fresh budget tracker.
 *
 * @throws ConfigurationError when the configuration is invalid
 */
export function createAumExtractor(cfg: Config = config): AumExtractor {
  assertValidConfig(cfg);

  return new AumExtractor({
    strategy: new OpenAiAumStrategy({
      apiKey: cfg.openaiApiKey,
      model: cfg.llmModel,
      timeoutMs: cfg.llmRequestTimeoutMs,
      temperature: cfg.llmTemperature,
      maxCompletionTokens: cfg.llmMaxCompletionTokens,
    }),
    budget: new BudgetTracker({
      dailyLimit: cfg.maxTokensPerDay,
      alertThreshold: cfg.budgetAlertThreshold,
    }),
    maxChunks: cfg.maxChunks,
    maxCharsPerChunk: cfg.maxCharsPerChunk,
    maxTokensPerRequest: cfg.maxTokensPerRequest,
    timeoutMs: cfg.llmRequestTimeoutMs,
    earlyExitConfidence: cfg.earlyExitConfidence,
  });
}
