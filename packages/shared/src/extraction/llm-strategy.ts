/**
 * OpenAI Primary Extraction Strategy
 *
 * Sends the AUM prompt to a chat completion model and returns the bare
 * reply. Transport, provider and empty-reply failures come back as Err.
 */

import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from 'openai/resources/chat/completions';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { config } from '../config';
import { ConfigurationError } from '../errors';
import { logger } from '../logger';
import { llmRequestDurationHistogram, llmRequestsCounter } from '../metrics';
import { Err, Ok, toError } from '../result';
import type {
  AumPrompt,
  PrimaryExtractionOutcome,
  PrimaryExtractionStrategy,
} from './types';

/**
 * The part of the OpenAI client this strategy calls.
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal; timeout?: number }
      ): Promise<ChatCompletion>;
    };
  };
}

export interface OpenAiStrategyOptions {
  /** OpenAI API key (required unless a client is injected) */
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  temperature?: number;
  maxCompletionTokens?: number;
  /** Pre-built client, used by tests */
  client?: ChatCompletionClient;
}

/**
 * Debug: write prompts to disk when DEBUG_LLM_PROMPTS is set
 */
function debugWritePrompt(prompt: AumPrompt): void {
  if (!process.env.DEBUG_LLM_PROMPTS) return;

  const debugDir = process.env.DEBUG_LLM_PROMPTS_DIR || '/tmp/llm-debug';

  try {
    fs.mkdirSync(debugDir, { recursive: true });
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const file = path.join(debugDir, `${timestamp}_aum_prompt.txt`);
    fs.writeFileSync(file, `${prompt.system}\n${'='.repeat(80)}\n${prompt.user}`);
    logger.debug('Debug: wrote LLM prompt to disk', { file });
  } catch (err) {
    logger.warn('Debug: failed to write LLM prompt', { error: String(err) });
  }
}

export class OpenAiAumStrategy implements PrimaryExtractionStrategy {
  readonly name = 'openai';

  private readonly client: ChatCompletionClient;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly temperature: number;
  private readonly maxCompletionTokens: number;

  /**
   * @throws ConfigurationError when no API key is available and no client is injected
   */
  constructor(options: OpenAiStrategyOptions = {}) {
    this.model = options.model || config.llmModel;
    this.timeoutMs = options.timeoutMs || config.llmRequestTimeoutMs;
    this.temperature = options.temperature ?? config.llmTemperature;
    this.maxCompletionTokens = options.maxCompletionTokens || config.llmMaxCompletionTokens;

    if (options.client) {
      this.client = options.client;
      return;
    }

    const apiKey = options.apiKey ?? config.openaiApiKey;
    if (!apiKey) {
      throw new ConfigurationError(['OPENAI_API_KEY is required for the OpenAI strategy']);
    }

    this.client = new OpenAI({
      apiKey,
      timeout: this.timeoutMs,
      maxRetries: 0, // Retries happen at job level
    });
  }

  async extract(prompt: AumPrompt, signal?: AbortSignal): Promise<PrimaryExtractionOutcome> {
    debugWritePrompt(prompt);
    const startTime = Date.now();

    let response: ChatCompletion;
    try {
      response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: prompt.system },
            { role: 'user', content: prompt.user },
          ],
          max_tokens: this.maxCompletionTokens,
          temperature: this.temperature,
        },
        { signal, timeout: this.timeoutMs }
      );
    } catch (error) {
      this.recordRequest('error', startTime);
      logger.error('LLM request failed', error, {
        model: this.model,
        duration_ms: Date.now() - startTime,
      });
      return Err({ error: toError(error), tokensUsed: 0 });
    }

    const durationMs = Date.now() - startTime;
    const tokensUsed = response.usage?.total_tokens ?? 0;
    const content = response.choices[0]?.message?.content?.trim();

    if (!content) {
      this.recordRequest('empty', startTime);
      logger.warn('Empty response from OpenAI', {
        model: this.model,
        request_id: response.id,
        tokens_used: tokensUsed,
      });
      return Err({ error: new Error('Empty response from OpenAI'), tokensUsed });
    }

    this.recordRequest('success', startTime);
    logger.info('LLM extraction complete', {
      model: this.model,
      request_id: response.id,
      duration_ms: durationMs,
      tokens_used: tokensUsed,
      prompt_tokens: response.usage?.prompt_tokens,
      completion_tokens: response.usage?.completion_tokens,
      reply: content,
    });

    return Ok({
      text: content,
      tokensUsed,
      model: response.model || this.model,
      requestId: response.id,
      durationMs,
    });
  }

  private recordRequest(status: 'success' | 'error' | 'empty', startTime: number): void {
    llmRequestsCounter.inc({ model: this.model, status });
    llmRequestDurationHistogram.observe({ model: this.model }, (Date.now() - startTime) / 1000);
  }
}
