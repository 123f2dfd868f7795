/**
 * Extraction Strategy Types
 *
 * The orchestrator drives a primary strategy (an LLM) and falls back to
 * pattern matching. Strategies report failure as a Result value.
 */

import type { Result } from '../result';

/**
 * Prompt pair for one primary extraction request.
 */
export interface AumPrompt {
  system: string;
  user: string;
}

/**
 * Successful reply from the primary strategy.
 */
export interface PrimaryExtractionResponse {
  /** Raw reply text, expected to be a figure or the sentinel */
  text: string;
  /** Tokens billed for the call (prompt + completion) */
  tokensUsed: number;
  model: string;
  requestId?: string;
  durationMs?: number;
}

/**
 * Failed primary call. tokensUsed is non-zero when the provider billed the
 * call before it failed (e.g. an unusable reply).
 */
export interface PrimaryExtractionFailure {
  error: Error;
  tokensUsed: number;
}

export type PrimaryExtractionOutcome = Result<PrimaryExtractionResponse, PrimaryExtractionFailure>;

export interface PrimaryExtractionStrategy {
  readonly name: string;

  /**
   * Ask for the AUM figure. Must resolve, never reject; must stop work when
   * the signal aborts.
   */
  extract(prompt: AumPrompt, signal?: AbortSignal): Promise<PrimaryExtractionOutcome>;
}

/**
 * Approximate token count. Needs to grow with text length, not be exact.
 */
export type TokenEstimator = (text: string) => number;
