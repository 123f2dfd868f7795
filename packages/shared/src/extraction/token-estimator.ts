/**
 * Token estimation for pre-flight budgeting.
 *
 * Uses gpt-tokenizer (the cl100k/o200k family OpenAI models share); falls
 * back to 4 characters per token if encoding fails.
 */

import { encode } from 'gpt-tokenizer';
import { logger } from '../logger';
import type { TokenEstimator } from './types';

export function approximateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export const estimateTokens: TokenEstimator = (text: string): number => {
  try {
    return encode(text).length;
  } catch (error) {
    logger.warn('Token encoding failed, using character estimate', {
      error: error instanceof Error ? error.message : String(error),
      text_length: text.length,
    });
    return approximateTokens(text);
  }
};
