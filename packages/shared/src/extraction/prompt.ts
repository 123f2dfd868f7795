/**
 * Prompt construction and token-bounded truncation.
 */

import { AUM_TEMPLATE } from '../templates';
import type { ExtractionTemplate } from '../templates';
import { NOT_AVAILABLE } from '../types';
import type { AumPrompt, TokenEstimator } from './types';

/** Tokens kept back for the instructions around the chunk text. */
export const PROMPT_OVERHEAD_TOKENS = 200;

export function buildAumPrompt(
  companyName: string,
  chunkText: string,
  template: ExtractionTemplate = AUM_TEMPLATE
): AumPrompt {
  // Function replacers: page text may contain "$&" and similar sequences.
  const user = template.userPromptTemplate
    .replace('{{company_name}}', () => companyName)
    .replace('{{not_available}}', () => NOT_AVAILABLE)
    .replace('{{chunk_text}}', () => chunkText);

  return { system: template.systemPrompt, user };
}

export function promptTokens(prompt: AumPrompt, estimate: TokenEstimator): number {
  return estimate(`${prompt.system}\n${prompt.user}`);
}

/**
 * Longest word prefix of text that fits in maxTokens. Relies on the
 * estimator growing with text length.
 */
export function truncateToTokens(text: string, maxTokens: number, estimate: TokenEstimator): string {
  if (maxTokens <= 0) return '';
  if (estimate(text) <= maxTokens) return text;

  const words = text.split(/\s+/).filter(Boolean);
  let low = 0;
  let high = words.length;

  while (low < high) {
    const mid = Math.ceil((low + high) / 2);
    if (estimate(words.slice(0, mid).join(' ')) <= maxTokens) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }

  return words.slice(0, low).join(' ');
}
