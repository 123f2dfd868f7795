/**
 * Regex Fallback Extraction
 *
 * Used when the primary strategy fails. Patterns are AUM-specific and
 * ordered most specific first; the first pattern that matches decides the
 * figure, so the order changes results when a chunk holds several figures.
 */

import { emptyResult, type AumExtractionResult } from '../types';
import { CURRENCY_SYMBOL_SOURCE, NUMBER_SOURCE, buildMonetaryValue } from './monetary-parser';

/** Fixed confidence for pattern matches, below a typical LLM hit. */
export const FALLBACK_CONFIDENCE = 0.7;

const SYMBOL = `(?:(?<symbol>${CURRENCY_SYMBOL_SOURCE})\\s*)?`;
const NUMBER = `(?<number>${NUMBER_SOURCE})`;
const LARGE_UNIT =
  '(?<unit>bilhões|bilhoes|bilhão|bilhao|bi|milhões|milhoes|milhão|milhao|mi)(?!\\p{L})';
const SPELLED_UNIT = '(?<unit>bilhões|bilhoes|milhões|milhoes)(?!\\p{L})';

export interface FallbackPattern {
  name: string;
  regex: RegExp;
}

export const FALLBACK_PATTERNS: FallbackPattern[] = [
  {
    // "290 milhões sob custódia", "R$ 1,2 bi em gestão"
    name: 'under_custody_or_management',
    regex: new RegExp(
      `${SYMBOL}${NUMBER}\\s*${LARGE_UNIT}(?:\\s+de\\s+reais)?\\s+(?:sob|em)\\s+(?:cust[óo]dia|gest[ãa]o)`,
      'iu'
    ),
  },
  {
    // "patrimônio sob gestão de R$ 3 bilhões"
    name: 'aum_phrase',
    regex: new RegExp(
      `patrim[ôo]nio\\s+(?:l[íi]quido\\s+)?sob\\s+gest[ãa]o\\s*(?:de|em|:)?\\s*${SYMBOL}${NUMBER}\\s*${LARGE_UNIT}`,
      'iu'
    ),
  },
  {
    // any "<n> bilhões" / "<n> milhões"
    name: 'generic_magnitude',
    regex: new RegExp(`${SYMBOL}${NUMBER}\\s*${SPELLED_UNIT}`, 'iu'),
  },
];

/**
 * Apply the fallback patterns to text.
 *
 * @returns a regex_fallback result, or the empty result when nothing
 *   matches (absence of signal, not an error)
 */
export function extractWithRegexFallback(text: string): AumExtractionResult {
  for (const pattern of FALLBACK_PATTERNS) {
    const match = pattern.regex.exec(text);
    if (!match?.groups) continue;

    const { symbol, number, unit } = match.groups;
    const parsed = buildMonetaryValue(symbol, number, unit);
    if (!parsed) continue;

    return {
      value: parsed.value,
      currency: parsed.currency,
      unit: parsed.unit,
      rawText: match[0].trim(),
      confidence: FALLBACK_CONFIDENCE,
      tokensUsed: 0,
      extractionMethod: 'regex_fallback',
    };
  }

  return emptyResult();
}
