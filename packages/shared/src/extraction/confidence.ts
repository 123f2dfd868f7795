/**
 * Confidence Scoring
 *
 * Heuristic 0..1 rating of how likely an extracted figure is a real,
 * stated AUM. Evidence of a stated figure raises the score; wording that
 * marks a projection lowers it.
 */

import { CURRENCY_SYMBOL_SOURCE, NUMBER_SOURCE, UNIT_SOURCE } from './monetary-parser';

export const BASE_CONFIDENCE = 0.5;
export const FORMATTED_FIGURE_BONUS = 0.3;
export const NUMBER_WITH_UNIT_BONUS = 0.2;
export const POSITIVE_VALUE_BONUS = 0.2;
export const DOMAIN_KEYWORD_BONUS = 0.05;
export const HEDGING_KEYWORD_PENALTY = 0.15;

const FORMATTED_FIGURE = new RegExp(
  `(?:${CURRENCY_SYMBOL_SOURCE})\\s*${NUMBER_SOURCE}\\s*${UNIT_SOURCE}`,
  'iu'
);

const NUMBER_WITH_UNIT = new RegExp(`${NUMBER_SOURCE}\\s*${UNIT_SOURCE}`, 'iu');

const DOMAIN_KEYWORDS: RegExp[] = [
  /patrim[oô]nio\s+sob\s+gest[aã]o/iu,
  /(?<!\p{L})aum(?!\p{L})/iu,
  /assets\s+under\s+management/iu,
  /(?<!\p{L})fundos?(?!\p{L})/iu,
  /(?<!\p{L})gest[aã]o(?!\p{L})/iu,
  /(?<!\p{L})investimentos?(?!\p{L})/iu,
];

const HEDGING_KEYWORDS: RegExp[] = [
  /(?<!\p{L})estimativas?(?!\p{L})/iu,
  /(?<!\p{L})proje[çc](?:[aã]o|[oõ]es)(?!\p{L})/iu,
  /(?<!\p{L})metas?(?!\p{L})/iu,
  /(?<!\p{L})esperad[oa]s?(?!\p{L})/iu,
];

function countMatches(patterns: RegExp[], text: string): number {
  return patterns.filter((pattern) => pattern.test(text)).length;
}

/**
 * Score an extracted figure.
 *
 * @param rawText - text the figure came from (an LLM reply or a regex match)
 * @param value - the normalized figure; absent means nothing was found
 * @param context - surrounding page text, searched for keywords only
 */
export function scoreConfidence(
  rawText: string,
  value: number | undefined | null,
  context = ''
): number {
  if (value === undefined || value === null) return 0;

  let score = BASE_CONFIDENCE;

  if (FORMATTED_FIGURE.test(rawText)) {
    score += FORMATTED_FIGURE_BONUS;
  } else if (NUMBER_WITH_UNIT.test(rawText)) {
    score += NUMBER_WITH_UNIT_BONUS;
  }

  if (Number.isFinite(value) && value > 0) {
    score += POSITIVE_VALUE_BONUS;
  }

  const evidence = context ? `${rawText}\n${context}` : rawText;
  score += countMatches(DOMAIN_KEYWORDS, evidence) * DOMAIN_KEYWORD_BONUS;
  score -= countMatches(HEDGING_KEYWORDS, evidence) * HEDGING_KEYWORD_PENALTY;

  return Math.min(1, Math.max(0, score));
}
