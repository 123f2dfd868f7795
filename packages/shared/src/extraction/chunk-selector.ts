/**
 * Chunk Selection
 *
 * Picks the paragraphs of a scraped page most likely to mention AUM and
 * bounds each one so it fits a single extraction request.
 */

import type { TextChunk } from '../types';

/** Paragraphs shorter than this are treated as navigation noise. */
export const MIN_PARAGRAPH_LENGTH = 50;

export const DEFAULT_MAX_CHUNKS = 5;

/** ~1500 tokens at 4 characters per token */
export const DEFAULT_MAX_CHARS_PER_CHUNK = 6000;

/** Phrases matched anywhere in the paragraph. */
const SUBSTRING_KEYWORDS = [
  'patrimônio sob gestão',
  'assets under management',
  'patrimônio',
  'gestão',
  'fundo',
  'investimento',
  'bilhões',
  'milhões',
  'milhares',
  'reais',
  'dólares',
  'euros',
  'r$',
  'us$',
  '€',
];

/** Short tokens that only count as whole words ("bi" is not "bitcoin"). */
const WORD_KEYWORDS: RegExp[] = ['aum', 'bi', 'mi', 'mil'].map(
  (word) => new RegExp(`(?<!\\p{L})${word}(?!\\p{L})`, 'iu')
);

/**
 * Number of distinct relevance keywords in a paragraph.
 */
export function scoreRelevance(paragraph: string): number {
  const lowered = paragraph.toLowerCase();
  const phraseHits = SUBSTRING_KEYWORDS.filter((keyword) => lowered.includes(keyword)).length;
  const wordHits = WORD_KEYWORDS.filter((pattern) => pattern.test(paragraph)).length;
  return phraseHits + wordHits;
}

/**
 * Split text into pieces of at most maxChars, breaking only on whitespace.
 * A single word longer than maxChars becomes a piece of its own.
 */
export function splitOnWords(text: string, maxChars: number): string[] {
  const pieces: string[] = [];
  let current = '';

  for (const word of text.split(/\s+/).filter(Boolean)) {
    const candidate = current ? `${current} ${word}` : word;
    if (candidate.length <= maxChars) {
      current = candidate;
      continue;
    }
    if (current) pieces.push(current);
    current = word;
  }

  if (current) pieces.push(current);
  return pieces;
}

/**
 * Rank the paragraphs of a page by relevance and return at most maxChunks
 * bounded chunks, most relevant first. Equal scores keep page order.
 */
export function selectChunks(
  fullText: string,
  maxChunks: number = DEFAULT_MAX_CHUNKS,
  maxCharsPerChunk: number = DEFAULT_MAX_CHARS_PER_CHUNK
): TextChunk[] {
  if (!fullText || maxChunks < 1) return [];

  const ranked = fullText
    .split(/\n\s*\n/)
    .map((paragraph, paragraphIndex) => ({ text: paragraph.trim(), paragraphIndex }))
    .filter((p) => p.text.length >= MIN_PARAGRAPH_LENGTH)
    .map((p) => ({ ...p, score: scoreRelevance(p.text) }))
    .filter((p) => p.score > 0)
    .sort((a, b) => b.score - a.score);

  const chunks: TextChunk[] = [];

  for (const paragraph of ranked.slice(0, maxChunks)) {
    const pieces =
      paragraph.text.length <= maxCharsPerChunk
        ? [paragraph.text]
        : splitOnWords(paragraph.text, maxCharsPerChunk);

    for (const text of pieces) {
      chunks.push({ text, score: paragraph.score, paragraphIndex: paragraph.paragraphIndex });
    }
  }

  return chunks.slice(0, maxChunks);
}
