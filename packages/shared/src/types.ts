/**
 * Shared TypeScript Types
 *
 * Types for the AUM extraction pipeline, matching the JSON schemas in docs/contracts/
 */

// ============================================================================
// Monetary Values
// ============================================================================

export const CURRENCY_CODES = ['BRL', 'USD', 'EUR'] as const;

export type CurrencyCode = (typeof CURRENCY_CODES)[number];

/** Currency assumed when a figure carries no symbol. */
export const DEFAULT_CURRENCY: CurrencyCode = 'BRL';

/**
 * Unit words recognised after a number, with the multiplier each applies.
 * Keys are lowercase; the parser reports the matched key as the unit.
 */
export const UNIT_MULTIPLIERS = {
  // Billions
  bilhões: 1e9,
  bilhoes: 1e9,
  bilhão: 1e9,
  bilhao: 1e9,
  billions: 1e9,
  billion: 1e9,
  bn: 1e9,
  bi: 1e9,
  b: 1e9,
  // Millions
  milhões: 1e6,
  milhoes: 1e6,
  milhão: 1e6,
  milhao: 1e6,
  millions: 1e6,
  million: 1e6,
  mm: 1e6,
  mn: 1e6,
  mi: 1e6,
  m: 1e6,
  // Thousands
  milhares: 1e3,
  thousand: 1e3,
  mil: 1e3,
  k: 1e3,
} as const;

export type UnitCode = keyof typeof UNIT_MULTIPLIERS;

export function isUnitCode(value: string): value is UnitCode {
  return Object.prototype.hasOwnProperty.call(UNIT_MULTIPLIERS, value);
}

export interface MonetaryValue {
  /** Magnitude with the unit multiplier already applied */
  value: number;
  currency: CurrencyCode;
  /** Unit token as matched (lowercased), absent when the figure had none */
  unit?: UnitCode;
}

// ============================================================================
// Extraction Results
// ============================================================================

export type ExtractionMethod = 'llm' | 'regex_fallback' | 'none' | 'error';

/** rawText value when no figure was found. */
export const NOT_AVAILABLE = 'NOT_AVAILABLE';

/** Prefix of rawText when an extraction attempt failed unexpectedly. */
export const ERROR_MARKER_PREFIX = 'ERROR: ';

export interface AumExtractionResult {
  value?: number;
  currency: CurrencyCode;
  unit?: UnitCode;
  /** Source text of the figure, NOT_AVAILABLE, or an error marker. Never empty. */
  rawText: string;
  /** 0.0 to 1.0 */
  confidence: number;
  tokensUsed: number;
  extractionMethod: ExtractionMethod;
}

export function emptyResult(tokensUsed = 0): AumExtractionResult {
  return {
    currency: DEFAULT_CURRENCY,
    rawText: NOT_AVAILABLE,
    confidence: 0,
    tokensUsed,
    extractionMethod: 'none',
  };
}

export function errorResult(message: string, tokensUsed = 0): AumExtractionResult {
  return {
    currency: DEFAULT_CURRENCY,
    rawText: `${ERROR_MARKER_PREFIX}${message || 'unknown error'}`,
    confidence: 0,
    tokensUsed,
    extractionMethod: 'error',
  };
}

// ============================================================================
// Chunks
// ============================================================================

export interface TextChunk {
  text: string;
  /** Count of distinct relevance keywords found in the source paragraph */
  score: number;
  /** Position of the source paragraph in the page text */
  paragraphIndex: number;
}

// ============================================================================
// Budget
// ============================================================================

export interface BudgetState {
  tokensUsedToday: number;
  callsToday: number;
  /** Local calendar date, YYYY-MM-DD */
  dayAnchor: string;
}

export interface DailyStats {
  tokensUsed: number;
  tokensLimit: number;
  /** 0 to 100 */
  usagePercentage: number;
  callsToday: number;
}

// ============================================================================
// Scraped Sources
// ============================================================================

export type SourceType = 'website' | 'linkedin' | 'instagram' | 'x';

export type ScrapeStatus = 'success' | 'failed';

/**
 * One fetched page, as handed over by the scraping layer.
 */
export interface ScrapedSource {
  url: string;
  sourceType: SourceType;
  status: ScrapeStatus;
  content: string | null;
  errorMessage?: string;
  isBlocked?: boolean;
}

export interface CompanyRef {
  id: number;
  name: string;
}
