/**
 * Monetary Value Parser
 *
 * Turns free-text figures such as "R$ 2,3 bi", "US$ 1.5M" or
 * "290 milhões" into a normalized value, currency code and unit.
 * Patterns are tried from most to least specific; the first match wins.
 */

import {
  DEFAULT_CURRENCY,
  UNIT_MULTIPLIERS,
  isUnitCode,
  type CurrencyCode,
  type MonetaryValue,
  type UnitCode,
} from '../types';

/**
 * Replies meaning "no figure". Compared after trimming, lowercasing and
 * dropping trailing punctuation.
 */
const SENTINELS = new Set([
  'not_available',
  'not available',
  'nao_disponivel',
  'não_disponível',
  'nao disponivel',
  'não disponível',
  'indisponível',
  'indisponivel',
  'n/a',
  'n/d',
  'none',
]);

const CURRENCY_BY_SYMBOL: Record<string, CurrencyCode> = {
  'r$': 'BRL',
  'us$': 'USD',
  $: 'USD',
  '€': 'EUR',
};

/** Currency symbol alternation, longest first so "US$" beats "$". */
export const CURRENCY_SYMBOL_SOURCE = 'US\\$|R\\$|\\$|€';

/** Digits with optional "," or "." separators. */
export const NUMBER_SOURCE = '\\d+(?:[.,]\\d+)*';

/** Unit words, longest first; must not run into another letter. */
export const UNIT_SOURCE = `(?:${Object.keys(UNIT_MULTIPLIERS)
  .sort((a, b) => b.length - a.length)
  .join('|')})(?!\\p{L})`;

const MONETARY_PATTERNS: RegExp[] = [
  // R$ 2,3 bi
  new RegExp(
    `(?<symbol>${CURRENCY_SYMBOL_SOURCE})\\s*(?<number>${NUMBER_SOURCE})\\s*(?<unit>${UNIT_SOURCE})`,
    'iu'
  ),
  // R$ 2.300.000,00
  new RegExp(`(?<symbol>${CURRENCY_SYMBOL_SOURCE})\\s*(?<number>${NUMBER_SOURCE})`, 'iu'),
  // 2,3 bilhões
  new RegExp(`(?<number>${NUMBER_SOURCE})\\s*(?<unit>${UNIT_SOURCE})`, 'iu'),
];

/**
 * True for empty text and for the "not available" replies.
 */
export function isSentinel(text: string): boolean {
  const normalized = text.trim().replace(/[.!]+$/, '').toLowerCase();
  return normalized === '' || SENTINELS.has(normalized);
}

/**
 * Convert "2,3", "1.5", "1.500.000" or "2.300.000,00" to a number.
 *
 * With both separators present, the last one is the decimal mark. A single
 * separator is the decimal mark unless it repeats, in which case it groups
 * thousands. Returns null when the result is not a finite number.
 */
export function normalizeNumber(raw: string): number | null {
  const lastDot = raw.lastIndexOf('.');
  const lastComma = raw.lastIndexOf(',');
  let normalized: string;

  if (lastDot >= 0 && lastComma >= 0) {
    const decimalMark = lastDot > lastComma ? '.' : ',';
    const groupMark = decimalMark === '.' ? ',' : '.';
    normalized = raw.split(groupMark).join('').replace(decimalMark, '.');
  } else {
    const separator = lastDot >= 0 ? '.' : lastComma >= 0 ? ',' : null;
    if (separator === null) {
      normalized = raw;
    } else if (raw.split(separator).length > 2) {
      normalized = raw.split(separator).join('');
    } else {
      normalized = raw.replace(separator, '.');
    }
  }

  if (!/^\d+(?:\.\d+)?$/.test(normalized)) return null;
  const value = Number(normalized);
  return Number.isFinite(value) ? value : null;
}

export function currencyForSymbol(symbol: string | undefined): CurrencyCode {
  if (!symbol) return DEFAULT_CURRENCY;
  return CURRENCY_BY_SYMBOL[symbol.toLowerCase()] ?? DEFAULT_CURRENCY;
}

export function toUnitCode(unit: string | undefined): UnitCode | undefined {
  if (!unit) return undefined;
  const lowered = unit.toLowerCase();
  return isUnitCode(lowered) ? lowered : undefined;
}

/**
 * Multiplier for a unit; 1 when there is no unit.
 */
export function unitMultiplier(unit: UnitCode | undefined): number {
  return unit ? UNIT_MULTIPLIERS[unit] : 1;
}

/**
 * Build a MonetaryValue from the pieces of a match.
 */
export function buildMonetaryValue(
  symbol: string | undefined,
  rawNumber: string,
  rawUnit: string | undefined
): MonetaryValue | null {
  const magnitude = normalizeNumber(rawNumber);
  if (magnitude === null) return null;

  const unit = toUnitCode(rawUnit);
  const result: MonetaryValue = {
    value: magnitude * unitMultiplier(unit),
    currency: currencyForSymbol(symbol),
  };
  if (unit) result.unit = unit;
  return result;
}

/**
 * Parse a monetary expression.
 *
 * @returns the normalized figure, or null for sentinels, text without a
 *   figure, and malformed numbers
 */
export function parseMonetaryValue(text: string | null | undefined): MonetaryValue | null {
  if (!text || isSentinel(text)) return null;

  for (const pattern of MONETARY_PATTERNS) {
    const match = pattern.exec(text);
    if (!match?.groups) continue;

    const { symbol, number, unit } = match.groups;
    return buildMonetaryValue(symbol, number, unit);
  }

  return null;
}
