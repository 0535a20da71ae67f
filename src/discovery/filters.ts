/**
 * Mechanical token filters
 *
 * Pure predicates and orderings over candidate lists. They carry no notion of
 * a "good" token; the oracle picks the thresholds.
 */

import { z } from 'zod';

export type TokenRecord = Record<string, unknown>;

export const TokenFiltersSchema = z
  .object({
    max_age_hours: z.number().optional().describe('Keep tokens at most this many hours old'),
    min_liquidity_usd: z.number().optional().describe('Minimum pool liquidity in USD'),
    max_liquidity_usd: z.number().optional().describe('Maximum pool liquidity in USD'),
    min_volume_24h: z.number().optional().describe('Minimum 24h volume in USD'),
    min_market_cap: z.number().optional().describe('Minimum market cap (falls back to FDV)'),
    max_market_cap: z.number().optional().describe('Maximum market cap (falls back to FDV)'),
    min_price_change_24h: z.number().optional().describe('Minimum 24h price change, percent'),
    max_price_change_24h: z.number().optional().describe('Maximum 24h price change, percent'),
  })
  .strict();

export type TokenFilters = z.infer<typeof TokenFiltersSchema>;

export const SORTABLE_METRICS = [
  'volume_24h',
  'volume_1h',
  'liquidity_usd',
  'price_change_24h',
  'price_change_1h',
  'age_hours',
  'market_cap',
  'fdv',
  'buy_ratio',
  'total_transactions',
] as const;

export type SortableMetric = (typeof SORTABLE_METRICS)[number];

/**
 * Read a numeric field, treating absent or non-numeric values as 0.
 */
export function metric(token: TokenRecord, field: string): number {
  const value = token[field];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string') {
    const parsed = Number.parseFloat(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return 0;
}

function marketCapOf(token: TokenRecord): number {
  return metric(token, 'market_cap') || metric(token, 'fdv');
}

function within(value: number, min?: number, max?: number): boolean {
  if (min !== undefined && value < min) return false;
  if (max !== undefined && value > max) return false;
  return true;
}

export function filterTokens<T extends TokenRecord>(tokens: T[], filters: TokenFilters): T[] {
  return tokens.filter((token) => {
    if (filters.max_age_hours !== undefined && metric(token, 'age_hours') > filters.max_age_hours) {
      return false;
    }
    if (!within(metric(token, 'liquidity_usd'), filters.min_liquidity_usd, filters.max_liquidity_usd)) {
      return false;
    }
    if (filters.min_volume_24h !== undefined && metric(token, 'volume_24h') < filters.min_volume_24h) {
      return false;
    }
    if (!within(marketCapOf(token), filters.min_market_cap, filters.max_market_cap)) {
      return false;
    }
    return within(
      metric(token, 'price_change_24h'),
      filters.min_price_change_24h,
      filters.max_price_change_24h
    );
  });
}

/**
 * Stable sort by one metric. Ties keep their input order.
 */
export function sortTokens<T extends TokenRecord>(
  tokens: T[],
  sortBy: string,
  descending = true
): T[] {
  const direction = descending ? -1 : 1;
  return tokens
    .map((token, index) => ({ token, index, value: metric(token, sortBy) }))
    .sort((a, b) => (a.value - b.value) * direction || a.index - b.index)
    .map((entry) => entry.token);
}
