/**
 * DexScreener client
 *
 * Raw market data for Solana tokens. Responses are cached in the shared
 * ephemeral cache as they arrive and normalized on the way out; nothing
 * here scores or ranks a token.
 */

import { z } from 'zod';

import type { TidewatchConfig } from '../core/config.js';
import { Logger } from '../core/logger.js';
import { CACHE_TTL, type EphemeralCache } from '../memory/cache.js';
import { fetchJson } from './http.js';
import type { SourceHealth } from './source.js';

/** Most addresses the batch endpoint takes per request */
const BATCH_SIZE = 30;

export const DISCOVERY_STRATEGIES = [
  'boosted_latest',
  'boosted_top',
  'profiles_latest',
  'custom_search',
] as const;

export type DiscoveryStrategy = (typeof DISCOVERY_STRATEGIES)[number];

export interface TokenCandidate {
  address: string;
  symbol: string;
  name: string;
  price_usd: number;
  liquidity_usd: number;
  volume_24h: number;
  volume_1h: number;
  volume_5m: number;
  age_hours: number;
  market_cap: number;
  fdv: number;
  price_change_24h: number;
  price_change_1h: number;
  price_change_5m: number;
  buy_count: number;
  sell_count: number;
  buy_ratio: number;
  total_transactions: number;
  pair_address: string;
  dex_id: string;
  chain_id: string;
  url: string;
  labels: string[];
  boost_info?: Record<string, unknown>;
  search_query?: string;
  collected_at: string;
}

const numeric = z.union([z.number(), z.string()]).nullish();

const TxnWindowSchema = z
  .object({ buys: z.number().nullish(), sells: z.number().nullish() })
  .passthrough();

export const PairSchema = z
  .object({
    chainId: z.string().nullish(),
    dexId: z.string().nullish(),
    url: z.string().nullish(),
    pairAddress: z.string().nullish(),
    baseToken: z.object({
      address: z.string(),
      name: z.string().nullish(),
      symbol: z.string().nullish(),
    }),
    priceUsd: numeric,
    liquidity: z.object({ usd: numeric }).passthrough().nullish(),
    volume: z.record(numeric).nullish(),
    priceChange: z.record(numeric).nullish(),
    txns: z.record(TxnWindowSchema).nullish(),
    marketCap: numeric,
    fdv: numeric,
    pairCreatedAt: z.number().nullish(),
    labels: z.array(z.string()).nullish(),
    info: z.record(z.unknown()).nullish(),
  })
  .passthrough();

export type DexPair = z.infer<typeof PairSchema>;

const TokenListingSchema = z
  .object({
    chainId: z.string().nullish(),
    tokenAddress: z.string().nullish(),
  })
  .passthrough();

const SearchResponseSchema = z.object({ pairs: z.array(z.unknown()).nullish() }).passthrough();

function toNumber(value: string | number | null | undefined): number {
  if (value === null || value === undefined) return 0;
  const parsed = typeof value === 'number' ? value : Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Flatten one DexScreener pair into a TokenCandidate.
 */
export function processPair(pair: DexPair, now: number = Date.now()): TokenCandidate {
  let buyCount = 0;
  let sellCount = 0;
  for (const window of Object.values(pair.txns ?? {})) {
    buyCount += window.buys ?? 0;
    sellCount += window.sells ?? 0;
  }
  const totalTransactions = buyCount + sellCount;
  const volume = pair.volume ?? {};
  const priceChange = pair.priceChange ?? {};

  return {
    address: pair.baseToken.address,
    symbol: pair.baseToken.symbol ?? 'Unknown',
    name: pair.baseToken.name ?? '',
    price_usd: toNumber(pair.priceUsd),
    liquidity_usd: toNumber(pair.liquidity?.usd),
    volume_24h: toNumber(volume.h24),
    volume_1h: toNumber(volume.h1),
    volume_5m: toNumber(volume.m5),
    age_hours: pair.pairCreatedAt ? (now - pair.pairCreatedAt) / 3_600_000 : 0,
    market_cap: toNumber(pair.marketCap),
    fdv: toNumber(pair.fdv),
    price_change_24h: toNumber(priceChange.h24),
    price_change_1h: toNumber(priceChange.h1),
    price_change_5m: toNumber(priceChange.m5),
    buy_count: buyCount,
    sell_count: sellCount,
    buy_ratio: totalTransactions > 0 ? buyCount / totalTransactions : 0.5,
    total_transactions: totalTransactions,
    pair_address: pair.pairAddress ?? '',
    dex_id: pair.dexId ?? '',
    chain_id: pair.chainId ?? '',
    url: pair.url ?? '',
    labels: pair.labels ?? [],
    collected_at: new Date(now).toISOString(),
  };
}

function parsePairs(raw: unknown): DexPair[] {
  const items = Array.isArray(raw) ? raw : raw ? [raw] : [];
  const pairs: DexPair[] = [];
  for (const item of items) {
    const parsed = PairSchema.safeParse(item);
    if (parsed.success) pairs.push(parsed.data);
  }
  return pairs;
}

export interface DiscoverOptions {
  limit: number;
  query?: string;
}

type DexScreenerSettings = TidewatchConfig['sources']['dexscreener'];

export class DexScreenerClient {
  private logger: Logger;

  constructor(
    private settings: DexScreenerSettings,
    private cache: EphemeralCache,
    logger?: Logger
  ) {
    this.logger = logger ?? new Logger('info', 'dexscreener');
  }

  get chainId(): string {
    return this.settings.chainId;
  }

  async discover(strategy: DiscoveryStrategy, options: DiscoverOptions): Promise<TokenCandidate[]> {
    switch (strategy) {
      case 'boosted_latest':
        return this.fromListing('/token-boosts/latest/v1', CACHE_TTL.boosts, options.limit);
      case 'boosted_top':
        return this.fromListing('/token-boosts/top/v1', CACHE_TTL.boosts, options.limit);
      case 'profiles_latest':
        return this.fromListing('/token-profiles/latest/v1', CACHE_TTL.profiles, options.limit);
      case 'custom_search':
        if (!options.query) {
          throw new Error('custom_search requires a search query');
        }
        return this.search(options.query, options.limit);
    }
  }

  async search(query: string, limit: number): Promise<TokenCandidate[]> {
    const raw = await this.get(`/latest/dex/search`, CACHE_TTL.search, { q: query });
    const parsed = SearchResponseSchema.safeParse(raw);
    if (!parsed.success || !parsed.data.pairs) {
      this.logger.warn(`No search results for "${query}"`);
      return [];
    }
    return parsePairs(parsed.data.pairs)
      .filter((pair) => !pair.chainId || pair.chainId === this.settings.chainId)
      .slice(0, limit)
      .map((pair) => ({ ...processPair(pair), search_query: query }));
  }

  async tokenPairs(tokenAddress: string): Promise<DexPair[]> {
    const raw = await this.get(
      `/token-pairs/v1/${this.settings.chainId}/${tokenAddress}`,
      CACHE_TTL.pairs
    );
    return parsePairs(raw);
  }

  /**
   * The most liquid pair for a token, normalized.
   */
  async tokenSnapshot(tokenAddress: string): Promise<TokenCandidate | null> {
    const pairs = await this.tokenPairs(tokenAddress);
    if (pairs.length === 0) return null;
    const best = pairs.reduce((a, b) =>
      toNumber(b.liquidity?.usd) > toNumber(a.liquidity?.usd) ? b : a
    );
    return processPair(best);
  }

  /**
   * Pairs for many tokens, fetched in groups the endpoint accepts.
   */
  async tokensBatch(tokenAddresses: string[]): Promise<TokenCandidate[]> {
    const results: TokenCandidate[] = [];
    for (let start = 0; start < tokenAddresses.length; start += BATCH_SIZE) {
      const addresses = tokenAddresses.slice(start, start + BATCH_SIZE);
      const raw = await this.get(
        `/tokens/v1/${this.settings.chainId}/${addresses.join(',')}`,
        CACHE_TTL.pairs
      );
      results.push(...parsePairs(raw).map((pair) => processPair(pair)));
    }
    return results;
  }

  async health(): Promise<SourceHealth> {
    try {
      await this.get('/token-boosts/latest/v1', CACHE_TTL.boosts);
      return { ok: true };
    } catch (error) {
      return { ok: false, error: error instanceof Error ? error.message : String(error) };
    }
  }

  private async fromListing(path: string, ttlMs: number, limit: number): Promise<TokenCandidate[]> {
    const raw = await this.get(path, ttlMs);
    const listings = Array.isArray(raw) ? raw : raw ? [raw] : [];
    const results: TokenCandidate[] = [];

    for (const item of listings) {
      if (results.length >= limit) break;
      const listing = TokenListingSchema.safeParse(item);
      if (!listing.success) continue;
      const { chainId, tokenAddress } = listing.data;
      if (chainId !== this.settings.chainId || !tokenAddress) continue;

      try {
        const pairs = await this.tokenPairs(tokenAddress);
        for (const pair of pairs) {
          if (results.length >= limit) break;
          results.push({ ...processPair(pair), boost_info: listing.data });
        }
      } catch (error) {
        this.logger.warn(`Pair lookup failed for ${tokenAddress}`, error);
      }
    }

    this.logger.info(`Collected ${results.length} tokens from ${path}`);
    return results;
  }

  private get(
    path: string,
    ttlMs: number,
    query?: Record<string, string>
  ): Promise<unknown> {
    const url = `${this.settings.baseUrl}${path}`;
    const key = `dexscreener:${path}${query ? `?${new URLSearchParams(query).toString()}` : ''}`;
    return this.cache.remember(key, ttlMs, () =>
      fetchJson(url, {
        query,
        timeoutMs: this.settings.timeoutMs,
        maxRetries: this.settings.maxRetries,
      })
    );
  }
}
