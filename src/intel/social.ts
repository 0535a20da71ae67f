import type { TidewatchConfig } from '../core/config.js';
import { Logger } from '../core/logger.js';
import { CACHE_TTL, type EphemeralCache } from '../memory/cache.js';
import type { DexScreenerClient } from './dexscreener.js';
import { fetchJson } from './http.js';
import { settle, unavailable, type SourceHealth, type SourceResult } from './source.js';

export interface DexSocialIndicators {
  socials: unknown[];
  websites: unknown[];
  labels: string[];
  boosts: unknown;
}

export interface SocialData {
  token_address: string;
  token_symbol: string | null;
  tweetscout_tweets: SourceResult<unknown>;
  tweetscout_accounts: SourceResult<unknown>;
  dexscreener_social: SourceResult<DexSocialIndicators>;
  sources_successful: string[];
  collected_at: string;
}

type TweetScoutSettings = TidewatchConfig['sources']['tweetscout'];

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/**
 * Raw social signals: TweetScout search results plus the socials/websites a
 * project lists on DexScreener. TweetScout needs TWEETSCOUT_API_KEY; without
 * it that source is reported unavailable and DexScreener still answers.
 */
export class SocialClient {
  private logger: Logger;

  constructor(
    private settings: TweetScoutSettings,
    private dexscreener: DexScreenerClient,
    private cache: EphemeralCache,
    private apiKey: string | undefined = process.env.TWEETSCOUT_API_KEY,
    logger?: Logger
  ) {
    this.logger = logger ?? new Logger('info', 'social');
  }

  get tweetScoutConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  async getSocialData(tokenAddress: string, tokenSymbol?: string): Promise<SocialData> {
    const dexSocial = await settle(() => this.dexSocial(tokenAddress));

    let symbol = tokenSymbol ?? null;
    if (!symbol) {
      const snapshot = await settle(() => this.dexscreener.tokenSnapshot(tokenAddress));
      symbol = snapshot.available ? snapshot.data.symbol : null;
    }

    const [tweets, accounts] = symbol
      ? await Promise.all([
          this.tweetScout('/tweets/search', { query: `$${symbol}`, limit: 20 }),
          this.tweetScout('/account/search', { query: symbol, limit: 5 }),
        ])
      : [unavailable('Token symbol unknown'), unavailable('Token symbol unknown')];

    const sources: Array<[string, SourceResult<unknown>]> = [
      ['tweetscout_tweets', tweets],
      ['tweetscout_accounts', accounts],
      ['dexscreener_social', dexSocial],
    ];

    return {
      token_address: tokenAddress,
      token_symbol: symbol,
      tweetscout_tweets: tweets,
      tweetscout_accounts: accounts,
      dexscreener_social: dexSocial,
      sources_successful: sources.filter(([, result]) => result.available).map(([name]) => name),
      collected_at: new Date().toISOString(),
    };
  }

  async health(): Promise<SourceHealth> {
    if (!this.apiKey) {
      return { ok: false, error: 'TWEETSCOUT_API_KEY not configured' };
    }
    try {
      await fetchJson(`${this.settings.baseUrl}/account/info`, {
        headers: this.headers(),
        query: { username: 'solana' },
        timeoutMs: this.settings.timeoutMs,
      });
      return { ok: true };
    } catch (error) {
      return { ok: false, error: error instanceof Error ? error.message : String(error) };
    }
  }

  private async tweetScout(
    path: string,
    query: Record<string, string | number>
  ): Promise<SourceResult<unknown>> {
    if (!this.apiKey) {
      return unavailable('TWEETSCOUT_API_KEY not configured');
    }
    const key = `tweetscout:${path}:${JSON.stringify(query)}`;
    const result = await settle(() =>
      this.cache.remember(key, CACHE_TTL.social, () =>
        fetchJson(`${this.settings.baseUrl}${path}`, {
          headers: this.headers(),
          query,
          timeoutMs: this.settings.timeoutMs,
        })
      )
    );
    if (!result.available) {
      this.logger.warn(`TweetScout ${path} failed: ${result.error}`);
    }
    return result;
  }

  private async dexSocial(tokenAddress: string): Promise<DexSocialIndicators | null> {
    const pairs = await this.dexscreener.tokenPairs(tokenAddress);
    const pair = pairs[0];
    if (!pair) return null;
    const info = pair.info ?? {};
    return {
      socials: asArray(info.socials),
      websites: asArray(info.websites),
      labels: pair.labels ?? [],
      boosts: pair.boosts ?? null,
    };
  }

  private headers(): Record<string, string> {
    return { Authorization: `Bearer ${this.apiKey ?? ''}` };
  }
}
