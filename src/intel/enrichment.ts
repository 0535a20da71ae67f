import type { TokenCandidate } from './dexscreener.js';
import type { SafetyData } from './rugcheck.js';
import type { SocialData } from './social.js';
import { settle, unavailable, type SourceResult } from './source.js';

export interface MarketSource {
  tokenSnapshot(tokenAddress: string): Promise<TokenCandidate | null>;
}

export interface SafetySource {
  getSafetyData(tokenAddress: string): Promise<SafetyData>;
}

export interface SocialSource {
  getSocialData(tokenAddress: string, tokenSymbol?: string): Promise<SocialData>;
}

export interface EnrichmentSources {
  market?: MarketSource;
  safety?: SafetySource;
  social?: SocialSource;
}

export interface ComprehensiveTokenData {
  token_address: string;
  token_symbol: string | null;
  sources: {
    market: SourceResult<TokenCandidate>;
    safety: SourceResult<SafetyData>;
    social: SourceResult<SocialData>;
  };
  sources_available: number;
  collected_at: string;
}

/**
 * Fans a token out to every configured source. Each source stands alone:
 * one failing or missing leaves the others intact.
 */
export class TokenEnricher {
  constructor(private sources: EnrichmentSources) {}

  async market(tokenAddress: string): Promise<SourceResult<TokenCandidate>> {
    const source = this.sources.market;
    if (!source) return unavailable('Market source not configured');
    return settle(() => source.tokenSnapshot(tokenAddress));
  }

  async safety(tokenAddress: string): Promise<SourceResult<SafetyData>> {
    const source = this.sources.safety;
    if (!source) return unavailable('Safety source not configured');
    return settle(() => source.getSafetyData(tokenAddress));
  }

  async social(tokenAddress: string, tokenSymbol?: string): Promise<SourceResult<SocialData>> {
    const source = this.sources.social;
    if (!source) return unavailable('Social source not configured');
    return settle(() => source.getSocialData(tokenAddress, tokenSymbol));
  }

  async comprehensive(tokenAddress: string, tokenSymbol?: string): Promise<ComprehensiveTokenData> {
    const market = await this.market(tokenAddress);
    const symbol = tokenSymbol ?? (market.available ? market.data.symbol : undefined);
    const [safety, social] = await Promise.all([
      this.safety(tokenAddress),
      this.social(tokenAddress, symbol),
    ]);

    return {
      token_address: tokenAddress,
      token_symbol: symbol ?? null,
      sources: { market, safety, social },
      sources_available: [market, safety, social].filter((s) => s.available).length,
      collected_at: new Date().toISOString(),
    };
  }
}
