import type { DexScreenerClient } from './dexscreener.js';

export interface PriceFeed {
  /** USD prices for the addresses it could resolve; others are absent. */
  getPrices(tokenAddresses: string[]): Promise<Map<string, number>>;
}

/**
 * Prices from the most liquid DexScreener pair of each token.
 */
export class DexScreenerPriceFeed implements PriceFeed {
  constructor(private client: DexScreenerClient) {}

  async getPrices(tokenAddresses: string[]): Promise<Map<string, number>> {
    const prices = new Map<string, number>();
    if (tokenAddresses.length === 0) return prices;

    const liquidity = new Map<string, number>();
    for (const token of await this.client.tokensBatch(tokenAddresses)) {
      if (token.price_usd <= 0) continue;
      if (token.liquidity_usd >= (liquidity.get(token.address) ?? -1)) {
        liquidity.set(token.address, token.liquidity_usd);
        prices.set(token.address, token.price_usd);
      }
    }
    return prices;
  }
}
