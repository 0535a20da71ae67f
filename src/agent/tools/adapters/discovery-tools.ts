/**
 * Discovery Tools
 *
 * Token candidates from DexScreener listings and search. Solana only; the
 * returned fields are raw market data.
 */

import { z } from 'zod';

import { defineTool, fail, ok } from '../types.js';
import { DISCOVERY_STRATEGIES } from '../../../intel/dexscreener.js';

export const discoverTokensTool = defineTool({
  name: 'discover_tokens',
  description:
    'Discover Solana token candidates. Strategies: boosted_latest (newly boosted), boosted_top (most boosted), profiles_latest (new token profiles), custom_search (requires search_query).',
  category: 'discovery',
  schema: z.object({
    strategy: z.enum(DISCOVERY_STRATEGIES).describe('Discovery strategy'),
    search_query: z
      .string()
      .min(1)
      .optional()
      .describe('Search text; required for custom_search'),
    limit: z.number().int().min(1).max(100).default(20).describe('Maximum tokens to return'),
  }),
  execute: async (input, ctx) => {
    if (input.strategy === 'custom_search' && !input.search_query) {
      return fail('custom_search requires search_query');
    }
    if (!ctx.dexscreener) {
      return fail('Market data source not configured');
    }
    const tokens = await ctx.dexscreener.discover(input.strategy, {
      limit: input.limit,
      query: input.search_query,
    });
    return ok({
      strategy: input.strategy,
      chain: ctx.dexscreener.chainId,
      search_query: input.search_query ?? null,
      tokens,
      count: tokens.length,
    });
  },
  sideEffects: false,
  requiresConfirmation: false,
  cacheTtlMs: 0,
});

export const discoveryTools = [discoverTokensTool];
