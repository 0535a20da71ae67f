/**
 * Enrichment Tools
 *
 * Per-token market, safety and social data. Sources are queried
 * independently; one failing never hides the others.
 */

import { z } from 'zod';

import { defineTool, fail, ok } from '../types.js';

const tokenAddress = z.string().min(1).describe('Token mint address');
const tokenSymbol = z.string().min(1).optional().describe('Token symbol, if known');

export const getComprehensiveTokenDataTool = defineTool({
  name: 'get_comprehensive_token_data',
  description:
    'Collect market (DexScreener), safety (RugCheck) and social (TweetScout + DexScreener socials) data for one token. Each source reports available or an error.',
  category: 'enrichment',
  schema: z.object({ token_address: tokenAddress, token_symbol: tokenSymbol }),
  execute: async (input, ctx) => {
    if (!ctx.enricher) {
      return fail('Token enrichment not configured');
    }
    return ok(await ctx.enricher.comprehensive(input.token_address, input.token_symbol));
  },
  sideEffects: false,
  requiresConfirmation: false,
  cacheTtlMs: 0,
});

export const getSafetyDataTool = defineTool({
  name: 'get_safety_data',
  description: 'Get the RugCheck report for a token: risks, authorities, holder concentration, LP lock.',
  category: 'enrichment',
  schema: z.object({ token_address: tokenAddress }),
  execute: async (input, ctx) => {
    if (!ctx.enricher) {
      return fail('Token enrichment not configured');
    }
    const result = await ctx.enricher.safety(input.token_address);
    return result.available ? ok(result.data) : fail(result.error);
  },
  sideEffects: false,
  requiresConfirmation: false,
  cacheTtlMs: 0,
});

export const getSocialDataTool = defineTool({
  name: 'get_social_data',
  description: 'Get raw social signals for a token: tweets, accounts and listed socials.',
  category: 'enrichment',
  schema: z.object({ token_address: tokenAddress, token_symbol: tokenSymbol }),
  execute: async (input, ctx) => {
    if (!ctx.enricher) {
      return fail('Token enrichment not configured');
    }
    const result = await ctx.enricher.social(input.token_address, input.token_symbol);
    return result.available ? ok(result.data) : fail(result.error);
  },
  sideEffects: false,
  requiresConfirmation: false,
  cacheTtlMs: 0,
});

export const enrichmentTools = [
  getComprehensiveTokenDataTool,
  getSafetyDataTool,
  getSocialDataTool,
];
