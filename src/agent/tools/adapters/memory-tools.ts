/**
 * Memory Tools Adapter
 *
 * Semantic search over past trading experiences, and recording new ones.
 */

import { z } from 'zod';

import { defineTool, fail, ok } from '../types.js';
import { PATTERN_TYPES } from '../../../memory/experiences.js';

const MEMORY_DISABLED = 'Trading memory is disabled';

export const searchTradingHistoryTool = defineTool({
  name: 'search_trading_history',
  description: 'Search past trading experiences by meaning. Returns the closest matches with their outcomes.',
  category: 'memory',
  schema: z.object({
    query: z.string().min(1).describe('What to search for'),
    limit: z.number().int().min(1).max(20).default(5).describe('Maximum results (default: 5)'),
  }),
  execute: async (input, ctx) => {
    if (!ctx.memory) return fail(MEMORY_DISABLED);
    const results = await ctx.memory.search(input.query, input.limit);
    return ok({ query: input.query, results, count: results.length });
  },
  sideEffects: false,
  requiresConfirmation: false,
  cacheTtlMs: 0,
});

export const findSimilarTokensTool = defineTool({
  name: 'find_similar_tokens',
  description:
    'Find past trades on tokens resembling this one (symbol, market cap, liquidity, volume, price change, age).',
  category: 'memory',
  schema: z.object({
    token_data: z.record(z.unknown()).describe('Token record, e.g. from discover_tokens'),
    limit: z.number().int().min(1).max(20).default(5),
  }),
  execute: async (input, ctx) => {
    if (!ctx.memory) return fail(MEMORY_DISABLED);
    const similar = await ctx.memory.findSimilar(input.token_data, input.limit);
    return ok({ similar_experiences: similar, count: similar.length });
  },
  sideEffects: false,
  requiresConfirmation: false,
  cacheTtlMs: 0,
});

export const getTradingPatternsTool = defineTool({
  name: 'get_trading_patterns',
  description:
    'Get past experiences of one kind: profitable, losing, high_profit (>= 20%) or quick_trades (held <= 2h).',
  category: 'memory',
  schema: z.object({
    pattern_type: z.enum(PATTERN_TYPES),
    limit: z.number().int().min(1).max(50).default(10),
  }),
  execute: async (input, ctx) => {
    if (!ctx.memory) return fail(MEMORY_DISABLED);
    const patterns = await ctx.memory.patterns(input.pattern_type, input.limit);
    return ok({ pattern_type: input.pattern_type, patterns, count: patterns.length });
  },
  sideEffects: false,
  requiresConfirmation: false,
  cacheTtlMs: 0,
});

export const saveTradingExperienceTool = defineTool({
  name: 'save_trading_experience',
  description: 'Record a trade and what was learned from it, for future searches.',
  category: 'memory',
  schema: z.object({
    token_address: z.string().min(1),
    token_symbol: z.string().optional(),
    trade_type: z.string().min(1).describe('e.g. buy, sell, analysis'),
    profit_percentage: z.number().optional(),
    hold_time_hours: z.number().nonnegative().optional(),
    position_size_sol: z.number().nonnegative().optional(),
    strategy: z.string().optional(),
    reasoning: z.string().min(1),
    lessons_learned: z.string().optional(),
  }),
  execute: async (input, ctx) => {
    if (!ctx.memory) return fail(MEMORY_DISABLED);
    const id = await ctx.memory.add(input);
    return ok({ experience_id: id, token_address: input.token_address });
  },
  sideEffects: true,
  requiresConfirmation: false,
  cacheTtlMs: 0,
});

export const memoryTools = [
  searchTradingHistoryTool,
  findSimilarTokensTool,
  getTradingPatternsTool,
  saveTradingExperienceTool,
];
