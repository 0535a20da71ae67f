/**
 * Filter Tools
 *
 * Pure list operations over token records the oracle already holds.
 */

import { z } from 'zod';

import { defineTool, ok } from '../types.js';
import {
  SORTABLE_METRICS,
  TokenFiltersSchema,
  filterTokens,
  sortTokens,
} from '../../../discovery/filters.js';

const TokenListSchema = z
  .array(z.record(z.unknown()))
  .describe('Token records, as returned by discover_tokens');

export const filterTokensTool = defineTool({
  name: 'filter_tokens',
  description:
    'Filter token records by numeric thresholds. Missing fields read as 0. Market cap falls back to FDV.',
  category: 'filter',
  schema: z.object({
    tokens: TokenListSchema,
    filters: TokenFiltersSchema.default({}),
  }),
  execute: async (input) => {
    const filtered = filterTokens(input.tokens, input.filters);
    return ok({
      filtered_tokens: filtered,
      original_count: input.tokens.length,
      filtered_count: filtered.length,
      filters_applied: input.filters,
    });
  },
  sideEffects: false,
  requiresConfirmation: false,
  cacheTtlMs: 0,
});

export const sortTokensTool = defineTool({
  name: 'sort_tokens',
  description: `Sort token records by one numeric field (e.g. ${SORTABLE_METRICS.join(', ')}). Missing values sort as 0; ties keep their order.`,
  category: 'filter',
  schema: z.object({
    tokens: TokenListSchema,
    sort_by: z.string().min(1).describe('Field to sort on'),
    descending: z.boolean().default(true).describe('Largest first (default true)'),
  }),
  execute: async (input) => {
    const sorted = sortTokens(input.tokens, input.sort_by, input.descending);
    return ok({
      sorted_tokens: sorted,
      sort_by: input.sort_by,
      descending: input.descending,
      count: sorted.length,
    });
  },
  sideEffects: false,
  requiresConfirmation: false,
  cacheTtlMs: 0,
});

export const filterTools = [filterTokensTool, sortTokensTool];
