/**
 * Tool Types
 *
 * The closed catalog of actions the reasoning oracle can take, and the
 * envelope every one of them answers with.
 */

import type { z } from 'zod';

import type { TidewatchConfig } from '../../core/config.js';
import type { Logger } from '../../core/logger.js';
import type { ExecutionAdapter } from '../../execution/executor.js';
import type { JupiterClient } from '../../execution/jupiter.js';
import type { SolanaRpc } from '../../execution/solana/rpc.js';
import type { DexScreenerClient } from '../../intel/dexscreener.js';
import type { TokenEnricher } from '../../intel/enrichment.js';
import type { RugCheckClient } from '../../intel/rugcheck.js';
import type { SocialClient } from '../../intel/social.js';
import type { EphemeralCache } from '../../memory/cache.js';
import type { ExperienceStore } from '../../memory/experiences.js';
import type { TradeFill } from '../state/portfolio.js';
import type { AgentState, TradingMode } from '../state/types.js';

export const TOOL_NAMES = [
  'get_wallet_balance',
  'get_portfolio_summary',
  'check_system_status',
  'get_market_overview',
  'discover_tokens',
  'filter_tokens',
  'sort_tokens',
  'get_comprehensive_token_data',
  'get_safety_data',
  'get_social_data',
  'search_trading_history',
  'find_similar_tokens',
  'get_trading_patterns',
  'save_trading_experience',
  'get_swap_quote',
  'execute_trade',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

/**
 * Tool categories for organization and filtering.
 */
export const TOOL_CATEGORIES = [
  'telemetry',   // Wallet, portfolio and system health
  'discovery',   // Token candidates from market data
  'filter',      // Pure list operations
  'enrichment',  // Per-token market, safety and social data
  'memory',      // Trading experience store
  'execution',   // Quotes and swaps
] as const;

export type ToolCategory = (typeof TOOL_CATEGORIES)[number];

/**
 * Result of a tool execution. Tools never throw past the registry.
 */
export type ToolResult =
  | { success: true; data: unknown; timestamp: string }
  | { success: false; error: string; timestamp: string };

export function ok(data: unknown): ToolResult {
  return { success: true, data, timestamp: new Date().toISOString() };
}

export function fail(error: string): ToolResult {
  return { success: false, error, timestamp: new Date().toISOString() };
}

/**
 * Everything a tool may touch. Collaborators are optional so a partially
 * configured agent still answers with explicit failures.
 */
export interface ToolContext {
  config: TidewatchConfig;
  tradingMode: TradingMode;
  /** Snapshot of the state the current cycle is working on */
  getState: () => AgentState;
  /** Hand an executed or simulated trade back to the cycle */
  recordFill: (fill: TradeFill) => void;
  logger?: Logger;
  cache?: EphemeralCache;
  dexscreener?: DexScreenerClient;
  rugcheck?: RugCheckClient;
  social?: SocialClient;
  enricher?: TokenEnricher;
  memory?: ExperienceStore;
  jupiter?: JupiterClient;
  rpc?: SolanaRpc;
  walletAddress?: string;
  paperExecutor?: ExecutionAdapter;
  liveExecutor?: ExecutionAdapter;
}

/**
 * Definition of a tool that the agent can use.
 */
export interface ToolDefinition<S extends z.ZodTypeAny = z.ZodTypeAny> {
  /** Unique tool name */
  name: ToolName;

  /** Human-readable description */
  description: string;

  /** Category for filtering */
  category: ToolCategory;

  /** Zod schema for input validation */
  schema: S;

  /** Execute the tool */
  execute(input: z.output<S>, ctx: ToolContext): Promise<ToolResult>;

  /** Whether this tool has side effects (writes, trades, etc.) */
  sideEffects: boolean;

  /** Whether this tool requires user confirmation before execution */
  requiresConfirmation: boolean;

  /** Cache TTL in milliseconds (0 = no caching) */
  cacheTtlMs: number;
}

/**
 * Identity helper so each tool's input type is inferred from its schema.
 */
export function defineTool<S extends z.ZodTypeAny>(tool: ToolDefinition<S>): ToolDefinition<S> {
  return tool;
}

/**
 * Record of a tool execution for state tracking.
 */
export interface ToolExecution {
  toolName: string;
  input: unknown;
  result: ToolResult;
  timestamp: string;
  durationMs: number;
  cached: boolean;
}

/**
 * Cache entry for tool results.
 */
export interface ToolCacheEntry {
  result: ToolResult;
  cachedAt: number;
  key: string;
}

/**
 * Options for listing tools.
 */
export interface ListToolsOptions {
  category?: ToolCategory;
  /** Only include tools without side effects */
  readOnly?: boolean;
}

/**
 * Tool schema for LLM tool calling (Anthropic format).
 */
export interface LlmToolSchema {
  name: string;
  description: string;
  input_schema: {
    type: 'object';
    properties: Record<string, unknown>;
    required: string[];
  };
}
