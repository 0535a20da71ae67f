/**
 * Tool Adapters Index
 *
 * The full catalog, keyed by tool name so a missing or misnamed tool is a
 * compile error.
 */

export { telemetryTools } from './telemetry-tools.js';
export { discoveryTools } from './discovery-tools.js';
export { filterTools } from './filter-tools.js';
export { enrichmentTools } from './enrichment-tools.js';
export { memoryTools } from './memory-tools.js';
export { tradingTools } from './trading-tools.js';

import {
  checkSystemStatusTool,
  getMarketOverviewTool,
  getPortfolioSummaryTool,
  getWalletBalanceTool,
} from './telemetry-tools.js';
import { discoverTokensTool } from './discovery-tools.js';
import { filterTokensTool, sortTokensTool } from './filter-tools.js';
import {
  getComprehensiveTokenDataTool,
  getSafetyDataTool,
  getSocialDataTool,
} from './enrichment-tools.js';
import {
  findSimilarTokensTool,
  getTradingPatternsTool,
  saveTradingExperienceTool,
  searchTradingHistoryTool,
} from './memory-tools.js';
import { executeTradeTool, getSwapQuoteTool } from './trading-tools.js';
import type { ToolDefinition, ToolName } from '../types.js';
import { AgentToolRegistry } from '../registry.js';

export const toolCatalog = {
  get_wallet_balance: getWalletBalanceTool,
  get_portfolio_summary: getPortfolioSummaryTool,
  check_system_status: checkSystemStatusTool,
  get_market_overview: getMarketOverviewTool,
  discover_tokens: discoverTokensTool,
  filter_tokens: filterTokensTool,
  sort_tokens: sortTokensTool,
  get_comprehensive_token_data: getComprehensiveTokenDataTool,
  get_safety_data: getSafetyDataTool,
  get_social_data: getSocialDataTool,
  search_trading_history: searchTradingHistoryTool,
  find_similar_tokens: findSimilarTokensTool,
  get_trading_patterns: getTradingPatternsTool,
  save_trading_experience: saveTradingExperienceTool,
  get_swap_quote: getSwapQuoteTool,
  execute_trade: executeTradeTool,
} satisfies Record<ToolName, ToolDefinition>;

/**
 * All available tools.
 */
export const allTools: ToolDefinition[] = Object.values(toolCatalog);

export function registerAllTools(registry: AgentToolRegistry): void {
  registry.registerAll(allTools);
}

/**
 * A registry holding the whole catalog.
 */
export function createCatalogRegistry(): AgentToolRegistry {
  const registry = new AgentToolRegistry();
  registerAllTools(registry);
  return registry;
}
