/**
 * Telemetry Tools
 *
 * Read-only views of the wallet, the portfolio and the health of every
 * collaborator the agent depends on.
 */

import { z } from 'zod';

import { defineTool, fail, ok } from '../types.js';
import { positionValueSol } from '../../state/portfolio.js';
import { DISCOVERY_STRATEGIES } from '../../../intel/dexscreener.js';
import type { SourceHealth } from '../../../intel/source.js';
import { toErrorMessage } from '../../../core/logger.js';

const NOT_CONFIGURED: SourceHealth = { ok: false, error: 'not configured' };

export const getWalletBalanceTool = defineTool({
  name: 'get_wallet_balance',
  description:
    'Get the SOL balance available for trading. Reads the chain in live mode and the tracked balance in dry-run mode.',
  category: 'telemetry',
  schema: z.object({}),
  execute: async (_input, ctx) => {
    const state = ctx.getState();
    if (ctx.tradingMode === 'live' && ctx.rpc && ctx.walletAddress) {
      try {
        const balance = await ctx.rpc.getBalanceSol(ctx.walletAddress);
        return ok({
          balance_sol: balance,
          source: 'chain',
          wallet_address: ctx.walletAddress,
          trading_mode: ctx.tradingMode,
        });
      } catch (error) {
        ctx.logger?.warn(`On-chain balance lookup failed: ${toErrorMessage(error)}`);
        return ok({
          balance_sol: state.walletBalanceSol,
          source: 'state',
          trading_mode: ctx.tradingMode,
          chain_error: toErrorMessage(error),
        });
      }
    }
    return ok({
      balance_sol: state.walletBalanceSol,
      source: 'state',
      trading_mode: ctx.tradingMode,
    });
  },
  sideEffects: false,
  requiresConfirmation: false,
  cacheTtlMs: 0,
});

export const getPortfolioSummaryTool = defineTool({
  name: 'get_portfolio_summary',
  description:
    'Get positions, portfolio value, cash allocation and realized/unrealized P&L. Simulated (dry-run) positions are listed separately and excluded from the total.',
  category: 'telemetry',
  schema: z.object({}),
  execute: async (_input, ctx) => {
    const state = ctx.getState();
    const m = state.metrics;
    const describe = (p: (typeof state.positions)[number]) => ({
      token_address: p.tokenAddress,
      token_symbol: p.tokenSymbol,
      size_sol: p.sizeSol,
      value_sol: positionValueSol(p),
      entry_price_usd: p.entryPriceUsd,
      current_price_usd: p.currentPriceUsd,
      unrealized_pnl_sol: p.unrealizedPnlSol,
      opened_at: p.openedAt,
      stop_loss_pct: p.stopLossPct,
      take_profit_pct: p.takeProfitPct,
    });
    return ok({
      trading_mode: state.tradingMode,
      wallet_balance_sol: state.walletBalanceSol,
      total_value_sol: m.totalValueSol,
      positions_value_sol: m.positionsValueSol,
      simulated_value_sol: m.simulatedValueSol,
      cash_allocation_pct: m.cashAllocationPct,
      unrealized_pnl_sol: m.unrealizedPnlSol,
      realized_pnl_sol: m.realizedPnlSol,
      trades_executed: m.tradesExecuted,
      positions: state.positions.filter((p) => !p.simulated).map(describe),
      simulated_positions: state.positions.filter((p) => p.simulated).map(describe),
      recent_trades: state.tradeHistory.slice(-10),
      cycles_completed: state.cyclesCompleted,
    });
  },
  sideEffects: false,
  requiresConfirmation: false,
  cacheTtlMs: 0,
});

async function healthOf(source: { health(): Promise<SourceHealth> } | undefined): Promise<SourceHealth> {
  return source ? source.health() : NOT_CONFIGURED;
}

export const checkSystemStatusTool = defineTool({
  name: 'check_system_status',
  description:
    'Check data source health, cache statistics, trading memory statistics and the current trading mode.',
  category: 'telemetry',
  schema: z.object({}),
  execute: async (_input, ctx) => {
    const [dexscreener, rugcheck, social, rpc] = await Promise.all([
      healthOf(ctx.dexscreener),
      healthOf(ctx.rugcheck),
      healthOf(ctx.social),
      healthOf(ctx.rpc),
    ]);

    let memory: unknown = { enabled: false };
    if (ctx.memory) {
      try {
        memory = { enabled: true, ...ctx.memory.stats() };
      } catch (error) {
        memory = { enabled: true, error: toErrorMessage(error) };
      }
    }

    const state = ctx.getState();
    return ok({
      trading_mode: ctx.tradingMode,
      wallet_configured: Boolean(ctx.walletAddress),
      live_execution_available: Boolean(ctx.liveExecutor),
      sources: { dexscreener, rugcheck, social, solana_rpc: rpc },
      cache: ctx.cache?.stats() ?? null,
      memory,
      healthy: state.healthy,
      last_error: state.error,
    });
  },
  sideEffects: false,
  requiresConfirmation: false,
  cacheTtlMs: 0,
});

export const getMarketOverviewTool = defineTool({
  name: 'get_market_overview',
  description:
    'List the available discovery strategies and a snapshot of the latest boosted Solana tokens.',
  category: 'telemetry',
  schema: z.object({
    limit: z.number().int().min(1).max(50).default(10).describe('Tokens in the snapshot'),
  }),
  execute: async (input, ctx) => {
    if (!ctx.dexscreener) {
      return fail('Market data source not configured');
    }
    const tokens = await ctx.dexscreener.discover('boosted_latest', { limit: input.limit });
    return ok({
      available_strategies: DISCOVERY_STRATEGIES,
      boosted_latest: tokens,
      count: tokens.length,
    });
  },
  sideEffects: false,
  requiresConfirmation: false,
  cacheTtlMs: 60_000,
});

export const telemetryTools = [
  getWalletBalanceTool,
  getPortfolioSummaryTool,
  checkSystemStatusTool,
  getMarketOverviewTool,
];
