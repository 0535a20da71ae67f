/**
 * Portfolio state updaters
 *
 * Pure functions over AgentState: each returns a new state and never
 * mutates its input.
 */

import { randomUUID } from 'node:crypto';

import type { AgentState, PortfolioMetrics, Position, TradeRecord } from './types.js';

/** Sells covering at least this share of a position close it. */
const FULL_EXIT_THRESHOLD = 0.999;

export interface TradeFill {
  side: 'buy' | 'sell';
  tokenAddress: string;
  tokenSymbol?: string;
  amountSol: number;
  priceUsd?: number;
  simulated: boolean;
  signature?: string | null;
  reasoning: string;
  timestamp: string;
  stopLossPct?: number;
  takeProfitPct?: number;
}

export interface FillLimits {
  tradeHistoryLimit: number;
  stopLossPct: number;
  takeProfitPct: number;
}

/**
 * Current SOL value of a position. Without both prices the position is held
 * at cost.
 */
export function positionValueSol(position: Position): number {
  if (position.entryPriceUsd > 0 && position.currentPriceUsd > 0) {
    return (position.sizeSol * position.currentPriceUsd) / position.entryPriceUsd;
  }
  return position.sizeSol;
}

export function computeMetrics(state: AgentState): PortfolioMetrics {
  let positionsValueSol = 0;
  let simulatedValueSol = 0;
  let unrealizedPnlSol = 0;
  let openPositions = 0;
  let simulatedPositions = 0;

  for (const position of state.positions) {
    const value = positionValueSol(position);
    if (position.simulated) {
      simulatedValueSol += value;
      simulatedPositions += 1;
    } else {
      positionsValueSol += value;
      unrealizedPnlSol += value - position.sizeSol;
      openPositions += 1;
    }
  }

  const totalValueSol = state.walletBalanceSol + positionsValueSol;
  return {
    totalValueSol,
    positionsValueSol,
    simulatedValueSol,
    unrealizedPnlSol,
    realizedPnlSol: state.metrics.realizedPnlSol,
    cashAllocationPct: totalValueSol > 0 ? (state.walletBalanceSol / totalValueSol) * 100 : 100,
    openPositions,
    simulatedPositions,
    tradesExecuted: state.metrics.tradesExecuted,
  };
}

export function updatePortfolioMetrics(state: AgentState): AgentState {
  const positions = state.positions.map((position) => ({
    ...position,
    unrealizedPnlSol: positionValueSol(position) - position.sizeSol,
  }));
  const next = { ...state, positions };
  return { ...next, metrics: computeMetrics(next) };
}

export function applyPrices(state: AgentState, prices: Map<string, number>): AgentState {
  if (prices.size === 0) return state;
  return {
    ...state,
    positions: state.positions.map((position) => {
      const price = prices.get(position.tokenAddress);
      return price !== undefined && price > 0 ? { ...position, currentPriceUsd: price } : position;
    }),
  };
}

function findPosition(
  positions: Position[],
  tokenAddress: string,
  simulated: boolean
): number {
  return positions.findIndex((p) => p.tokenAddress === tokenAddress && p.simulated === simulated);
}

/**
 * Apply one executed (or simulated) trade. Simulated fills only move
 * simulated positions; the wallet balance is touched by real fills alone.
 */
export function applyFill(state: AgentState, fill: TradeFill, limits: FillLimits): AgentState {
  const positions = [...state.positions];
  const price = fill.priceUsd ?? 0;
  let walletBalanceSol = state.walletBalanceSol;
  let realizedPnlSol: number | null = null;

  const index = findPosition(positions, fill.tokenAddress, fill.simulated);

  if (fill.side === 'buy') {
    const existing = index >= 0 ? positions[index] : undefined;
    if (existing) {
      const sizeSol = existing.sizeSol + fill.amountSol;
      const entryPriceUsd =
        existing.entryPriceUsd > 0 && price > 0
          ? (existing.sizeSol * existing.entryPriceUsd + fill.amountSol * price) / sizeSol
          : existing.entryPriceUsd || price;
      positions[index] = {
        ...existing,
        sizeSol,
        entryPriceUsd,
        currentPriceUsd: price > 0 ? price : existing.currentPriceUsd,
      };
    } else {
      positions.push({
        tokenAddress: fill.tokenAddress,
        tokenSymbol: fill.tokenSymbol ?? 'UNKNOWN',
        entryPriceUsd: price,
        currentPriceUsd: price,
        sizeSol: fill.amountSol,
        unrealizedPnlSol: 0,
        openedAt: fill.timestamp,
        stopLossPct: fill.stopLossPct ?? limits.stopLossPct,
        takeProfitPct: fill.takeProfitPct ?? limits.takeProfitPct,
        reasoning: fill.reasoning,
        simulated: fill.simulated,
      });
    }
    if (!fill.simulated) {
      walletBalanceSol = Math.max(0, walletBalanceSol - fill.amountSol);
    }
  } else {
    const existing = index >= 0 ? positions[index] : undefined;
    if (existing) {
      const marked =
        price > 0 && existing.entryPriceUsd > 0 ? { ...existing, currentPriceUsd: price } : existing;
      const value = positionValueSol(marked);
      const fraction = value > 0 ? Math.min(1, fill.amountSol / value) : 1;
      realizedPnlSol = fraction * (value - marked.sizeSol);

      if (fraction >= FULL_EXIT_THRESHOLD) {
        positions.splice(index, 1);
      } else {
        positions[index] = { ...marked, sizeSol: marked.sizeSol * (1 - fraction) };
      }
      if (!fill.simulated) {
        walletBalanceSol += fraction * value;
      }
    }
  }

  const record: TradeRecord = {
    id: randomUUID(),
    side: fill.side,
    tokenAddress: fill.tokenAddress,
    tokenSymbol: fill.tokenSymbol ?? 'UNKNOWN',
    amountSol: fill.amountSol,
    priceUsd: price,
    simulated: fill.simulated,
    signature: fill.signature ?? null,
    realizedPnlSol,
    reasoning: fill.reasoning,
    timestamp: fill.timestamp,
  };

  const metrics = fill.simulated
    ? state.metrics
    : {
        ...state.metrics,
        tradesExecuted: state.metrics.tradesExecuted + 1,
        realizedPnlSol: state.metrics.realizedPnlSol + (realizedPnlSol ?? 0),
      };

  return {
    ...state,
    walletBalanceSol,
    positions,
    metrics,
    tradeHistory: [...state.tradeHistory, record].slice(-limits.tradeHistoryLimit),
  };
}

export function getStateSummary(state: AgentState): string {
  const m = state.metrics;
  return [
    `Mode: ${state.tradingMode}`,
    `Cycles: ${state.cyclesCompleted}`,
    `Wallet: ${state.walletBalanceSol.toFixed(4)} SOL`,
    `Portfolio value: ${m.totalValueSol.toFixed(4)} SOL (cash ${m.cashAllocationPct.toFixed(1)}%)`,
    `Open positions: ${m.openPositions}${m.simulatedPositions ? ` (+${m.simulatedPositions} simulated)` : ''}`,
    `Realized P&L: ${m.realizedPnlSol.toFixed(4)} SOL`,
  ].join('\n');
}
