import { describe, it, expect } from 'vitest';

import {
  applyFill,
  applyPrices,
  computeMetrics,
  getStateSummary,
  updatePortfolioMetrics,
  type FillLimits,
  type TradeFill,
} from '../../src/agent/state/portfolio.js';
import { createInitialState } from '../../src/agent/state/store.js';

const limits: FillLimits = { tradeHistoryLimit: 3, stopLossPct: 15, takeProfitPct: 50 };

function fill(overrides: Partial<TradeFill> = {}): TradeFill {
  return {
    side: 'buy',
    tokenAddress: 'TokenMint111',
    tokenSymbol: 'TIDE',
    amountSol: 1,
    priceUsd: 0.5,
    simulated: false,
    reasoning: 'momentum',
    timestamp: '2026-03-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('portfolio updaters', () => {
  it('opens a real position and debits the wallet', () => {
    const state = createInitialState({ walletBalanceSol: 5, tradingMode: 'live' });
    const next = updatePortfolioMetrics(applyFill(state, fill(), limits));

    expect(next.walletBalanceSol).toBe(4);
    expect(next.positions).toHaveLength(1);
    expect(next.positions[0]).toMatchObject({
      tokenSymbol: 'TIDE',
      sizeSol: 1,
      entryPriceUsd: 0.5,
      stopLossPct: 15,
      takeProfitPct: 50,
      simulated: false,
    });
    expect(next.metrics.totalValueSol).toBe(5);
    expect(next.metrics.cashAllocationPct).toBe(80);
    expect(next.metrics.tradesExecuted).toBe(1);
    expect(state.positions).toHaveLength(0);
  });

  it('keeps simulated fills away from the wallet and the real totals', () => {
    const state = createInitialState({ walletBalanceSol: 5, tradingMode: 'dry_run' });
    const next = updatePortfolioMetrics(applyFill(state, fill({ simulated: true }), limits));

    expect(next.walletBalanceSol).toBe(5);
    expect(next.metrics.totalValueSol).toBe(5);
    expect(next.metrics.openPositions).toBe(0);
    expect(next.metrics.simulatedPositions).toBe(1);
    expect(next.metrics.simulatedValueSol).toBe(1);
    expect(next.metrics.tradesExecuted).toBe(0);
    expect(next.tradeHistory[0]?.simulated).toBe(true);
  });

  it('averages the entry price when adding to a position', () => {
    const state = createInitialState({ walletBalanceSol: 5, tradingMode: 'live' });
    const once = applyFill(state, fill({ amountSol: 1, priceUsd: 1 }), limits);
    const twice = applyFill(once, fill({ amountSol: 1, priceUsd: 2 }), limits);

    expect(twice.positions).toHaveLength(1);
    expect(twice.positions[0]?.sizeSol).toBe(2);
    expect(twice.positions[0]?.entryPriceUsd).toBe(1.5);
    expect(twice.walletBalanceSol).toBe(3);
  });

  it('realizes profit on a full exit', () => {
    const state = createInitialState({ walletBalanceSol: 5, tradingMode: 'live' });
    const bought = applyFill(state, fill({ amountSol: 1, priceUsd: 1 }), limits);
    // price doubled: the 1 SOL position is worth 2 SOL
    const sold = applyFill(bought, fill({ side: 'sell', amountSol: 2, priceUsd: 2 }), limits);

    expect(sold.positions).toHaveLength(0);
    expect(sold.walletBalanceSol).toBe(6);
    expect(sold.metrics.realizedPnlSol).toBe(1);
    expect(sold.tradeHistory[1]?.realizedPnlSol).toBe(1);
  });

  it('shrinks a position on a partial exit', () => {
    const state = createInitialState({ walletBalanceSol: 0, tradingMode: 'live' });
    const bought = applyFill(state, fill({ amountSol: 2, priceUsd: 1 }), limits);
    const sold = applyFill(bought, fill({ side: 'sell', amountSol: 1, priceUsd: 1 }), limits);

    expect(sold.positions[0]?.sizeSol).toBe(1);
    expect(sold.walletBalanceSol).toBe(1);
    expect(sold.tradeHistory[1]?.realizedPnlSol).toBe(0);
  });

  it('caps the trade history', () => {
    let state = createInitialState({ walletBalanceSol: 10, tradingMode: 'live' });
    for (let i = 0; i < 5; i += 1) {
      state = applyFill(state, fill({ amountSol: 0.1, reasoning: `buy ${i}` }), limits);
    }
    expect(state.tradeHistory.map((t) => t.reasoning)).toEqual(['buy 2', 'buy 3', 'buy 4']);
  });

  it('marks positions to new prices', () => {
    const state = createInitialState({ walletBalanceSol: 0, tradingMode: 'live' });
    const bought = applyFill(state, fill({ amountSol: 1, priceUsd: 1 }), limits);
    const marked = updatePortfolioMetrics(
      applyPrices(bought, new Map([['TokenMint111', 1.5]]))
    );

    expect(marked.positions[0]?.currentPriceUsd).toBe(1.5);
    expect(marked.positions[0]?.unrealizedPnlSol).toBe(0.5);
    expect(computeMetrics(marked).positionsValueSol).toBe(1.5);
  });

  it('summarizes the state', () => {
    const state = createInitialState({ walletBalanceSol: 2, tradingMode: 'dry_run' });
    expect(getStateSummary(state)).toBe(
      [
        'Mode: dry_run',
        'Cycles: 0',
        'Wallet: 2.0000 SOL',
        'Portfolio value: 2.0000 SOL (cash 100.0%)',
        'Open positions: 0',
        'Realized P&L: 0.0000 SOL',
      ].join('\n')
    );
  });
});
