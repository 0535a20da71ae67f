import { describe, it, expect, vi } from 'vitest';

import { createCatalogRegistry } from '../../src/agent/tools/adapters/index.js';
import { DRY_RUN_TRANSACTION_ID } from '../../src/agent/tools/adapters/trading-tools.js';
import type { ExecutionAdapter, TradeResult } from '../../src/execution/executor.js';
import { SOL_MINT } from '../../src/execution/solana/wallet.js';
import { quietLogger, toolContext } from '../helpers/context.js';

const quote = {
  inputMint: SOL_MINT,
  outputMint: 'TokenMint111',
  inAmount: '500000000',
  outAmount: '123456',
  slippageBps: 100,
};

const buy = {
  trade_type: 'buy',
  token_address: 'TokenMint111',
  token_symbol: 'TIDE',
  amount_sol: 0.5,
  reasoning: 'volume breakout',
  price_usd: 0.02,
};

function liveExecutor(result: TradeResult) {
  const execute = vi.fn(async () => result);
  const adapter: ExecutionAdapter = { simulated: false, execute };
  return { adapter, execute };
}

describe('execute_trade', () => {
  it('simulates in dry_run mode and records a simulated fill', async () => {
    const registry = createCatalogRegistry();
    const { ctx, fills } = toolContext({ tradingMode: 'dry_run' });

    const execution = await registry.execute('execute_trade', buy, ctx);

    expect(execution.result.success).toBe(true);
    if (!execution.result.success) return;
    expect(execution.result.data).toEqual({
      simulated: true,
      transaction_id: DRY_RUN_TRANSACTION_ID,
      status: 'simulated_success',
      trade_type: 'buy',
      token_address: 'TokenMint111',
      amount_sol: 0.5,
      reasoning: 'volume breakout',
    });
    expect(fills).toHaveLength(1);
    expect(fills[0]).toMatchObject({
      side: 'buy',
      tokenAddress: 'TokenMint111',
      tokenSymbol: 'TIDE',
      amountSol: 0.5,
      priceUsd: 0.02,
      simulated: true,
      signature: null,
    });
  });

  it('refuses a live request while the trading mode is dry_run', async () => {
    const registry = createCatalogRegistry();
    const { adapter, execute } = liveExecutor({ executed: true, simulated: false, message: 'x' });
    const { ctx, fills } = toolContext({ tradingMode: 'dry_run', liveExecutor: adapter });

    const execution = await registry.execute(
      'execute_trade',
      { ...buy, dry_run: false, quote_data: quote },
      ctx
    );

    expect(execution.result).toMatchObject({
      success: false,
      error: 'Trading mode is dry_run; a live trade was requested and refused',
    });
    expect(execute).not.toHaveBeenCalled();
    expect(fills).toHaveLength(0);
  });

  it('needs a quote for a live trade', async () => {
    const registry = createCatalogRegistry();
    const { adapter, execute } = liveExecutor({ executed: true, simulated: false, message: 'x' });
    const { ctx } = toolContext({ tradingMode: 'live', liveExecutor: adapter });

    const execution = await registry.execute('execute_trade', buy, ctx);

    expect(execution.result).toMatchObject({
      success: false,
      error: 'quote required: call get_swap_quote before a live trade',
    });
    expect(execute).not.toHaveBeenCalled();
  });

  it('fails a live trade when no live executor is wired', async () => {
    const registry = createCatalogRegistry();
    const { ctx } = toolContext({ tradingMode: 'live' });

    const execution = await registry.execute('execute_trade', { ...buy, quote_data: quote }, ctx);
    expect(execution.result).toMatchObject({ success: false, error: 'Live execution is not configured' });
  });

  it('executes live and reports the submission', async () => {
    const registry = createCatalogRegistry();
    const { adapter, execute } = liveExecutor({
      executed: true,
      simulated: false,
      signature: 'sig-live',
      confirmed: true,
      attempts: 2,
      path: 'web3',
      message: 'Swap confirmed',
    });
    const { ctx, fills } = toolContext({ tradingMode: 'live', liveExecutor: adapter });

    const execution = await registry.execute('execute_trade', { ...buy, quote_data: quote }, ctx);

    expect(execution.result.success).toBe(true);
    if (!execution.result.success) return;
    expect(execution.result.data).toEqual({
      simulated: false,
      transaction_id: 'sig-live',
      status: 'confirmed',
      confirmed: true,
      attempts: 2,
      path: 'web3',
      trade_type: 'buy',
      token_address: 'TokenMint111',
      amount_sol: 0.5,
      reasoning: 'volume breakout',
    });
    expect(execute).toHaveBeenCalledWith({
      side: 'buy',
      tokenAddress: 'TokenMint111',
      tokenSymbol: 'TIDE',
      amountSol: 0.5,
      quote,
      reasoning: 'volume breakout',
    });
    expect(fills[0]).toMatchObject({ simulated: false, signature: 'sig-live' });
  });

  it('lets a live-mode caller ask for a simulation', async () => {
    const registry = createCatalogRegistry();
    const { adapter, execute } = liveExecutor({ executed: true, simulated: false, message: 'x' });
    const { ctx, fills } = toolContext({ tradingMode: 'live', liveExecutor: adapter });

    const execution = await registry.execute('execute_trade', { ...buy, dry_run: true }, ctx);

    expect(execution.result).toMatchObject({ success: true, data: { simulated: true } });
    expect(execute).not.toHaveBeenCalled();
    expect(fills[0]?.simulated).toBe(true);
  });

  it('records nothing when the live executor does not execute', async () => {
    const registry = createCatalogRegistry();
    const { adapter } = liveExecutor({
      executed: false,
      simulated: false,
      attempts: 3,
      message: 'Submission failed after 3 attempt(s): too busy',
    });
    const { ctx, fills } = toolContext({ tradingMode: 'live', liveExecutor: adapter });

    const execution = await registry.execute('execute_trade', { ...buy, quote_data: quote }, ctx);

    expect(execution.result).toMatchObject({
      success: false,
      error: 'Submission failed after 3 attempt(s): too busy',
    });
    expect(fills).toHaveLength(0);
  });

  it('rejects trades without reasoning', async () => {
    const registry = createCatalogRegistry();
    const { ctx } = toolContext({ logger: quietLogger });

    const execution = await registry.execute('execute_trade', { ...buy, reasoning: '' }, ctx);
    expect(execution.result.success).toBe(false);
  });
});
