/**
 * Trading Tools Adapter
 *
 * Jupiter quotes and swap execution. execute_trade owns the dry-run gate:
 * whether a trade is simulated is decided here and nowhere else.
 */

import { z } from 'zod';

import { defineTool, fail, ok, type ToolContext } from '../types.js';
import type { SwapOrder } from '../../../execution/executor.js';
import { QuoteSchema } from '../../../execution/jupiter.js';
import { PaperExecutor } from '../../../execution/modes/paper.js';
import { SOL_MINT, solToLamports } from '../../../execution/solana/wallet.js';
import { toErrorMessage } from '../../../core/logger.js';

export const DRY_RUN_TRANSACTION_ID = 'dry_run_simulation';

export const getSwapQuoteTool = defineTool({
  name: 'get_swap_quote',
  description:
    'Get a Jupiter swap quote. Input defaults to SOL; pass the result as quote_data to execute_trade.',
  category: 'execution',
  schema: z.object({
    input_mint: z.string().min(1).default(SOL_MINT).describe('Mint to sell (default SOL)'),
    output_mint: z.string().min(1).describe('Mint to buy'),
    amount_sol: z.number().positive().describe('Amount of SOL to swap, when the input is SOL'),
    amount_raw: z
      .number()
      .int()
      .positive()
      .optional()
      .describe("Input amount in the input token's smallest units; required when input_mint is not SOL"),
    slippage_bps: z
      .number()
      .int()
      .min(1)
      .max(5000)
      .optional()
      .describe('Slippage tolerance in basis points (default from trading config)'),
  }),
  execute: async (input, ctx) => {
    if (!ctx.jupiter) {
      return fail('Quote source not configured');
    }
    const fromSol = input.input_mint === SOL_MINT;
    if (!fromSol && input.amount_raw === undefined) {
      return fail('amount_raw is required when input_mint is not SOL');
    }
    const amount = fromSol ? solToLamports(input.amount_sol) : (input.amount_raw ?? 0);
    const slippageBps = input.slippage_bps ?? ctx.config.trading.defaultSlippageBps;
    const quote = await ctx.jupiter.getQuote({
      inputMint: input.input_mint,
      outputMint: input.output_mint,
      amount,
      slippageBps,
    });
    return ok({
      input_mint: quote.inputMint,
      output_mint: quote.outputMint,
      in_amount: quote.inAmount,
      out_amount: quote.outAmount,
      price_impact_pct: Number(quote.priceImpactPct ?? 0),
      slippage_bps: quote.slippageBps ?? slippageBps,
      quote,
    });
  },
  sideEffects: false,
  requiresConfirmation: false,
  cacheTtlMs: 0,
});

async function lookupPriceUsd(ctx: ToolContext, tokenAddress: string): Promise<number | undefined> {
  if (!ctx.dexscreener) return undefined;
  try {
    const snapshot = await ctx.dexscreener.tokenSnapshot(tokenAddress);
    return snapshot && snapshot.price_usd > 0 ? snapshot.price_usd : undefined;
  } catch (error) {
    ctx.logger?.debug(`Price lookup for ${tokenAddress} failed: ${toErrorMessage(error)}`);
    return undefined;
  }
}

export const executeTradeTool = defineTool({
  name: 'execute_trade',
  description:
    'Buy or sell a token for SOL. In dry_run trading mode the trade is simulated and nothing is sent. Live trades need quote_data from get_swap_quote.',
  category: 'execution',
  schema: z.object({
    trade_type: z.enum(['buy', 'sell']),
    token_address: z.string().min(1),
    amount_sol: z.number().positive().describe('Trade size in SOL'),
    quote_data: QuoteSchema.optional().describe('Quote returned by get_swap_quote'),
    dry_run: z
      .boolean()
      .optional()
      .describe('Simulate instead of executing; defaults to the trading mode'),
    reasoning: z.string().min(1).describe('Why this trade'),
    token_symbol: z.string().optional(),
    price_usd: z.number().positive().optional().describe('Token price used for position accounting'),
  }),
  execute: async (input, ctx) => {
    const modeIsDryRun = ctx.tradingMode === 'dry_run';
    if (modeIsDryRun && input.dry_run === false) {
      return fail('Trading mode is dry_run; a live trade was requested and refused');
    }
    const dryRun = input.dry_run ?? modeIsDryRun;

    const order: SwapOrder = {
      side: input.trade_type,
      tokenAddress: input.token_address,
      tokenSymbol: input.token_symbol,
      amountSol: input.amount_sol,
      quote: input.quote_data,
      reasoning: input.reasoning,
    };

    if (!dryRun) {
      if (!input.quote_data) {
        return fail('quote required: call get_swap_quote before a live trade');
      }
      if (!ctx.liveExecutor) {
        return fail('Live execution is not configured');
      }
    }

    const executor = dryRun ? (ctx.paperExecutor ?? new PaperExecutor(ctx.logger)) : ctx.liveExecutor;
    if (!executor) {
      return fail('Live execution is not configured');
    }
    const result = await executor.execute(order);
    if (!result.executed) {
      return fail(result.message);
    }

    const priceUsd = input.price_usd ?? (await lookupPriceUsd(ctx, input.token_address));
    ctx.recordFill({
      side: input.trade_type,
      tokenAddress: input.token_address,
      tokenSymbol: input.token_symbol,
      amountSol: input.amount_sol,
      priceUsd,
      simulated: dryRun,
      signature: result.signature ?? null,
      reasoning: input.reasoning,
      timestamp: new Date().toISOString(),
    });

    if (dryRun) {
      return ok({
        simulated: true,
        transaction_id: DRY_RUN_TRANSACTION_ID,
        status: 'simulated_success',
        trade_type: input.trade_type,
        token_address: input.token_address,
        amount_sol: input.amount_sol,
        reasoning: input.reasoning,
      });
    }

    return ok({
      simulated: false,
      transaction_id: result.signature ?? null,
      status: result.confirmed ? 'confirmed' : 'submitted',
      confirmed: result.confirmed ?? false,
      attempts: result.attempts ?? 1,
      path: result.path ?? null,
      trade_type: input.trade_type,
      token_address: input.token_address,
      amount_sol: input.amount_sol,
      reasoning: input.reasoning,
    });
  },
  sideEffects: true,
  requiresConfirmation: true,
  cacheTtlMs: 0,
});

export const tradingTools = [getSwapQuoteTool, executeTradeTool];
