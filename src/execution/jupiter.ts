/**
 * Jupiter v6 aggregator client: quotes and pre-built swap transactions.
 */

import { z } from 'zod';

import type { TidewatchConfig } from '../core/config.js';
import { Logger } from '../core/logger.js';
import { fetchJson } from '../intel/http.js';
import { CACHE_TTL, type EphemeralCache } from '../memory/cache.js';

export const QuoteSchema = z
  .object({
    inputMint: z.string(),
    outputMint: z.string(),
    inAmount: z.string(),
    outAmount: z.string(),
    otherAmountThreshold: z.string().optional(),
    slippageBps: z.number().optional(),
    priceImpactPct: z.union([z.string(), z.number()]).optional(),
    routePlan: z.array(z.unknown()).optional(),
  })
  .passthrough();

export type JupiterQuote = z.infer<typeof QuoteSchema>;

const SwapResponseSchema = z
  .object({
    swapTransaction: z.string().min(1),
    lastValidBlockHeight: z.number().optional(),
  })
  .passthrough();

export interface QuoteRequest {
  inputMint: string;
  outputMint: string;
  /** Input amount in the input mint's smallest units */
  amount: number;
  slippageBps: number;
}

type JupiterSettings = TidewatchConfig['jupiter'];

export class JupiterClient {
  private logger: Logger;

  constructor(
    private settings: JupiterSettings,
    private cache: EphemeralCache,
    logger?: Logger
  ) {
    this.logger = logger ?? new Logger('info', 'jupiter');
  }

  async getQuote(request: QuoteRequest): Promise<JupiterQuote> {
    const query = {
      inputMint: request.inputMint,
      outputMint: request.outputMint,
      amount: Math.floor(request.amount),
      slippageBps: request.slippageBps,
    };
    const key = `jupiter:quote:${query.inputMint}:${query.outputMint}:${query.amount}:${query.slippageBps}`;
    const raw = await this.cache.remember(key, CACHE_TTL.quote, () =>
      fetchJson(this.settings.quoteUrl, { query, timeoutMs: this.settings.timeoutMs })
    );
    const parsed = QuoteSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Unrecognized Jupiter quote: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    this.logger.debug(
      `Quote ${parsed.data.inAmount} ${request.inputMint} -> ${parsed.data.outAmount} ${request.outputMint}`
    );
    return parsed.data;
  }

  /**
   * Ask Jupiter to build the swap for a quote. Returns the unsigned
   * versioned transaction, base64 encoded.
   */
  async getSwapTransaction(quote: JupiterQuote, userPublicKey: string): Promise<string> {
    const raw = await fetchJson(this.settings.swapUrl, {
      method: 'POST',
      timeoutMs: this.settings.timeoutMs,
      body: {
        quoteResponse: quote,
        userPublicKey,
        wrapAndUnwrapSol: true,
        computeUnitPriceMicroLamports: this.settings.priorityFeeMicroLamports,
        asLegacyTransaction: false,
        dynamicComputeUnitLimit: true,
      },
    });
    const parsed = SwapResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error('Jupiter swap response carried no transaction');
    }
    return parsed.data.swapTransaction;
  }
}
