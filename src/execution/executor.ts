import type { JupiterQuote } from './jupiter.js';

export interface SwapOrder {
  side: 'buy' | 'sell';
  tokenAddress: string;
  tokenSymbol?: string;
  amountSol: number;
  quote?: JupiterQuote;
  reasoning: string;
}

export interface TradeResult {
  executed: boolean;
  simulated: boolean;
  message: string;
  signature?: string | null;
  confirmed?: boolean;
  attempts?: number;
  path?: string;
}

export interface ExecutionAdapter {
  readonly simulated: boolean;
  execute(order: SwapOrder): Promise<TradeResult>;
}
