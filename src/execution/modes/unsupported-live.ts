import type { ExecutionAdapter, SwapOrder, TradeResult } from '../executor.js';

export class UnsupportedLiveExecutor implements ExecutionAdapter {
  readonly simulated = false;

  constructor(private reason = 'Live execution needs SOLANA_PRIVATE_KEY to be set.') {}

  async execute(_order: SwapOrder): Promise<TradeResult> {
    return { executed: false, simulated: false, message: this.reason };
  }
}
