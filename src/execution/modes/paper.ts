import type { ExecutionAdapter, SwapOrder, TradeResult } from '../executor.js';
import { Logger } from '../../core/logger.js';

/**
 * Dry-run execution. Nothing leaves the process; the order is logged and
 * reported back as simulated.
 */
export class PaperExecutor implements ExecutionAdapter {
  readonly simulated = true;
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? new Logger('info', 'paper');
  }

  async execute(order: SwapOrder): Promise<TradeResult> {
    this.logger.info(
      `[DRY RUN] ${order.side} ${order.amountSol} SOL of ${order.tokenSymbol ?? order.tokenAddress}`
    );
    return {
      executed: true,
      simulated: true,
      signature: null,
      message: `Dry run ${order.side} of ${order.amountSol} SOL simulated`,
    };
  }
}
