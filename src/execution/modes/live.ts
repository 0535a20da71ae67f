/**
 * Live Execution Adapter
 *
 * Real swaps through Jupiter: build the transaction from a quote, sign it
 * with the wallet keypair and hand the bytes to the submitter.
 */

import type { Keypair } from '@solana/web3.js';

import type { ExecutionAdapter, SwapOrder, TradeResult } from '../executor.js';
import type { JupiterClient } from '../jupiter.js';
import type { SubmitOptions, TransactionSubmitter } from '../solana/submitter.js';
import { signSerializedTransaction } from '../solana/wallet.js';
import { Logger, toErrorMessage } from '../../core/logger.js';

export interface LiveExecutorOptions {
  jupiter: JupiterClient;
  signer: Keypair;
  submitter: TransactionSubmitter;
  submission: SubmitOptions;
  logger?: Logger;
}

export class LiveExecutor implements ExecutionAdapter {
  readonly simulated = false;
  private logger: Logger;

  constructor(private options: LiveExecutorOptions) {
    this.logger = options.logger ?? new Logger('info', 'live');
  }

  get walletAddress(): string {
    return this.options.signer.publicKey.toBase58();
  }

  async execute(order: SwapOrder): Promise<TradeResult> {
    if (!order.quote) {
      return {
        executed: false,
        simulated: false,
        message: 'A swap quote is required for live execution; call get_swap_quote first',
      };
    }

    let payload: Uint8Array;
    try {
      const swapTransaction = await this.options.jupiter.getSwapTransaction(
        order.quote,
        this.walletAddress
      );
      payload = signSerializedTransaction(swapTransaction, this.options.signer);
    } catch (error) {
      const message = toErrorMessage(error);
      this.logger.error(`Could not build swap for ${order.tokenAddress}: ${message}`);
      return { executed: false, simulated: false, message };
    }

    const result = await this.options.submitter.submit(payload, this.options.submission);
    if (!result.ok) {
      return {
        executed: false,
        simulated: false,
        attempts: result.attempts,
        message: `Submission failed after ${result.attempts} attempt(s): ${result.error}`,
      };
    }

    this.logger.info(
      `Live ${order.side} of ${order.amountSol} SOL submitted: ${result.signature}` +
        (result.confirmed ? '' : ' (unconfirmed)')
    );
    return {
      executed: true,
      simulated: false,
      signature: result.signature,
      confirmed: result.confirmed,
      attempts: result.attempts,
      path: result.path,
      message: result.confirmed ? 'Swap confirmed' : 'Swap submitted; confirmation pending',
    };
  }
}
