import { Connection, PublicKey, type Commitment } from '@solana/web3.js';

import type { TidewatchConfig } from '../../core/config.js';
import { toErrorMessage } from '../../core/logger.js';
import type { SourceHealth } from '../../intel/source.js';
import { lamportsToSol } from './wallet.js';

/**
 * Read-only chain access through a web3.js Connection.
 */
export class SolanaRpc {
  readonly connection: Connection;
  readonly commitment: Commitment;

  constructor(settings: Pick<TidewatchConfig['solana'], 'rpcUrl' | 'commitment'>, connection?: Connection) {
    this.commitment = settings.commitment;
    this.connection = connection ?? new Connection(settings.rpcUrl, settings.commitment);
  }

  async getBalanceSol(address: string): Promise<number> {
    const lamports = await this.connection.getBalance(new PublicKey(address), this.commitment);
    return lamportsToSol(lamports);
  }

  async getLatestBlockhash(): Promise<string> {
    const { blockhash } = await this.connection.getLatestBlockhash(this.commitment);
    return blockhash;
  }

  async health(): Promise<SourceHealth> {
    try {
      await this.connection.getSlot(this.commitment);
      return { ok: true };
    } catch (error) {
      return { ok: false, error: toErrorMessage(error) };
    }
  }
}
