/**
 * Transaction transports
 *
 * Two ways to put signed bytes on the network: the web3.js Connection
 * (primary) and a bare JSON-RPC `sendTransaction` call (fallback) for nodes
 * whose client-side handling misbehaves.
 */

import { Connection, type Commitment } from '@solana/web3.js';
import { z } from 'zod';

import { HttpError, fetchJson } from '../../intel/http.js';
import { SubmissionError, isTransientMessage } from '../errors.js';

export interface TransactionTransport {
  readonly name: string;
  send(payload: Uint8Array): Promise<string>;
  confirm(signature: string): Promise<void>;
}

/**
 * Signature some RPC nodes echo back when nothing was accepted: 64 '1'
 * characters, the base58 form of an all-zero signature.
 */
export const PLACEHOLDER_SIGNATURE = '1'.repeat(64);

export function isPlaceholderSignature(signature: string): boolean {
  return /^1+$/.test(signature);
}

export class Web3Transport implements TransactionTransport {
  readonly name = 'web3';

  constructor(
    private connection: Connection,
    private commitment: Commitment = 'confirmed'
  ) {}

  async send(payload: Uint8Array): Promise<string> {
    const signature = await this.connection.sendRawTransaction(payload, {
      skipPreflight: true,
      preflightCommitment: this.commitment,
      maxRetries: 0,
    });
    if (isPlaceholderSignature(signature)) {
      throw new SubmissionError('RPC returned a placeholder signature', true);
    }
    return signature;
  }

  async confirm(signature: string): Promise<void> {
    const result = await this.connection.confirmTransaction(signature, this.commitment);
    if (result.value.err) {
      throw new Error(`Transaction ${signature} failed: ${JSON.stringify(result.value.err)}`);
    }
  }
}

const RpcResponseSchema = z.object({
  result: z.unknown().optional(),
  error: z
    .object({ code: z.number().optional(), message: z.string() })
    .passthrough()
    .optional(),
});

const SignatureStatusesSchema = z.object({
  value: z.array(
    z
      .object({
        err: z.unknown().optional(),
        confirmationStatus: z.string().nullish(),
      })
      .passthrough()
      .nullable()
  ),
});

export interface DirectRpcOptions {
  timeoutMs?: number;
  confirmPolls?: number;
  confirmIntervalMs?: number;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class DirectRpcTransport implements TransactionTransport {
  readonly name = 'direct-rpc';
  private timeoutMs: number;
  private confirmPolls: number;
  private confirmIntervalMs: number;

  constructor(
    private rpcUrl: string,
    options: DirectRpcOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.confirmPolls = options.confirmPolls ?? 15;
    this.confirmIntervalMs = options.confirmIntervalMs ?? 2000;
  }

  async send(payload: Uint8Array): Promise<string> {
    const encoded = Buffer.from(payload).toString('base64');
    const result = await this.call('sendTransaction', [
      encoded,
      { encoding: 'base64', skipPreflight: true, preflightCommitment: 'confirmed', maxRetries: 0 },
    ]);

    if (typeof result !== 'string' || result.length === 0) {
      throw new SubmissionError('RPC returned no signature', true);
    }
    if (isPlaceholderSignature(result)) {
      throw new SubmissionError('RPC returned a placeholder signature', true);
    }
    return result;
  }

  async confirm(signature: string): Promise<void> {
    for (let poll = 0; poll < this.confirmPolls; poll += 1) {
      const raw = await this.call('getSignatureStatuses', [
        [signature],
        { searchTransactionHistory: true },
      ]);
      const parsed = SignatureStatusesSchema.safeParse(raw);
      const status = parsed.success ? parsed.data.value[0] : null;
      if (status?.err) {
        throw new Error(`Transaction ${signature} failed: ${JSON.stringify(status.err)}`);
      }
      if (
        status?.confirmationStatus === 'confirmed' ||
        status?.confirmationStatus === 'finalized'
      ) {
        return;
      }
      await sleep(this.confirmIntervalMs);
    }
    throw new Error(`Transaction ${signature} not confirmed after ${this.confirmPolls} polls`);
  }

  private async call(method: string, params: unknown[]): Promise<unknown> {
    let raw: unknown;
    try {
      raw = await fetchJson(this.rpcUrl, {
        method: 'POST',
        body: { jsonrpc: '2.0', id: 1, method, params },
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      if (error instanceof HttpError) {
        throw new SubmissionError(error.message, error.status === 429 || error.status >= 500);
      }
      // network-level failures (aborts, resets) are worth another try
      throw new SubmissionError(error instanceof Error ? error.message : String(error), true);
    }

    const parsed = RpcResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SubmissionError(`Malformed RPC response to ${method}`, true);
    }
    if (parsed.data.error) {
      const message = parsed.data.error.message;
      throw new SubmissionError(`RPC ${method} error: ${message}`, isTransientMessage(message));
    }
    return parsed.data.result;
  }
}
