import { describe, it, expect, vi } from 'vitest';

import { Logger } from '../../src/core/logger.js';
import { SubmissionError } from '../../src/execution/errors.js';
import { TransactionSubmitter } from '../../src/execution/solana/submitter.js';
import type { TransactionTransport } from '../../src/execution/solana/transports.js';

const quiet = new Logger('error');
const payload = new Uint8Array([1, 2, 3]);
const options = { maxRetries: 3, baseDelayMs: 100 };

function transport(
  name: string,
  send: TransactionTransport['send'],
  confirm: TransactionTransport['confirm'] = async () => undefined
) {
  return { name, send: vi.fn(send), confirm: vi.fn(confirm) };
}

describe('TransactionSubmitter', () => {
  it('returns the signature from the first accepted send', async () => {
    const primary = transport('web3', async () => 'sig-1');
    const sleep = vi.fn(async () => undefined);
    const submitter = new TransactionSubmitter([primary], quiet, sleep);

    const result = await submitter.submit(payload, options);

    expect(result).toEqual({ ok: true, signature: 'sig-1', confirmed: true, attempts: 1, path: 'web3' });
    expect(primary.confirm).toHaveBeenCalledWith('sig-1');
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries transient failures with exponential backoff', async () => {
    let calls = 0;
    const primary = transport('web3', async () => {
      calls += 1;
      if (calls < 3) throw new SubmissionError('blockhash not found', true);
      return 'sig-3';
    });
    const sleep = vi.fn(async () => undefined);
    const submitter = new TransactionSubmitter([primary], quiet, sleep);

    const result = await submitter.submit(payload, options);

    expect(result).toMatchObject({ ok: true, signature: 'sig-3', attempts: 3 });
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it('moves to the fallback transport for the last attempt', async () => {
    const primary = transport('web3', async () => {
      throw new Error('socket hang up');
    });
    const fallback = transport('direct-rpc', async () => 'sig-fallback');
    const sleep = vi.fn(async () => undefined);
    const submitter = new TransactionSubmitter([primary, fallback], quiet, sleep);

    const result = await submitter.submit(payload, options);

    expect(result).toEqual({
      ok: true,
      signature: 'sig-fallback',
      confirmed: true,
      attempts: 3,
      path: 'direct-rpc',
    });
    expect(primary.send).toHaveBeenCalledTimes(2);
    expect(fallback.send).toHaveBeenCalledTimes(1);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it('stops immediately on a non-retryable rejection', async () => {
    const primary = transport('web3', async () => {
      throw new SubmissionError('insufficient funds', false);
    });
    const fallback = transport('direct-rpc', async () => 'never');
    const submitter = new TransactionSubmitter([primary, fallback], quiet, vi.fn(async () => undefined));

    const result = await submitter.submit(payload, options);

    expect(result).toEqual({ ok: false, error: 'insufficient funds', attempts: 1 });
    expect(fallback.send).not.toHaveBeenCalled();
  });

  it('reports the last error when every path fails', async () => {
    const primary = transport('web3', async () => {
      throw new SubmissionError('rate limit', true);
    });
    const fallback = transport('direct-rpc', async () => {
      throw new SubmissionError('too busy', true);
    });
    const submitter = new TransactionSubmitter(
      [primary, fallback],
      quiet,
      vi.fn(async () => undefined)
    );

    const result = await submitter.submit(payload, { maxRetries: 2, baseDelayMs: 0 });

    expect(result).toEqual({ ok: false, error: 'too busy', attempts: 2 });
  });

  it('keeps every path within one attempt budget', async () => {
    const primary = transport('web3', async () => {
      throw new SubmissionError('too busy', true);
    });
    const fallback = transport('direct-rpc', async () => {
      throw new SubmissionError('too busy', true);
    });
    const sleep = vi.fn(async () => undefined);
    const submitter = new TransactionSubmitter([primary, fallback], quiet, sleep);

    const result = await submitter.submit(payload, options);

    expect(result).toEqual({ ok: false, error: 'too busy', attempts: 3 });
    expect(primary.send.mock.calls.length + fallback.send.mock.calls.length).toBe(3);
    expect(fallback.send).toHaveBeenCalledTimes(1);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it('uses the primary transport alone when the budget is one attempt', async () => {
    const primary = transport('web3', async () => {
      throw new SubmissionError('too busy', true);
    });
    const fallback = transport('direct-rpc', async () => 'never');
    const sleep = vi.fn(async () => undefined);
    const submitter = new TransactionSubmitter([primary, fallback], quiet, sleep);

    const result = await submitter.submit(payload, { maxRetries: 1, baseDelayMs: 100 });

    expect(result).toEqual({ ok: false, error: 'too busy', attempts: 1 });
    expect(fallback.send).not.toHaveBeenCalled();
    expect(sleep).not.toHaveBeenCalled();
  });

  it('reports an unconfirmed signature without resubmitting', async () => {
    const primary = transport(
      'web3',
      async () => 'sig-pending',
      async () => {
        throw new Error('not confirmed');
      }
    );
    const submitter = new TransactionSubmitter([primary], quiet, vi.fn(async () => undefined));

    const result = await submitter.submit(payload, options);

    expect(result).toMatchObject({ ok: true, signature: 'sig-pending', confirmed: false, attempts: 1 });
    expect(primary.send).toHaveBeenCalledTimes(1);
  });

  it('needs at least one transport', () => {
    expect(() => new TransactionSubmitter([], quiet)).toThrow(
      'TransactionSubmitter needs at least one transport'
    );
  });
});
