/**
 * Transaction submission with retry, backoff and a fallback path.
 *
 * `maxRetries` bounds the send attempts across every transport, with
 * `baseDelayMs * 2^attempt` between them. The primary transport takes the
 * early attempts and each fallback gets one of the last ones. Confirmation is
 * polled once a send is accepted; a confirmation failure is reported, never
 * resubmitted.
 */

import { Logger, toErrorMessage } from '../../core/logger.js';
import { SubmissionError } from '../errors.js';
import type { TransactionTransport } from './transports.js';

export interface SubmitOptions {
  maxRetries: number;
  baseDelayMs: number;
}

export type SubmissionResult =
  | { ok: true; signature: string; confirmed: boolean; attempts: number; path: string }
  | { ok: false; error: string; attempts: number };

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class TransactionSubmitter {
  private logger: Logger;

  constructor(
    private transports: TransactionTransport[],
    logger?: Logger,
    private sleep: Sleep = defaultSleep
  ) {
    if (transports.length === 0) {
      throw new Error('TransactionSubmitter needs at least one transport');
    }
    this.logger = logger ?? new Logger('info', 'submitter');
  }

  async submit(payload: Uint8Array, options: SubmitOptions): Promise<SubmissionResult> {
    const maxRetries = Math.max(1, options.maxRetries);
    let lastError = 'No submission attempted';

    for (let attempt = 0; attempt < maxRetries; attempt += 1) {
      const transport = this.transportFor(attempt, maxRetries);
      const attempts = attempt + 1;
      try {
        const signature = await transport.send(payload);
        this.logger.info(`Submitted via ${transport.name}: ${signature}`);
        const confirmed = await this.confirm(transport, signature);
        return { ok: true, signature, confirmed, attempts, path: transport.name };
      } catch (error) {
        lastError = toErrorMessage(error);
        const retryable = error instanceof SubmissionError ? error.retryable : true;
        if (!retryable) {
          this.logger.error(`Submission rejected via ${transport.name}: ${lastError}`);
          return { ok: false, error: lastError, attempts };
        }
        this.logger.warn(
          `Submission attempt ${attempts}/${maxRetries} via ${transport.name} failed: ${lastError}`
        );
        if (attempts < maxRetries) {
          await this.sleep(options.baseDelayMs * 2 ** attempt);
        }
      }
    }

    return { ok: false, error: lastError, attempts: maxRetries };
  }

  private transportFor(attempt: number, maxRetries: number): TransactionTransport {
    const last = this.transports.length - 1;
    const primaryShare = Math.max(1, maxRetries - last);
    const index = Math.min(Math.max(0, attempt - primaryShare + 1), last);
    return this.transports[index];
  }

  private async confirm(transport: TransactionTransport, signature: string): Promise<boolean> {
    try {
      await transport.confirm(signature);
      return true;
    } catch (error) {
      this.logger.warn(`Confirmation of ${signature} failed: ${toErrorMessage(error)}`);
      return false;
    }
  }
}
