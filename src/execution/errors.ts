/**
 * A submission attempt failed. `retryable` separates transient transport
 * trouble from rejections that would fail again unchanged.
 */
export class SubmissionError extends Error {
  constructor(
    message: string,
    public readonly retryable: boolean
  ) {
    super(message);
    this.name = 'SubmissionError';
  }
}

const TRANSIENT_PATTERNS = [
  /timeout/i,
  /timed out/i,
  /rate limit/i,
  /too many requests/i,
  /too busy/i,
  /blockhash/i,
];

export function isTransientMessage(message: string): boolean {
  return TRANSIENT_PATTERNS.some((pattern) => pattern.test(message));
}
