import fetch, { type Response } from 'node-fetch';

export class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly url: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export interface FetchJsonOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean | undefined>;
  body?: unknown;
  timeoutMs?: number;
  /** Extra attempts after the first one for 429 and 5xx responses */
  maxRetries?: number;
  retryDelayMs?: number;
}

const DEFAULT_TIMEOUT_MS = 15_000;

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export function buildUrl(base: string, query?: FetchJsonOptions['query']): string {
  if (!query) return base;
  const url = new URL(base);
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * GET/POST a JSON endpoint. 429 and 5xx responses and network-level
 * failures (resets, timeouts) are retried with exponential backoff; any other
 * response that is not ok throws HttpError.
 */
export async function fetchJson(url: string, options: FetchJsonOptions = {}): Promise<unknown> {
  const target = buildUrl(url, options.query);
  const maxRetries = options.maxRetries ?? 0;
  const retryDelayMs = options.retryDelayMs ?? 1000;

  for (let attempt = 0; ; attempt += 1) {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    try {
      let response: Response;
      try {
        response = await fetch(target, {
          method: options.method ?? 'GET',
          headers: {
            Accept: 'application/json',
            ...(options.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
            ...options.headers,
          },
          body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
          signal: controller.signal,
        });
      } catch (error) {
        if (attempt < maxRetries) {
          await sleep(retryDelayMs * 2 ** attempt);
          continue;
        }
        throw error;
      }

      if (response.ok) {
        return await response.json();
      }

      if (isRetryableStatus(response.status) && attempt < maxRetries) {
        await sleep(retryDelayMs * 2 ** attempt);
        continue;
      }
      throw new HttpError(`HTTP ${response.status} from ${target}`, response.status, target);
    } finally {
      clearTimeout(timeout);
    }
  }
}
