import { describeError, TransportError, UpstreamStatusError } from '../errors';
import { silentLogger, type Logger } from '../logging/logger';
import { executeWithRetry, type RetryOptions } from './retry';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type HttpMethod = 'GET' | 'POST';

export interface HttpResponse {
  status: number;
  body: string;
}

export type TransportRetryOptions = Pick<RetryOptions, 'maxAttempts' | 'initialDelayMs' | 'backoffFactor' | 'sleep'>;

export interface HttpClientOptions {
  timeoutMs: number;
  fetch?: FetchLike;
  headers?: Record<string, string>;
  retry?: TransportRetryOptions;
  logger?: Logger;
}

export interface HttpClient {
  get(url: string): Promise<HttpResponse>;
  postJson(url: string, payload: unknown): Promise<HttpResponse>;
}

export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([500, 502, 503, 504]);

// One initial attempt plus three retries, waiting 5s, 10s, then 20s.
export const DEFAULT_TRANSPORT_RETRY: Required<Omit<TransportRetryOptions, 'sleep'>> = {
  maxAttempts: 4,
  initialDelayMs: 5000,
  backoffFactor: 2,
};

const BODY_EXCERPT_LENGTH = 500;

export function excerpt(body: string): string {
  return body.length > BODY_EXCERPT_LENGTH ? `${body.slice(0, BODY_EXCERPT_LENGTH)}…` : body;
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

function isRetryable(error: unknown): boolean {
  return error instanceof TransportError || error instanceof UpstreamStatusError;
}

/**
 * Fetch wrapper used for both upstream calls. Transport failures and 5xx
 * responses are retried with growing delays; any other status is returned to
 * the caller as-is.
 */
export function createHttpClient(options: HttpClientOptions): HttpClient {
  const fetchImpl: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));
  const logger = options.logger ?? silentLogger;
  const retry = { ...DEFAULT_TRANSPORT_RETRY, ...options.retry };

  async function attempt(method: HttpMethod, url: string, body: string | undefined): Promise<HttpResponse> {
    const headers: Record<string, string> = { ...options.headers };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    let status: number;
    let text: string;
    try {
      const response = await fetchImpl(url, {
        method,
        headers,
        body,
        signal: AbortSignal.timeout(options.timeoutMs),
      });
      status = response.status;
      text = await response.text();
    } catch (error) {
      const reason = isTimeout(error) ? `timed out after ${options.timeoutMs}ms` : describeError(error);
      throw new TransportError(`${method} ${url} failed: ${reason}`, url, { cause: error });
    }

    if (RETRYABLE_STATUSES.has(status)) {
      throw new UpstreamStatusError(url, status, excerpt(text));
    }
    return { status, body: text };
  }

  function request(method: HttpMethod, url: string, body?: string): Promise<HttpResponse> {
    return executeWithRetry(() => attempt(method, url, body), {
      ...retry,
      shouldRetry: isRetryable,
      onRetry: (attemptNumber, error, nextDelayMs) => {
        logger.warn('http.retry', {
          method,
          url,
          attempt: attemptNumber,
          nextDelayMs,
          error: describeError(error),
        });
      },
    });
  }

  return {
    get: (url) => request('GET', url),
    postJson: (url, payload) => request('POST', url, JSON.stringify(payload)),
  };
}
