/**
 * Resilient Fetch Utility
 *
 * JSON-over-HTTP requests with:
 * - Exponential backoff retry logic with jitter
 * - 429 handling with Retry-After parsing
 * - Timeout via AbortController
 * - Error classification (retryable vs permanent)
 */

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 2) */
  maxRetries: number;
  /** Base delay in milliseconds for exponential backoff (default: 300) */
  baseDelayMs: number;
  /** Maximum delay cap in milliseconds (default: 5000) */
  maxDelayMs: number;
  /** Jitter factor as decimal (0.1 = 10% jitter) (default: 0.1) */
  jitter: number;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs: number;
  /** Custom function to determine if an error/response should trigger retry */
  retryOn?: (error: Error, response?: Response) => boolean;
}

/**
 * Error thrown when a request fails for good
 */
export class ResilientFetchError extends Error {
  readonly url: string;
  readonly attempts: number;
  readonly lastError: Error;
  readonly isRetryable: boolean;
  /** HTTP status code if a response was received */
  readonly statusCode?: number;

  constructor(
    message: string,
    url: string,
    attempts: number,
    lastError: Error,
    statusCode?: number,
    isRetryable: boolean = false
  ) {
    super(message);
    this.name = 'ResilientFetchError';
    this.url = url;
    this.attempts = attempts;
    this.lastError = lastError;
    this.statusCode = statusCode;
    this.isRetryable = isRetryable;
  }
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 2,
  baseDelayMs: 300,
  maxDelayMs: 5000,
  jitter: 0.1,
  timeoutMs: 10000,
};

const RETRYABLE_STATUS_CODES = new Set([
  408, // Request Timeout
  429, // Too Many Requests
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
]);

const NETWORK_ERROR_PATTERNS = [
  'econnreset',
  'econnrefused',
  'enotfound',
  'etimedout',
  'epipe',
  'eai_again',
  'ehostunreach',
  'enetunreach',
  'fetch failed',
  'network error',
];

export function isNetworkError(error: Error): boolean {
  const message = error.message.toLowerCase();
  const name = error.name.toLowerCase();
  return NETWORK_ERROR_PATTERNS.some(pattern => message.includes(pattern) || name.includes(pattern));
}

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUS_CODES.has(status);
}

function defaultShouldRetry(error: Error, response?: Response): boolean {
  if (error.name === 'AbortError') {
    return true;
  }
  if (isNetworkError(error)) {
    return true;
  }
  return response !== undefined && isRetryableStatus(response.status);
}

/**
 * Parses a Retry-After header value
 * @returns Delay in milliseconds, or null if absent or unparseable
 */
export function parseRetryAfter(value: string | null, nowMs: number = Date.now()): number | null {
  if (!value) {
    return null;
  }

  const seconds = parseInt(value, 10);
  if (!isNaN(seconds)) {
    return seconds * 1000;
  }

  const date = Date.parse(value);
  if (!isNaN(date)) {
    const delayMs = date - nowMs;
    return delayMs > 0 ? delayMs : null;
  }

  return null;
}

/**
 * Backoff delay for an attempt: min(base * 2^attempt, max), stretched by jitter.
 * A 429 with Retry-After uses the header instead.
 */
export function calculateDelay(
  attempt: number,
  config: RetryConfig,
  response?: Response,
  random: () => number = Math.random
): number {
  const jitterFactor = 1 + random() * config.jitter;

  if (response?.status === 429) {
    const retryAfterMs = parseRetryAfter(response.headers.get('Retry-After'));
    if (retryAfterMs !== null) {
      return Math.min(retryAfterMs * jitterFactor, config.maxDelayMs);
    }
  }

  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt);
  return Math.min(exponentialDelay, config.maxDelayMs) * jitterFactor;
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Performs an HTTP request and parses the JSON body, retrying transient
 * failures with exponential backoff.
 *
 * @example
 * ```typescript
 * const body = await resilientFetch('http://127.0.0.1:8000/latest-session');
 *
 * const answer = await resilientFetch(
 *   'http://127.0.0.1:8000/query',
 *   { method: 'POST', body: JSON.stringify({ query }) },
 *   { maxRetries: 0, timeoutMs: 120000 }
 * );
 * ```
 *
 * @throws ResilientFetchError when the request fails for good
 */
export async function resilientFetch(
  url: string,
  options?: RequestInit,
  config?: Partial<RetryConfig>
): Promise<unknown> {
  const mergedConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  const shouldRetry = mergedConfig.retryOn ?? defaultShouldRetry;

  let lastError: Error = new Error('No attempts made');
  let lastResponse: Response | undefined;

  for (let attempt = 0; attempt <= mergedConfig.maxRetries; attempt++) {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), mergedConfig.timeoutMs);
    lastResponse = undefined;

    const headers = new Headers(options?.headers);
    if (!headers.has('Accept')) {
      headers.set('Accept', 'application/json');
    }
    if (options?.body !== undefined && !headers.has('Content-Type')) {
      headers.set('Content-Type', 'application/json');
    }

    try {
      const response = await fetch(url, {
        ...options,
        headers,
        signal: controller.signal,
      });
      lastResponse = response;

      if (response.ok) {
        const body: unknown = await response.json();
        clearTimeout(timeoutId);
        return body;
      }
      clearTimeout(timeoutId);

      const errorMessage = `HTTP ${response.status}: ${response.statusText}`;
      lastError = new Error(errorMessage);

      if (attempt < mergedConfig.maxRetries && shouldRetry(lastError, response)) {
        await delay(calculateDelay(attempt, mergedConfig, response));
        continue;
      }

      throw new ResilientFetchError(
        `Request failed after ${attempt + 1} attempt(s): ${errorMessage}`,
        url,
        attempt + 1,
        lastError,
        response.status,
        isRetryableStatus(response.status)
      );
    } catch (error) {
      clearTimeout(timeoutId);

      if (error instanceof ResilientFetchError) {
        throw error;
      }

      lastError = error instanceof Error ? error : new Error(String(error));

      if (lastError.name === 'AbortError') {
        lastError = new Error(`Request timed out after ${mergedConfig.timeoutMs}ms`);
        lastError.name = 'AbortError';
      }

      if (attempt < mergedConfig.maxRetries && shouldRetry(lastError, lastResponse)) {
        await delay(calculateDelay(attempt, mergedConfig, lastResponse));
        continue;
      }

      throw new ResilientFetchError(
        `Request failed after ${attempt + 1} attempt(s): ${lastError.message}`,
        url,
        attempt + 1,
        lastError,
        lastResponse?.status,
        isNetworkError(lastError) || lastError.name === 'AbortError'
      );
    }
  }

  throw new ResilientFetchError(
    `Request failed after ${mergedConfig.maxRetries + 1} attempt(s): ${lastError.message}`,
    url,
    mergedConfig.maxRetries + 1,
    lastError,
    lastResponse?.status,
    false
  );
}

export function isResilientFetchError(error: unknown): error is ResilientFetchError {
  return error instanceof ResilientFetchError;
}

export function isTimeoutError(error: unknown): boolean {
  return error instanceof ResilientFetchError && error.lastError.name === 'AbortError';
}
