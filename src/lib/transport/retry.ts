import { debugHttp } from '../utils/debug.js';

/**
 * Retry configuration for outbound requests
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries: number;
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs: number;
  /** Backoff multiplier (default: 2) */
  backoffFactor: number;
  /** Jitter percentage 0-1 (default: 0.1) */
  jitterPercent: number;
  /** Respect Retry-After header (default: true) */
  respectRetryAfter: boolean;
  /** Decides whether a failure is worth another attempt (default: isRetryableError) */
  shouldRetry?: (error: unknown) => boolean;
  /** Aborts the pending delay and stops retrying */
  signal?: AbortSignal;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  backoffFactor: 2,
  jitterPercent: 0.1,
  respectRetryAfter: true,
};

const RETRYABLE_STATUS_CODES = new Set([
  408, // Request Timeout
  429, // Too Many Requests
  500,
  502,
  503,
  504,
]);

const RETRYABLE_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

function readProperty(error: unknown, key: string): unknown {
  if (error && typeof error === 'object' && key in error) {
    return Reflect.get(error, key);
  }
  return undefined;
}

/**
 * Network failures and 408/429/5xx responses are worth retrying
 */
export function isRetryableError(error: unknown): boolean {
  const code = readProperty(error, 'code');
  if (typeof code === 'string' && RETRYABLE_ERROR_CODES.has(code)) {
    return true;
  }

  const statusCode = readProperty(error, 'statusCode');
  if (typeof statusCode === 'number' && RETRYABLE_STATUS_CODES.has(statusCode)) {
    return true;
  }

  return false;
}

/**
 * Extract Retry-After header value in milliseconds
 */
export function getRetryAfterMs(headers: Record<string, string | string[] | undefined>): number | null {
  const retryAfter = headers['retry-after'];
  if (!retryAfter) return null;

  const value = Array.isArray(retryAfter) ? retryAfter[0] : retryAfter;
  if (!value) return null;

  const seconds = parseInt(value, 10);
  if (!isNaN(seconds)) {
    return seconds * 1000;
  }

  const date = new Date(value);
  if (!isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - Date.now());
  }

  return null;
}

/**
 * Calculate retry delay with exponential backoff and jitter
 */
export function calculateRetryDelay(
  attempt: number,
  config: RetryConfig,
  retryAfterMs?: number | null,
): number {
  if (config.respectRetryAfter && retryAfterMs !== null && retryAfterMs !== undefined) {
    return Math.min(retryAfterMs, config.maxDelayMs);
  }

  const exponentialDelay = config.baseDelayMs * Math.pow(config.backoffFactor, attempt);
  const jitter = exponentialDelay * config.jitterPercent * (Math.random() * 2 - 1);

  return Math.min(Math.max(exponentialDelay + jitter, 0), config.maxDelayMs);
}

/**
 * Sleep for `ms`; rejects with the signal's reason as soon as it aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(abortReason(signal));
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function abortReason(signal: AbortSignal | undefined): unknown {
  return signal?.reason ?? new Error('Operation aborted');
}

/**
 * Retry wrapper for async functions
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  config: Partial<RetryConfig> = {},
  context?: string,
): Promise<T> {
  const finalConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  const shouldRetry = finalConfig.shouldRetry ?? isRetryableError;
  const label = context || 'operation';
  let lastError: unknown;

  for (let attempt = 0; attempt <= finalConfig.maxRetries; attempt++) {
    try {
      const result = await operation();

      if (attempt > 0) {
        debugHttp('Retry %s succeeded on attempt %d/%d', label, attempt + 1, finalConfig.maxRetries + 1);
      }

      return result;
    } catch (error) {
      lastError = error;

      if (attempt === finalConfig.maxRetries) {
        break;
      }

      if (!shouldRetry(error)) {
        debugHttp(
          'Retry %s: non-retryable error on attempt %d: %s',
          label,
          attempt + 1,
          error instanceof Error ? error.message : String(error),
        );
        throw error;
      }

      const headers = readProperty(error, 'headers');
      const retryAfterMs = isHeaderRecord(headers) ? getRetryAfterMs(headers) : null;
      const delayMs = calculateRetryDelay(attempt, finalConfig, retryAfterMs);

      debugHttp(
        'Retry %s: attempt %d/%d failed, retrying in %dms. Error: %s',
        label,
        attempt + 1,
        finalConfig.maxRetries + 1,
        delayMs,
        error instanceof Error ? error.message : String(error),
      );

      await sleep(delayMs, finalConfig.signal);
    }
  }

  debugHttp('Retry %s: all %d attempts failed', label, finalConfig.maxRetries + 1);

  throw lastError;
}

function isHeaderRecord(value: unknown): value is Record<string, string | string[] | undefined> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
