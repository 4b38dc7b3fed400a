import axios from 'axios';

/**
 * Retry utilities with configurable backoff
 */

export interface RetryOptions {
  maxAttempts?: number;
  initialDelay?: number;
  maxDelay?: number;
  backoffMultiplier?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown) => void;
}

const defaultOptions: Required<RetryOptions> = {
  maxAttempts: 2,
  initialDelay: 500,
  maxDelay: 8000,
  backoffMultiplier: 1,
  shouldRetry: () => true,
  onRetry: () => {},
};

/**
 * Execute a function, retrying failures the predicate accepts.
 * Errors the predicate rejects are rethrown immediately.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...defaultOptions, ...options };
  const maxAttempts = Math.max(1, opts.maxAttempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (!opts.shouldRetry(error)) {
        throw error;
      }

      // No wait after the final attempt
      if (attempt >= maxAttempts) {
        break;
      }

      const delay = Math.min(
        opts.initialDelay * Math.pow(opts.backoffMultiplier, attempt - 1),
        opts.maxDelay
      );

      opts.onRetry(attempt, error);

      await sleep(delay);
    }
  }

  throw lastError;
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Request exceeded its timeout
 */
export function isTimeoutError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) {
    return false;
  }

  return (
    error.code === 'ECONNABORTED' ||
    error.code === 'ETIMEDOUT' ||
    error.message.toLowerCase().includes('timeout')
  );
}

/**
 * Host unreachable, refused or reset the connection
 */
export function isConnectionError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) {
    return false;
  }

  const code = error.code || '';
  return (
    code === 'ECONNREFUSED' ||
    code === 'ECONNRESET' ||
    code === 'ENOTFOUND' ||
    code === 'EAI_AGAIN' ||
    code === 'EHOSTUNREACH' ||
    code === 'ERR_NETWORK' ||
    error.message.toLowerCase().includes('socket hang up')
  );
}
