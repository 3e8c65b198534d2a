/**
 * Retry Logic
 *
 * Configurable retry wrapper with exponential backoff.
 */

import { sleep } from './time.js';

export interface RetryOptions {
  /** May be Infinity when retryIf alone decides */
  maxAttempts: number;
  initialDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
  retryIf?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
  /** Override the backoff delay for a given error, e.g. a server-mandated wait */
  delayFor?: (error: unknown) => number | undefined;
  /** Cuts a pending wait short; the last error is thrown once aborted */
  signal?: AbortSignal;
}

const defaultOptions: RetryOptions = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
};

/**
 * Execute a function with automatic retry on failure
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...defaultOptions, ...options };

  let lastError: unknown;
  let delay = opts.initialDelay;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      // Check if we should retry
      if (opts.retryIf && !opts.retryIf(error)) {
        throw error;
      }

      // Last attempt, throw the error
      if (attempt === opts.maxAttempts) {
        throw error;
      }

      const wait = opts.delayFor?.(error) ?? delay;
      opts.onRetry?.(error, attempt, wait);

      await sleep(wait, opts.signal);
      if (opts.signal?.aborted) {
        throw error;
      }

      // Calculate next delay with exponential backoff
      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelay);
    }
  }

  throw lastError;
}
