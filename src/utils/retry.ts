/**
 * Exponential-backoff retry for profile store I/O.
 */

import { toError } from '../domain/errors/SecurityErrors';
import { sleep } from './async';

export interface RetryOptions {
  /** Retries after the first attempt (default: 3). */
  maxRetries?: number;
  /** Delay before the first retry (default: 50). */
  baseDelayMs?: number;
  /** Upper bound on any single delay (default: 1000). */
  maxDelayMs?: number;
  backoffMultiplier?: number;
  /** Only retry when this returns true. */
  retryOn?: (error: Error) => boolean;
  /** Called before each retry with the 1-based retry number. */
  onRetry?: (error: Error, retry: number, delayMs: number) => void;
  /** Swappable for tests. */
  delay?: (ms: number) => Promise<void>;
}

/**
 * Run `fn`, retrying failures with exponential backoff.
 * Throws the last error once retries are exhausted.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxRetries = options.maxRetries ?? 3;
  const baseDelayMs = options.baseDelayMs ?? 50;
  const maxDelayMs = options.maxDelayMs ?? 1000;
  const backoffMultiplier = options.backoffMultiplier ?? 2;
  const wait = options.delay ?? sleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = toError(error);

      if (attempt >= maxRetries || (options.retryOn && !options.retryOn(lastError))) {
        throw lastError;
      }

      const delay = Math.min(baseDelayMs * Math.pow(backoffMultiplier, attempt), maxDelayMs);
      options.onRetry?.(lastError, attempt + 1, delay);
      await wait(delay);
    }
  }
}
