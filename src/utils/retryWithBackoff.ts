// Exponential backoff with jitter for flaky model endpoints.
import { logger } from '@/utils/logger';

export interface RetryOptions {
  /** Retries after the first attempt. */
  maxRetries?: number;
  initialDelay?: number;
  maxDelay?: number;
  jitter?: boolean;
  /** Return false to rethrow immediately. */
  shouldRetry?: (error: unknown) => boolean;
  /** An aborted signal stops retrying and cuts the current wait short. */
  signal?: AbortSignal;
}

function backoffDelay(attempt: number, initialDelay: number, maxDelay: number, jitter: boolean): number {
  const base = initialDelay * 2 ** attempt;
  // up to +25%
  const spread = jitter ? Math.random() * 0.25 * base : 0;
  return Math.min(base + spread, maxDelay);
}

function wait(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxRetries = 3, initialDelay = 100, maxDelay = 5000, jitter = true, shouldRetry = () => true, signal } =
    options;

  let attempt = 0;
  while (true) {
    try {
      return await fn();
    } catch (error) {
      const retryable = attempt < maxRetries && !signal?.aborted && shouldRetry(error);
      if (!retryable) throw error;

      const delayMs = backoffDelay(attempt, initialDelay, maxDelay, jitter);
      attempt++;
      logger.debug('retry:attempt', { attempt, maxRetries, delayMs: Math.round(delayMs) });
      await wait(delayMs, signal);
    }
  }
}
