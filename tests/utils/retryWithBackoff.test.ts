import { describe, expect, it } from 'vitest';
import { retryWithBackoff } from '@/utils/retryWithBackoff';

describe('retryWithBackoff', () => {
  it('retries until the call succeeds', async () => {
    let attempts = 0;
    const result = await retryWithBackoff(
      async () => {
        attempts++;
        if (attempts < 3) throw new Error('flaky');
        return 'done';
      },
      { maxRetries: 3, initialDelay: 1, jitter: false },
    );

    expect(result).toBe('done');
    expect(attempts).toBe(3);
  });

  it('gives up after maxRetries', async () => {
    let attempts = 0;
    const run = retryWithBackoff(
      async () => {
        attempts++;
        throw new Error('still down');
      },
      { maxRetries: 2, initialDelay: 1, jitter: false },
    );

    await expect(run).rejects.toThrow('still down');
    expect(attempts).toBe(3);
  });

  it('stops at once when shouldRetry says no', async () => {
    let attempts = 0;
    const run = retryWithBackoff(
      async () => {
        attempts++;
        throw new Error('bad request');
      },
      { maxRetries: 5, initialDelay: 1, shouldRetry: () => false },
    );

    await expect(run).rejects.toThrow('bad request');
    expect(attempts).toBe(1);
  });
});

describe('retryWithBackoff with a signal', () => {
  it('does not retry once the signal is aborted', async () => {
    const controller = new AbortController();
    let attempts = 0;
    const run = retryWithBackoff(
      async () => {
        attempts++;
        controller.abort();
        throw new Error('aborted mid-call');
      },
      { maxRetries: 3, initialDelay: 1, signal: controller.signal },
    );

    await expect(run).rejects.toThrow('aborted mid-call');
    expect(attempts).toBe(1);
  });
});
