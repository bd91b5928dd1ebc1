import { describe, it, expect } from 'vitest';
import { withRetry } from './retry';
import { TIMED_OUT, withTimeout } from './async';

function failNTimes<T>(n: number, value: T): () => Promise<T> {
  let count = 0;
  return async () => {
    if (count < n) {
      count++;
      throw new Error(`fail-${count}`);
    }
    return value;
  };
}

describe('withRetry', () => {
  it('backs off exponentially between attempts', async () => {
    const delays: number[] = [];
    const result = await withRetry(failNTimes(2, 'ok'), {
      delay: async ms => {
        delays.push(ms);
      },
    });

    expect(result).toBe('ok');
    expect(delays).toEqual([50, 100]);
  });

  it('caps each delay at maxDelayMs', async () => {
    const delays: number[] = [];
    await withRetry(failNTimes(3, 'ok'), {
      baseDelayMs: 400,
      maxDelayMs: 1000,
      delay: async ms => {
        delays.push(ms);
      },
    });

    expect(delays).toEqual([400, 800, 1000]);
  });

  it('throws the last error once retries are exhausted', async () => {
    let attempts = 0;
    const fn = async () => {
      attempts++;
      throw new Error(`attempt-${attempts}`);
    };

    await expect(withRetry(fn, { delay: async () => {} })).rejects.toThrow('attempt-4');
    expect(attempts).toBe(4);
  });

  it('does not retry when retryOn rejects the error', async () => {
    let attempts = 0;
    const fn = async () => {
      attempts++;
      throw new Error('permanent');
    };

    await expect(withRetry(fn, { retryOn: () => false, delay: async () => {} })).rejects.toThrow('permanent');
    expect(attempts).toBe(1);
  });
});

describe('withTimeout', () => {
  it('returns the value when the promise wins', async () => {
    await expect(withTimeout(Promise.resolve(7), 50)).resolves.toBe(7);
  });

  it('returns TIMED_OUT when the timer wins', async () => {
    const never = new Promise<number>(() => {});
    await expect(withTimeout(never, 5)).resolves.toBe(TIMED_OUT);
  });
});
