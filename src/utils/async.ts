/**
 * Timer helpers for the hot path. Every timer started here is cleared
 * before the returned promise settles.
 */

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export const TIMED_OUT: unique symbol = Symbol('timed-out');

/**
 * Race a promise against a timer. Resolves to TIMED_OUT when the timer wins;
 * the original promise keeps running and its late result is discarded.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T | typeof TIMED_OUT> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<typeof TIMED_OUT>(resolve => {
    timer = setTimeout(() => resolve(TIMED_OUT), ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
