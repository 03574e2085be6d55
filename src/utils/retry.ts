import { getLogger } from '../core/logger.js';

export interface RetryOptions {
  maxRetries: number;
  baseDelay: number;
  maxDelay: number;
  backoffFactor: number;
  /** Decides whether a failure is worth another attempt; everything is retried when omitted. */
  retryable?: (error: Error) => boolean;
  onRetry?: (attempt: number, error: Error) => void;
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelay: 1000,
  maxDelay: 30000,
  backoffFactor: 2,
};

/**
 * Retry a function with exponential backoff and jitter
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const logger = getLogger();
  let lastError: Error = new Error('retry: no attempts made');

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt === opts.maxRetries) break;
      if (opts.retryable && !opts.retryable(lastError)) break;
      if (opts.signal?.aborted) break;

      const delay = Math.min(
        opts.baseDelay * Math.pow(opts.backoffFactor, attempt) + Math.random() * opts.baseDelay,
        opts.maxDelay,
      );

      logger.debug({ attempt: attempt + 1, delay, error: lastError.message }, 'Retrying after error');
      opts.onRetry?.(attempt + 1, lastError);

      await sleep(delay, opts.signal);
    }
  }

  throw lastError;
}

/**
 * Sleep for a given number of milliseconds; resolves early when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

export type RaceOutcome<T> =
  | { kind: 'value'; value: T }
  | { kind: 'error'; error: Error }
  | { kind: 'timeout' }
  | { kind: 'aborted' };

/**
 * Settle a promise against a timeout and an abort signal without rejecting.
 * Timers and listeners are always released.
 */
export function settleWithin<T>(promise: Promise<T>, ms: number, signal?: AbortSignal): Promise<RaceOutcome<T>> {
  return new Promise<RaceOutcome<T>>(resolve => {
    let settled = false;

    const finish = (outcome: RaceOutcome<T>): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      resolve(outcome);
    };
    const onAbort = (): void => finish({ kind: 'aborted' });
    const timer = setTimeout(() => finish({ kind: 'timeout' }), ms);

    // Attached first so a late rejection is always observed.
    promise.then(
      value => finish({ kind: 'value', value }),
      (err: unknown) => finish({ kind: 'error', error: err instanceof Error ? err : new Error(String(err)) }),
    );

    if (signal?.aborted) {
      finish({ kind: 'aborted' });
      return;
    }
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
