import { describe, it, expect, vi } from 'vitest';
import { retry, settleWithin, sleep } from '../../../src/utils/retry.js';
import { Timer, formatDuration } from '../../../src/utils/timer.js';

describe('retry', () => {
  it('should return the first successful result', async () => {
    const fn = vi.fn(async () => 'ok');
    expect(await retry(fn, { baseDelay: 1 })).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry until success', async () => {
    let calls = 0;
    const onRetry = vi.fn();
    const result = await retry(async () => {
      calls++;
      if (calls < 3) throw new Error(`fail ${calls}`);
      return calls;
    }, { maxRetries: 3, baseDelay: 1, onRetry });

    expect(result).toBe(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenLastCalledWith(2, new Error('fail 2'));
  });

  it('should throw the last error after maxRetries', async () => {
    let calls = 0;
    await expect(retry(async () => {
      calls++;
      throw new Error(`fail ${calls}`);
    }, { maxRetries: 2, baseDelay: 1 })).rejects.toThrow('fail 3');
    expect(calls).toBe(3);
  });

  it('should stop at the first error that is not retryable', async () => {
    let calls = 0;
    await expect(retry(async () => {
      calls++;
      throw new Error('fatal');
    }, { maxRetries: 5, baseDelay: 1, retryable: error => error.message !== 'fatal' })).rejects.toThrow('fatal');
    expect(calls).toBe(1);
  });
});

describe('sleep', () => {
  it('should resolve early when the signal aborts', async () => {
    const controller = new AbortController();
    const timer = new Timer();
    const pending = sleep(5000, controller.signal);
    controller.abort();
    await pending;
    expect(timer.stop()).toBeLessThan(1000);
  });
});

describe('settleWithin', () => {
  it('should report a value', async () => {
    expect(await settleWithin(Promise.resolve(7), 100)).toEqual({ kind: 'value', value: 7 });
  });

  it('should report an error without rejecting', async () => {
    expect(await settleWithin(Promise.reject(new Error('nope')), 100)).toEqual({ kind: 'error', error: new Error('nope') });
  });

  it('should report a timeout', async () => {
    const never = new Promise<number>(() => undefined);
    expect(await settleWithin(never, 10)).toEqual({ kind: 'timeout' });
  });

  it('should report an abort', async () => {
    const controller = new AbortController();
    const never = new Promise<number>(() => undefined);
    const outcome = settleWithin(never, 5000, controller.signal);
    controller.abort();
    expect(await outcome).toEqual({ kind: 'aborted' });
  });

  it('should report an abort that happened before the call', async () => {
    const controller = new AbortController();
    controller.abort();
    expect(await settleWithin(Promise.resolve(1), 100, controller.signal)).toEqual({ kind: 'aborted' });
  });
});

describe('Timer', () => {
  it('should freeze elapsed time once stopped', async () => {
    const timer = new Timer();
    await sleep(5);
    const stopped = timer.stop();
    await sleep(5);
    expect(timer.elapsed).toBe(stopped);
    expect(Number.isInteger(stopped)).toBe(true);
  });
});

describe('formatDuration', () => {
  it('should format milliseconds, seconds and minutes', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(125000)).toBe('2m 5s');
  });
});
