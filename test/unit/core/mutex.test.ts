import { describe, it, expect } from 'vitest';
import { AsyncMutex } from '../../../src/core/mutex.js';

describe('AsyncMutex', () => {
  it('should acquire and release lock', async () => {
    const mutex = new AsyncMutex();
    expect(mutex.isLocked).toBe(false);

    const release = await mutex.acquire();
    expect(mutex.isLocked).toBe(true);

    release();
    expect(mutex.isLocked).toBe(false);
  });

  it('should serve waiters in FIFO order', async () => {
    const mutex = new AsyncMutex();
    const order: number[] = [];

    const p1 = mutex.acquire().then(release => {
      order.push(1);
      setTimeout(release, 10);
    });
    const p2 = mutex.acquire().then(release => {
      order.push(2);
      release();
    });
    const p3 = mutex.acquire().then(release => {
      order.push(3);
      release();
    });

    await Promise.all([p1, p2, p3]);
    expect(order).toEqual([1, 2, 3]);
    expect(mutex.isLocked).toBe(false);
  });

  it('should report pending waiters', async () => {
    const mutex = new AsyncMutex();
    const release = await mutex.acquire();
    const waiting = mutex.acquire();

    expect(mutex.pending).toBe(1);
    release();
    const next = await waiting;
    expect(mutex.pending).toBe(0);
    expect(mutex.isLocked).toBe(true);
    next();
    expect(mutex.isLocked).toBe(false);
  });

  it('should treat a second release as a no-op', async () => {
    const mutex = new AsyncMutex();
    const first = await mutex.acquire();
    first();
    const second = await mutex.acquire();
    first();
    expect(mutex.isLocked).toBe(true);
    second();
  });

  it('should release the lock when withLock throws', async () => {
    const mutex = new AsyncMutex();
    await expect(mutex.withLock(() => { throw new Error('fail'); })).rejects.toThrow('fail');
    expect(mutex.isLocked).toBe(false);
  });

  it('should keep check-then-append sections from interleaving', async () => {
    const mutex = new AsyncMutex();
    const seen = new Set<string>();
    const appended: string[] = [];

    const append = (key: string) => mutex.withLock(async () => {
      if (seen.has(key)) return;
      await new Promise(r => setTimeout(r, 5));
      seen.add(key);
      appended.push(key);
    });

    await Promise.all([append('run-1'), append('run-1'), append('run-2'), append('run-1')]);
    expect(appended).toEqual(['run-1', 'run-2']);
  });
});
