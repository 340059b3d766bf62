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
  });

  it('should tryAcquire without blocking', () => {
    const mutex = new AsyncMutex();
    const release = mutex.tryAcquire();
    expect(release).not.toBeNull();
    expect(mutex.isLocked).toBe(true);
    expect(mutex.tryAcquire()).toBeNull();

    release?.();
    expect(mutex.isLocked).toBe(false);
  });

  it('should return the result of withLock', async () => {
    const mutex = new AsyncMutex();
    await expect(mutex.withLock(() => 42)).resolves.toBe(42);
    expect(mutex.isLocked).toBe(false);
  });

  it('should release lock even on error in withLock', async () => {
    const mutex = new AsyncMutex();
    await expect(mutex.withLock(async () => {
      throw new Error('fail');
    })).rejects.toThrow('fail');
    expect(mutex.isLocked).toBe(false);
  });

  it('should ignore a second call to the same release function', async () => {
    const mutex = new AsyncMutex();
    const first = await mutex.acquire();
    const waiting = mutex.acquire();
    expect(mutex.queueLength).toBe(1);

    first();
    first();
    const second = await waiting;
    expect(mutex.isLocked).toBe(true);
    second();
    expect(mutex.isLocked).toBe(false);
  });

  it('should never run two withLock bodies at once', async () => {
    const mutex = new AsyncMutex();
    let inside = 0;
    let maxInside = 0;

    await Promise.all(Array.from({ length: 20 }, () =>
      mutex.withLock(async () => {
        inside++;
        maxInside = Math.max(maxInside, inside);
        await new Promise(resolve => setTimeout(resolve, 1));
        inside--;
      }),
    ));

    expect(maxInside).toBe(1);
  });
});
