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

  it('should hand the lock to waiters in arrival order', async () => {
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

  it('should not interleave withLock sections', async () => {
    const mutex = new AsyncMutex();
    const log: string[] = [];
    const section = (name: string) => mutex.withLock(async () => {
      log.push(`${name}:start`);
      await new Promise(r => setTimeout(r, 5));
      log.push(`${name}:end`);
      return name;
    });

    const results = await Promise.all([section('a'), section('b')]);
    expect(results).toEqual(['a', 'b']);
    expect(log).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('should release lock even on error in withLock', async () => {
    const mutex = new AsyncMutex();
    await expect(mutex.withLock(() => { throw new Error('fail'); })).rejects.toThrow('fail');
    expect(mutex.isLocked).toBe(false);
  });

  it('should report queue length', async () => {
    const mutex = new AsyncMutex();
    const release = await mutex.acquire();

    const p1 = mutex.acquire();
    const p2 = mutex.acquire();
    expect(mutex.queueLength).toBe(2);

    release();
    const r1 = await p1;
    expect(mutex.queueLength).toBe(1);
    r1();
    const r2 = await p2;
    r2();
    expect(mutex.isLocked).toBe(false);
  });

  it('should ignore a second call to the same release', async () => {
    const mutex = new AsyncMutex();
    const release = await mutex.acquire();
    release();
    release();
    expect(mutex.isLocked).toBe(false);
  });
});
