import { describe, it, expect } from 'vitest';
import { AsyncSemaphore } from '../../../src/core/mutex.js';

describe('AsyncSemaphore', () => {
  it('should allow up to N concurrent holders', async () => {
    const sem = new AsyncSemaphore(2);
    expect(sem.available).toBe(2);
    expect(sem.max).toBe(2);

    const r1 = await sem.acquire();
    const r2 = await sem.acquire();
    expect(sem.available).toBe(0);

    let third = false;
    const p3 = sem.acquire().then(release => {
      third = true;
      return release;
    });

    await new Promise(r => setTimeout(r, 0));
    expect(third).toBe(false);
    expect(sem.waiting).toBe(1);

    r1();
    const r3 = await p3;
    expect(third).toBe(true);
    expect(sem.available).toBe(0);

    r2();
    r3();
    expect(sem.available).toBe(2);
  });

  it('should serve waiters in FIFO order', async () => {
    const sem = new AsyncSemaphore(1);
    const order: number[] = [];
    const first = await sem.acquire();

    const waiters = [1, 2, 3].map(n =>
      sem.acquire().then(release => {
        order.push(n);
        release();
      }),
    );

    first();
    await Promise.all(waiters);
    expect(order).toEqual([1, 2, 3]);
    expect(sem.available).toBe(1);
  });

  it('should treat release as idempotent', async () => {
    const sem = new AsyncSemaphore(1);
    const release = await sem.acquire();
    release();
    release();
    expect(sem.available).toBe(1);
  });

  it('should tryAcquire without blocking', () => {
    const sem = new AsyncSemaphore(1);
    const release = sem.tryAcquire();
    expect(release).not.toBeNull();
    expect(sem.tryAcquire()).toBeNull();
    release?.();
    expect(sem.available).toBe(1);
  });

  it('should release the permit when withPermit throws', async () => {
    const sem = new AsyncSemaphore(1);
    await expect(sem.withPermit(() => { throw new Error('fail'); })).rejects.toThrow('fail');
    expect(sem.available).toBe(1);
    await expect(sem.withPermit(() => 42)).resolves.toBe(42);
  });

  it('should reject immediately on an already aborted signal', async () => {
    const sem = new AsyncSemaphore(1);
    const controller = new AbortController();
    controller.abort(new Error('gone'));
    await expect(sem.acquire(controller.signal)).rejects.toThrow('gone');
    expect(sem.available).toBe(1);
  });

  it('should drop an aborted waiter from the queue', async () => {
    const sem = new AsyncSemaphore(1);
    const held = await sem.acquire();
    const controller = new AbortController();

    const aborted = sem.acquire(controller.signal);
    const next = sem.acquire();
    await new Promise(r => setTimeout(r, 0));
    expect(sem.waiting).toBe(2);

    controller.abort(new Error('timed out'));
    await expect(aborted).rejects.toThrow('timed out');
    expect(sem.waiting).toBe(1);

    held();
    const release = await next;
    expect(sem.available).toBe(0);
    release();
    expect(sem.available).toBe(1);
  });

  it('should reject construction with no permits', () => {
    expect(() => new AsyncSemaphore(0)).toThrow('Semaphore must have at least 1 permit');
  });
});
