/**
 * Async concurrency primitives.
 *
 * AsyncSemaphore bounds how many callers may use a shared resource at once.
 * Waiters are served in FIFO order and may give up through an AbortSignal.
 */

interface Waiter {
  grant: () => void;
}

export class AsyncSemaphore {
  private permits: number;
  private readonly maxPermits: number;
  private queue: Waiter[] = [];

  constructor(maxPermits: number) {
    if (maxPermits < 1) throw new Error('Semaphore must have at least 1 permit');
    this.maxPermits = maxPermits;
    this.permits = maxPermits;
  }

  /**
   * Acquire a permit. Waits if none available; rejects with the signal's
   * reason if it aborts before a permit is granted.
   */
  async acquire(signal?: AbortSignal): Promise<() => void> {
    signal?.throwIfAborted();

    if (this.permits > 0) {
      this.permits--;
      return this.createRelease();
    }

    return new Promise<() => void>((resolve, reject) => {
      let settled = false;
      const onAbort = (): void => {
        if (settled) return;
        settled = true;
        this.queue = this.queue.filter(w => w !== waiter);
        reject(signal?.reason);
      };
      const waiter: Waiter = {
        grant: () => {
          if (settled) {
            // Aborted after being dequeued: pass the permit along
            this.createRelease()();
            return;
          }
          settled = true;
          signal?.removeEventListener('abort', onAbort);
          resolve(this.createRelease());
        },
      };
      this.queue.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  tryAcquire(): (() => void) | null {
    if (this.permits > 0) {
      this.permits--;
      return this.createRelease();
    }
    return null;
  }

  /**
   * Run a function while holding a permit.
   */
  async withPermit<T>(fn: () => T | Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get available(): number {
    return this.permits;
  }

  get waiting(): number {
    return this.queue.length;
  }

  get max(): number {
    return this.maxPermits;
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return; // Idempotent
      released = true;

      const next = this.queue.shift();
      if (next) {
        // Hand the permit over directly; the count stays the same
        queueMicrotask(next.grant);
      } else {
        this.permits++;
      }
    };
  }
}
