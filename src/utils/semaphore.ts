/**
 * Counting semaphore bounding how many blame subprocesses run at once.
 *
 * Waiters are served in FIFO order. A release hands the permit straight to
 * the oldest waiter, so `inUse` never dips while others are queued and a
 * late `acquire` cannot jump the line.
 */

interface Waiter {
  resolve: () => void;
  reject: (reason: unknown) => void;
  cleanup: () => void;
}

export class Semaphore {
  private active = 0;
  private readonly waiters: Waiter[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
  }

  get inUse(): number {
    return this.active;
  }

  get available(): number {
    return this.capacity - this.active;
  }

  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Waits for a permit. Rejects with the signal's reason if `signal` aborts
   * before the permit is granted; an aborted waiter never holds a permit.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }
    if (this.active < this.capacity && this.waiters.length === 0) {
      this.active += 1;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        reject(signal?.reason);
      };
      const waiter: Waiter = {
        resolve,
        reject,
        cleanup: () => signal?.removeEventListener('abort', onAbort),
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  release(): void {
    if (this.active === 0) {
      throw new Error('Semaphore released more times than it was acquired');
    }
    const next = this.waiters.shift();
    if (next) {
      // Permit passes to the waiter; the active count is unchanged.
      next.cleanup();
      next.resolve();
      return;
    }
    this.active -= 1;
  }

  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}

/** Capacity-one semaphore for guarding shared maps across awaits. */
export class Mutex {
  private readonly gate = new Semaphore(1);

  runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    return this.gate.run(async () => task());
  }
}
