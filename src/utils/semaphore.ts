interface Waiter {
  resolve: () => void;
  cleanup: () => void;
}

/**
 * Counting semaphore with FIFO waiters. A released permit is handed straight
 * to the oldest waiter, so a late caller can never overtake a queued one.
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Waiter[] = [];

  constructor(private readonly permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
    }
    this.available = permits;
  }

  /**
   * Resolves once a permit is held. If `signal` aborts first the caller is
   * dequeued and the promise rejects with the signal's reason.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    if (this.available > 0 && this.waiters.length === 0) {
      this.available--;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index > -1) {
          this.waiters.splice(index, 1);
        }
        reject(signal?.reason);
      };

      const waiter: Waiter = {
        resolve,
        cleanup: () => signal?.removeEventListener('abort', onAbort),
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next.cleanup();
      next.resolve();
      return;
    }

    if (this.available >= this.permits) {
      throw new RangeError('Semaphore released more times than it was acquired');
    }
    this.available++;
  }

  getAvailable(): number {
    return this.available;
  }

  getWaiting(): number {
    return this.waiters.length;
  }

  getPermits(): number {
    return this.permits;
  }
}
