import { describe, it, expect } from 'vitest';
import { Semaphore } from '../src/utils/semaphore.js';

describe('Semaphore', () => {
  it('rejects a permit count below one', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
  });

  it('hands permits to waiters in arrival order', async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];

    await semaphore.acquire();
    const first = semaphore.acquire().then(() => order.push('first'));
    const second = semaphore.acquire().then(() => order.push('second'));
    expect(semaphore.getWaiting()).toBe(2);

    semaphore.release();
    await first;
    semaphore.release();
    await second;

    expect(order).toEqual(['first', 'second']);
    expect(semaphore.getAvailable()).toBe(0);
  });

  it('throws when released more often than acquired', () => {
    const semaphore = new Semaphore(2);
    expect(() => semaphore.release()).toThrow(RangeError);
  });

  it('dequeues a waiter whose signal aborts', async () => {
    const semaphore = new Semaphore(1);
    await semaphore.acquire();

    const controller = new AbortController();
    const waiting = semaphore.acquire(controller.signal);
    controller.abort(new Error('gave up'));

    await expect(waiting).rejects.toThrow('gave up');
    expect(semaphore.getWaiting()).toBe(0);

    semaphore.release();
    expect(semaphore.getAvailable()).toBe(1);
  });

  it('rejects at once with an already aborted signal', async () => {
    const semaphore = new Semaphore(1);
    await expect(semaphore.acquire(AbortSignal.abort(new Error('stop')))).rejects.toThrow('stop');
    expect(semaphore.getAvailable()).toBe(1);
  });
});
