import type { BatchCounter, Clock } from '../types/index.js';
import { systemClock } from '../utils/clock.js';
import { BatchTrackerError, DrainTimeoutError } from '../utils/errors.js';
import { createContextLogger } from '../observability/logger.js';
import type { Logger } from '../observability/logger.js';

export interface BatchTrackerOptions {
  pollIntervalMs: number;
  clock?: Clock;
  logger?: Logger;
}

export interface DrainOptions {
  timeoutMs?: number;
}

/**
 * Tag → (completed, total) counters. A tag's record exists exactly while its
 * batch is open; removal on the last completion is the drain signal.
 */
export class BatchTracker {
  private readonly counters = new Map<string, BatchCounter>();
  private readonly pollIntervalMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: BatchTrackerOptions) {
    this.pollIntervalMs = options.pollIntervalMs;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createContextLogger({ component: 'batch-tracker' });
  }

  /**
   * Opens a batch under `tag`, waiting for any previous batch under the same
   * tag to drain first. A batch of zero entries is drained on arrival and
   * never opens.
   */
  async begin(tag: string, total: number): Promise<void> {
    if (!Number.isInteger(total) || total < 0) {
      throw new BatchTrackerError(`Invalid batch size ${total}`, tag);
    }

    if (this.counters.has(tag)) {
      this.logger.debug({ tag }, 'Tag busy, waiting for previous batch to drain');
    }
    while (this.counters.has(tag)) {
      await this.clock.sleep(this.pollIntervalMs);
    }

    if (total === 0) return;
    this.counters.set(tag, { completed: 0, total, failed: 0 });
  }

  markOneDone(tag: string, failed = false): BatchCounter {
    const counter = this.counters.get(tag);
    if (!counter) {
      throw new BatchTrackerError(`No open batch under tag "${tag}"`, tag);
    }

    const next: BatchCounter = {
      completed: counter.completed + 1,
      total: counter.total,
      failed: counter.failed + (failed ? 1 : 0),
    };

    if (next.completed === next.total) {
      this.counters.delete(tag);
      this.logger.debug({ tag, ...next }, 'Batch drained');
    } else {
      this.counters.set(tag, next);
    }
    return next;
  }

  isOpen(tag: string): boolean {
    return this.counters.has(tag);
  }

  getCounter(tag: string): BatchCounter | undefined {
    const counter = this.counters.get(tag);
    return counter ? { ...counter } : undefined;
  }

  openTags(): string[] {
    return [...this.counters.keys()];
  }

  async waitForDrain(tag: string, options: DrainOptions = {}): Promise<void> {
    const deadline = options.timeoutMs !== undefined ? this.clock.now() + options.timeoutMs : null;

    while (this.counters.has(tag)) {
      if (deadline !== null && this.clock.now() >= deadline) {
        throw new DrainTimeoutError(tag, options.timeoutMs ?? 0);
      }
      await this.clock.sleep(this.pollIntervalMs);
    }
  }
}
