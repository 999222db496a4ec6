import { createWriteStream } from 'fs';
import { mkdir, rename, rm, stat } from 'fs/promises';
import path from 'path';
import { pipeline } from 'stream/promises';
import type { IMediaFetcher, FetchedMedia } from '../interfaces/media-fetcher.interface.js';
import type {
  Clock,
  DownloadConfig,
  DownloadEntry,
  DownloadFailure,
  DownloadOutcome,
  DownloadPhase,
  DownloadStats,
} from '../types/index.js';
import { systemClock } from '../utils/clock.js';
import {
  DownloadError,
  FetchTimeoutError,
  errorMessage,
} from '../utils/errors.js';
import { createContextLogger } from '../observability/logger.js';
import type { Logger } from '../observability/logger.js';
import type { BatchTracker, DrainOptions } from './batch-tracker.js';
import type { RateLimiter, RateLimitToken } from './rate-limiter.js';

export type OutcomeListener = (outcome: DownloadOutcome, tag: string) => void;

export interface DownloadCoordinatorOptions {
  config: Pick<DownloadConfig, 'rootDir' | 'workerCount' | 'groupDelayMs' | 'fetchTimeoutMs' | 'defaultHeaders'>;
  rateLimiter: RateLimiter;
  tracker: BatchTracker;
  fetcher: IMediaFetcher;
  clock?: Clock;
  logger?: Logger;
  /** Called once per entry after the batch counter was updated */
  onOutcome?: OutcomeListener;
}

async function isNonEmptyFile(filePath: string): Promise<boolean> {
  try {
    const info = await stat(filePath);
    return info.isFile() && info.size > 0;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

function toDownloadError(error: unknown, phase: DownloadPhase, url: string): DownloadError {
  if (error instanceof DownloadError) return error;
  return new DownloadError(errorMessage(error), phase, url, { cause: error });
}

/**
 * Takes batches of entries under a tag and drives each entry through
 * skip-if-exists → admission → fetch → write → post-process, reporting every
 * outcome to the batch tracker so waiters on the tag see it drain.
 */
export class DownloadCoordinator {
  private readonly config: DownloadCoordinatorOptions['config'];
  private readonly rateLimiter: RateLimiter;
  private readonly tracker: BatchTracker;
  private readonly fetcher: IMediaFetcher;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly onOutcome?: OutcomeListener;

  private readonly inFlight = new Set<Promise<DownloadOutcome>>();
  private readonly failures: DownloadFailure[] = [];
  private readonly stats = { downloaded: 0, skipped: 0, failed: 0, bytes: 0 };

  constructor(options: DownloadCoordinatorOptions) {
    this.config = options.config;
    this.rateLimiter = options.rateLimiter;
    this.tracker = options.tracker;
    this.fetcher = options.fetcher;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createContextLogger({ component: 'download-coordinator' });
    this.onOutcome = options.onOutcome;
  }

  /**
   * Queues `entries` under `tag`. Resolves once every entry has been launched,
   * not once they finished; use {@link waitForTagCompletion} for that.
   */
  async submit(
    entries: DownloadEntry[],
    tag: string,
    subDirectory = '',
    headers?: Record<string, string>
  ): Promise<void> {
    const targetDir = path.resolve(this.config.rootDir, subDirectory);
    await mkdir(targetDir, { recursive: true });

    await this.tracker.begin(tag, entries.length);

    for (const entry of entries) {
      entry.destinationPath = path.join(targetDir, entry.destinationPath);
    }

    this.logger.info({ tag, count: entries.length, directory: targetDir }, 'Batch accepted');

    const groupSize = this.config.workerCount;
    for (let start = 0; start < entries.length; start += groupSize) {
      for (const entry of entries.slice(start, start + groupSize)) {
        this.launch(entry, tag, headers);
      }
      if (start + groupSize < entries.length) {
        await this.clock.sleep(this.config.groupDelayMs);
      }
    }
  }

  /**
   * Per-entry worker. Never rejects: every failure becomes a `failed`
   * outcome, and the tag's counter moves exactly once either way.
   */
  async fetchAndStore(entry: DownloadEntry, tag: string, headers?: Record<string, string>): Promise<DownloadOutcome> {
    const outcome = await this.download(entry, headers);
    this.settle(outcome, tag);
    return outcome;
  }

  waitForTagCompletion(tag: string, options?: DrainOptions): Promise<void> {
    return this.tracker.waitForDrain(tag, options);
  }

  /**
   * Resolves when every launched worker has settled, including workers
   * launched while waiting.
   */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  getFailures(): DownloadFailure[] {
    return [...this.failures];
  }

  getStats(): DownloadStats {
    return { ...this.stats, inFlight: this.inFlight.size };
  }

  private launch(entry: DownloadEntry, tag: string, headers?: Record<string, string>): void {
    const task = this.fetchAndStore(entry, tag, headers);
    this.inFlight.add(task);
    task.then(
      () => {
        this.inFlight.delete(task);
      },
      (error: unknown) => {
        this.inFlight.delete(task);
        this.logger.error({ err: error, tag, url: entry.remoteLocation }, 'Download worker crashed');
      }
    );
  }

  private async download(entry: DownloadEntry, headers?: Record<string, string>): Promise<DownloadOutcome> {
    const url = entry.remoteLocation;
    const destination = entry.destinationPath;
    const failed = (error: DownloadError): DownloadOutcome => ({ status: 'failed', entry, path: destination, error });

    if (!URL.canParse(url)) {
      return failed(new DownloadError(`Invalid URL: ${url}`, 'fetch', url));
    }

    try {
      if (await isNonEmptyFile(destination)) {
        return { status: 'skipped', entry, path: destination };
      }
    } catch (error) {
      return failed(toDownloadError(error, 'write', url));
    }

    let token: RateLimitToken;
    try {
      token = await this.rateLimiter.acquire(url);
    } catch (error) {
      return failed(toDownloadError(error, 'admission', url));
    }

    let bytes: number;
    try {
      bytes = await this.transfer(entry, { ...this.config.defaultHeaders, ...headers, ...entry.headers });
    } catch (error) {
      return failed(toDownloadError(error, 'fetch', url));
    } finally {
      this.rateLimiter.release(token);
    }

    if (entry.postProcess) {
      try {
        await entry.postProcess(destination);
      } catch (error) {
        return failed(new DownloadError(
          `Post-processing ${destination} failed: ${errorMessage(error)}`,
          'post-process',
          url,
          { cause: error }
        ));
      }
    }

    return { status: 'downloaded', entry, path: destination, bytes };
  }

  /**
   * Streams the body into `<destination>.part` and renames it into place;
   * the destination path only ever holds a complete transfer.
   */
  private async transfer(entry: DownloadEntry, headers: Record<string, string>): Promise<number> {
    const url = entry.remoteLocation;
    const destination = entry.destinationPath;
    const tempPath = `${destination}.part`;
    const timeoutMs = this.config.fetchTimeoutMs;
    const signal = AbortSignal.timeout(timeoutMs);

    let media: FetchedMedia;
    try {
      media = await this.fetcher.fetch(url, { headers, signal });
    } catch (error) {
      if (signal.aborted) throw new FetchTimeoutError(url, timeoutMs);
      throw toDownloadError(error, 'fetch', url);
    }

    // The side that errors first is where the transfer broke
    let brokenSide: DownloadPhase | undefined;
    const sink = createWriteStream(tempPath);
    media.body.once('error', () => {
      if (brokenSide === undefined) brokenSide = 'fetch';
    });
    sink.once('error', () => {
      if (brokenSide === undefined) brokenSide = 'write';
    });

    try {
      await pipeline(media.body, sink);
      await rename(tempPath, destination);
      const { size } = await stat(destination);
      return size;
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn({ err: cleanupError, path: tempPath }, 'Could not remove partial file');
      });
      if (signal.aborted) throw new FetchTimeoutError(url, timeoutMs);
      const phase: DownloadPhase = brokenSide ?? 'write';
      throw new DownloadError(
        phase === 'fetch'
          ? `Transfer of ${url} broke off: ${errorMessage(error)}`
          : `Could not write ${destination}: ${errorMessage(error)}`,
        phase,
        url,
        { cause: error }
      );
    }
  }

  private settle(outcome: DownloadOutcome, tag: string): void {
    const counter = this.tracker.markOneDone(tag, outcome.status === 'failed');
    const progress = `${counter.completed}/${counter.total}`;
    const url = outcome.entry.remoteLocation;

    switch (outcome.status) {
      case 'downloaded':
        this.stats.downloaded++;
        this.stats.bytes += outcome.bytes;
        this.logger.info({ tag, url, path: outcome.path, bytes: outcome.bytes, progress }, 'Downloaded');
        break;
      case 'skipped':
        this.stats.skipped++;
        this.logger.info({ tag, url, path: outcome.path, progress }, 'Already on disk, skipped');
        break;
      case 'failed':
        this.stats.failed++;
        this.failures.push({
          tag,
          url,
          path: outcome.path,
          phase: outcome.error.phase,
          message: outcome.error.message,
          at: new Date(this.clock.now()),
        });
        this.logger.error({ tag, url, phase: outcome.error.phase, err: outcome.error, progress }, 'Download failed');
        break;
    }

    this.onOutcome?.(outcome, tag);
  }
}
