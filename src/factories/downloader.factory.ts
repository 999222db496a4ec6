import type { IMediaFetcher } from '../interfaces/media-fetcher.interface.js';
import type { AppConfig, Clock, DownloadConfig } from '../types/index.js';
import { BatchTracker } from '../services/batch-tracker.js';
import { DownloadCoordinator } from '../services/download-coordinator.js';
import type { OutcomeListener } from '../services/download-coordinator.js';
import { RateLimiter } from '../services/rate-limiter.js';
import { UndiciMediaFetcher } from '../services/undici-media-fetcher.js';

export interface Downloader {
  coordinator: DownloadCoordinator;
  rateLimiter: RateLimiter;
  tracker: BatchTracker;
  fetcher: IMediaFetcher;
}

export interface CreateDownloaderOptions {
  /** Replaces the undici fetcher, e.g. with an in-process fake */
  fetcher?: IMediaFetcher;
  clock?: Clock;
  onOutcome?: OutcomeListener;
}

export function createMediaFetcher(config: Pick<DownloadConfig, 'proxyUrl'>): IMediaFetcher {
  return new UndiciMediaFetcher({ proxyUrl: config.proxyUrl });
}

/**
 * Wires one rate limiter, one batch tracker and one fetcher into a
 * coordinator. Each call returns an independent set; nothing is shared
 * between downloaders.
 */
export function createDownloader(
  config: Pick<AppConfig, 'download' | 'rateLimit'>,
  options: CreateDownloaderOptions = {}
): Downloader {
  const rateLimiter = new RateLimiter({
    defaultLimit: config.rateLimit.defaultLimit,
    origins: config.rateLimit.origins,
    admissionTimeoutMs: config.rateLimit.admissionTimeoutMs,
    clock: options.clock,
  });
  const tracker = new BatchTracker({
    pollIntervalMs: config.download.batchPollIntervalMs,
    clock: options.clock,
  });
  const fetcher = options.fetcher ?? createMediaFetcher(config.download);
  const coordinator = new DownloadCoordinator({
    config: config.download,
    rateLimiter,
    tracker,
    fetcher,
    clock: options.clock,
    onOutcome: options.onOutcome,
  });

  return { coordinator, rateLimiter, tracker, fetcher };
}
