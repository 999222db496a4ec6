export * from './types/index.js';
export * from './utils/errors.js';
export { createDownloadEntry, filenameFromUrl } from './utils/download-entry.js';
export { Semaphore } from './utils/semaphore.js';
export { systemClock } from './utils/clock.js';
export { loadConfig, loadRateLimitTable, appConfig } from './config/index.js';
export { ManifestSchema, RateLimitTableSchema } from './utils/validation.js';
export type { ManifestInput, ManifestBatchInput, ManifestEntryInput } from './utils/validation.js';
export { logger, createContextLogger } from './observability/logger.js';
export type { Logger, LogContext } from './observability/logger.js';

export type { IMediaFetcher, FetchedMedia } from './interfaces/media-fetcher.interface.js';
export { UndiciMediaFetcher } from './services/undici-media-fetcher.js';
export type { UndiciMediaFetcherOptions } from './services/undici-media-fetcher.js';
export { RateLimiter, RateLimitToken } from './services/rate-limiter.js';
export type { RateLimiterOptions, AcquireOptions } from './services/rate-limiter.js';
export { BatchTracker } from './services/batch-tracker.js';
export type { BatchTrackerOptions, DrainOptions } from './services/batch-tracker.js';
export { DownloadCoordinator } from './services/download-coordinator.js';
export type { DownloadCoordinatorOptions, OutcomeListener } from './services/download-coordinator.js';
export { createDownloader, createMediaFetcher } from './factories/downloader.factory.js';
export type { Downloader, CreateDownloaderOptions } from './factories/downloader.factory.js';

export { ParserRegistry, SiteParser, DirectMediaParser, MEDIA_EXTENSIONS, createDefaultRegistry } from './parsers/index.js';
