import type { DownloadError } from '../utils/errors.js';

// ============================================================================
// Download Entries
// ============================================================================

/**
 * Continuation run with the final local path after a successful write.
 * Used e.g. to turn a downloaded frame archive into an animation file.
 */
export type PostProcessFn = (finalPath: string) => void | Promise<void>;

export interface DownloadEntry {
  readonly remoteLocation: string;
  /** Logical filename until the coordinator rewrites it to an absolute path */
  destinationPath: string;
  headers?: Record<string, string>;
  postProcess?: PostProcessFn;
}

export interface DownloadEntryInit {
  url: string;
  filename?: string;
  headers?: Record<string, string>;
  postProcess?: PostProcessFn;
}

export type DownloadOutcome =
  | { status: 'downloaded'; entry: DownloadEntry; path: string; bytes: number }
  | { status: 'skipped'; entry: DownloadEntry; path: string }
  | { status: 'failed'; entry: DownloadEntry; path: string; error: DownloadError };

export type DownloadPhase = 'admission' | 'fetch' | 'write' | 'post-process';

export interface DownloadFailure {
  tag: string;
  url: string;
  path: string;
  phase: DownloadPhase | 'parse';
  message: string;
  at: Date;
}

export interface DownloadStats {
  downloaded: number;
  skipped: number;
  failed: number;
  inFlight: number;
  bytes: number;
}

// ============================================================================
// Batches
// ============================================================================

export interface BatchCounter {
  completed: number;
  total: number;
  failed: number;
}

// ============================================================================
// Rate Limiting
// ============================================================================

export interface OriginLimit {
  /** Max simultaneous in-flight requests to the origin */
  concurrency: number;
  /** Min spacing between the starts of consecutive admitted requests */
  minIntervalMs: number;
}

export type RateLimitTable = Record<string, OriginLimit>;

export interface OriginStateSnapshot extends OriginLimit {
  origin: string;
  inFlight: number;
  waiting: number;
  lastAdmittedAt: number | null;
}

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

// ============================================================================
// Fetching
// ============================================================================

export interface FetchRequestOptions {
  headers: Record<string, string>;
  signal?: AbortSignal;
}

// ============================================================================
// Parsing
// ============================================================================

export interface ParseResult {
  entries: DownloadEntry[];
  sourceUrl: string;
  subDirectory?: string;
  headers?: Record<string, string>;
  artist?: string;
  tags?: Record<string, string[]>;
  metadata: Record<string, unknown>;
}

// ============================================================================
// Configuration
// ============================================================================

export interface DownloadConfig {
  rootDir: string;
  workerCount: number;
  groupDelayMs: number;
  batchPollIntervalMs: number;
  fetchTimeoutMs: number;
  proxyUrl?: string;
  defaultHeaders: Record<string, string>;
}

export interface RateLimitConfig {
  defaultLimit: OriginLimit;
  origins: RateLimitTable;
  /** 0 waits forever */
  admissionTimeoutMs: number;
  sourceFile?: string;
}

export interface ObservabilityConfig {
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';
}

export interface AppConfig {
  environment: 'development' | 'production' | 'test';
  download: DownloadConfig;
  rateLimit: RateLimitConfig;
  observability: ObservabilityConfig;
}
