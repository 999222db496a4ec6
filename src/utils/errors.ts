import type { DownloadPhase } from '../types/index.js';

/**
 * Failure of a single download entry. Carries the phase it happened in so
 * the end-of-run report can tell fetch problems from disk problems.
 */
export class DownloadError extends Error {
  readonly phase: DownloadPhase;
  readonly url: string;

  constructor(message: string, phase: DownloadPhase, url: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DownloadError';
    this.phase = phase;
    this.url = url;
  }
}

export class HttpStatusError extends DownloadError {
  readonly statusCode: number;

  constructor(statusCode: number, url: string) {
    super(`${url} ${statusCode}`, 'fetch', url);
    this.name = 'HttpStatusError';
    this.statusCode = statusCode;
  }
}

export class FetchTimeoutError extends DownloadError {
  constructor(url: string, timeoutMs: number) {
    super(`Fetch of ${url} timed out after ${timeoutMs}ms`, 'fetch', url);
    this.name = 'FetchTimeoutError';
  }
}

export class AdmissionTimeoutError extends DownloadError {
  readonly origin: string;

  constructor(origin: string, url: string, timeoutMs: number) {
    super(`No slot for ${origin} within ${timeoutMs}ms`, 'admission', url);
    this.name = 'AdmissionTimeoutError';
    this.origin = origin;
  }
}

export class RateLimiterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RateLimiterError';
  }
}

export class BatchTrackerError extends Error {
  readonly tag: string;

  constructor(message: string, tag: string) {
    super(message);
    this.name = 'BatchTrackerError';
    this.tag = tag;
  }
}

export class DrainTimeoutError extends Error {
  readonly tag: string;

  constructor(tag: string, timeoutMs: number) {
    super(`Batch "${tag}" did not drain within ${timeoutMs}ms`);
    this.name = 'DrainTimeoutError';
    this.tag = tag;
  }
}

export class ParseError extends Error {
  readonly reason: string;
  readonly url: string;
  readonly recommendedNames: string[];

  constructor(reason: string, url: string, recommendedNames: string[] = []) {
    super(`${reason}: ${url}`);
    this.name = 'ParseError';
    this.reason = reason;
    this.url = url;
    this.recommendedNames = recommendedNames;
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Matches the reason of an `AbortSignal.timeout()` signal. */
export function isTimeoutAbort(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'TimeoutError';
}
