import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import { appConfig } from '../../config/index.js';
import { createDownloader } from '../../factories/downloader.factory.js';
import type { Downloader } from '../../factories/downloader.factory.js';
import type { IMediaFetcher } from '../../interfaces/media-fetcher.interface.js';
import type { AppConfig, DownloadEntry, DownloadFailure, DownloadOutcome } from '../../types/index.js';
import { errorMessage } from '../../utils/errors.js';
import { FailureLog } from './failure-log.js';
import { ProgressTracker } from './progress-tracker.js';

export interface CommonOptions {
  root?: string;
  workers?: number;
  groupDelay?: number;
  proxy?: string;
  failureLog?: string;
  quiet?: boolean;
}

export interface SessionDependencies {
  config?: AppConfig;
  fetcher?: IMediaFetcher;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

/**
 * Command-line flags take precedence over the environment.
 */
export function resolveRunConfig(options: CommonOptions, base: AppConfig = appConfig): AppConfig {
  return {
    ...base,
    download: {
      ...base.download,
      rootDir: options.root ?? base.download.rootDir,
      workerCount: options.workers ?? base.download.workerCount,
      groupDelayMs: options.groupDelay ?? base.download.groupDelayMs,
      proxyUrl: options.proxy ?? base.download.proxyUrl,
    },
  };
}

/**
 * One CLI run: a downloader, console progress and the optional failure log.
 */
export class DownloadSession {
  readonly config: AppConfig;
  private readonly downloader: Downloader;
  private readonly progress: ProgressTracker;
  private readonly failureLog: FailureLog | null;
  private readonly sourceFailures: DownloadFailure[] = [];

  constructor(options: CommonOptions, deps: SessionDependencies = {}) {
    this.config = resolveRunConfig(options, deps.config);
    this.progress = new ProgressTracker({ quiet: options.quiet });
    this.failureLog = options.failureLog ? new FailureLog(options.failureLog) : null;
    this.downloader = createDownloader(this.config, {
      fetcher: deps.fetcher,
      onOutcome: (outcome, tag) => this.handleOutcome(outcome, tag),
    });
  }

  async start(): Promise<void> {
    await this.failureLog?.initialize();
    this.progress.start();
  }

  /**
   * Submits a batch. A batch that cannot be started (e.g. its directory
   * cannot be created) is recorded as one failure instead of rejecting.
   */
  async submit(entries: DownloadEntry[], tag: string, subDirectory?: string, headers?: Record<string, string>): Promise<void> {
    this.progress.expect(entries.length);
    try {
      await this.downloader.coordinator.submit(entries, tag, subDirectory, headers);
    } catch (error) {
      this.progress.expect(-entries.length);
      this.recordSourceFailure(tag, tag, 'write', `Could not start batch: ${errorMessage(error)}`);
    }
  }

  /** Records a source that never produced downloads. */
  recordSourceFailure(tag: string, url: string, phase: DownloadFailure['phase'], message: string): void {
    const failure: DownloadFailure = { tag, url, path: '', phase, message, at: new Date() };
    this.sourceFailures.push(failure);
    this.failureLog?.record(failure);
    console.error(chalk.red(`✗ ${message}`));
  }

  /**
   * Waits for every launched download, prints the summary and returns the
   * failures of the run.
   */
  async finish(): Promise<DownloadFailure[]> {
    const { coordinator, fetcher } = this.downloader;
    try {
      await coordinator.idle();
    } finally {
      await fetcher.close();
    }

    const failures = [...this.sourceFailures, ...coordinator.getFailures()];
    this.progress.finish(coordinator.getStats(), failures);

    if (this.failureLog) {
      await this.failureLog.flush();
      if (this.failureLog.getCount() > 0) {
        console.log(chalk.gray(`\nFailures written to ${this.failureLog.getLogPath()}`));
      }
    }
    return failures;
  }

  private handleOutcome(outcome: DownloadOutcome, tag: string): void {
    this.progress.record(outcome, tag);
    if (outcome.status === 'failed') {
      this.failureLog?.record({
        tag,
        url: outcome.entry.remoteLocation,
        path: outcome.path,
        phase: outcome.error.phase,
        message: outcome.error.message,
        at: new Date(),
      });
    }
  }
}
