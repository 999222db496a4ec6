import fs from 'fs/promises';
import path from 'path';
import type { DownloadFailure } from '../../types/index.js';

export const FAILURE_LOG_HEADER = 'tag,url,phase,message';

export function toCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatFailureRow(failure: Pick<DownloadFailure, 'tag' | 'url' | 'phase' | 'message'>): string {
  return [failure.tag, failure.url, failure.phase, failure.message].map(toCsvField).join(',');
}

/**
 * Appends failed entries to a CSV file so they can be retried later.
 * Rows are buffered and written in batches.
 */
export class FailureLog {
  private readonly logPath: string;
  private buffer: string[] = [];
  private written = 0;
  private readonly batchSize: number;
  private pendingFlush: Promise<void> = Promise.resolve();
  private flushError: unknown = null;

  constructor(logPath: string, batchSize = 50) {
    this.logPath = path.resolve(logPath);
    this.batchSize = batchSize;
  }

  /**
   * Creates the directory and writes the header when the file is new or
   * empty. An existing log is appended to.
   */
  async initialize(): Promise<void> {
    await fs.mkdir(path.dirname(this.logPath), { recursive: true });

    let size = 0;
    try {
      size = (await fs.stat(this.logPath)).size;
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        throw error;
      }
    }
    if (size === 0) {
      await fs.writeFile(this.logPath, `${FAILURE_LOG_HEADER}\n`, 'utf-8');
    }
  }

  record(failure: DownloadFailure): void {
    this.buffer.push(formatFailureRow(failure));
    this.written++;

    if (this.buffer.length >= this.batchSize) {
      // Surfaced by the next flush()
      this.pendingFlush = this.pendingFlush
        .then(() => this.flushBuffer())
        .catch((error: unknown) => {
          if (this.flushError === null) this.flushError = error;
        });
    }
  }

  async flush(): Promise<void> {
    await this.pendingFlush;
    if (this.flushError !== null) {
      const error = this.flushError;
      this.flushError = null;
      throw error;
    }
    await this.flushBuffer();
  }

  getCount(): number {
    return this.written;
  }

  getLogPath(): string {
    return this.logPath;
  }

  private async flushBuffer(): Promise<void> {
    if (this.buffer.length === 0) return;

    const rows = this.buffer.join('\n') + '\n';
    this.buffer = [];
    await fs.appendFile(this.logPath, rows, 'utf-8');
  }
}
