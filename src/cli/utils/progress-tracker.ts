import chalk from 'chalk';
import type { DownloadFailure, DownloadOutcome, DownloadStats } from '../../types/index.js';

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }

  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) {
    return `${seconds}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (minutes < 60) {
    return `${minutes}m ${remainingSeconds}s`;
  }

  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;

  return `${hours}h ${remainingMinutes}m ${remainingSeconds}s`;
}

export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${units[unit]}` : `${value.toFixed(1)} ${units[unit]}`;
}

/**
 * Plain-text end-of-run report; failures are grouped under their tag.
 */
export function formatSummary(stats: DownloadStats, failures: DownloadFailure[], elapsedMs: number): string[] {
  const lines = [
    `Downloaded: ${stats.downloaded} (${formatBytes(stats.bytes)})`,
    `Skipped:    ${stats.skipped}`,
    `Failed:     ${failures.length}`,
    `Time:       ${formatDuration(elapsedMs)}`,
  ];

  const byTag = new Map<string, DownloadFailure[]>();
  for (const failure of failures) {
    const group = byTag.get(failure.tag) ?? [];
    group.push(failure);
    byTag.set(failure.tag, group);
  }

  for (const [tag, group] of byTag) {
    lines.push(`${tag}`);
    for (const failure of group) {
      lines.push(`  [${failure.phase}] ${failure.url}: ${failure.message}`);
    }
  }
  return lines;
}

/**
 * Console progress for a CLI run. Expected totals grow as batches are
 * submitted.
 */
export class ProgressTracker {
  private total: number = 0;
  private processed: number = 0;
  private startTime: number = 0;
  private readonly quiet: boolean;

  constructor(options: { quiet?: boolean } = {}) {
    this.quiet = options.quiet ?? false;
  }

  start(): void {
    this.total = 0;
    this.processed = 0;
    this.startTime = Date.now();
  }

  expect(count: number): void {
    this.total += count;
  }

  record(outcome: DownloadOutcome, tag: string): void {
    this.processed++;
    if (this.quiet) return;

    const marker = outcome.status === 'downloaded'
      ? chalk.green('✓')
      : outcome.status === 'skipped'
        ? chalk.gray('•')
        : chalk.red('✗');

    console.log(
      `${this.createProgressBar()} ${this.processed}/${this.total} ${marker} ` +
      chalk.gray(`${tag} → ${outcome.path}`)
    );
  }

  getElapsed(): number {
    return Date.now() - this.startTime;
  }

  finish(stats: DownloadStats, failures: DownloadFailure[]): void {
    const [downloaded, skipped, failed, time, ...details] = formatSummary(stats, failures, this.getElapsed());

    console.log(chalk.bold('\nSummary'));
    console.log(chalk.green(`   ${downloaded}`));
    console.log(chalk.gray(`   ${skipped}`));
    console.log((failures.length > 0 ? chalk.red : chalk.gray)(`   ${failed}`));
    console.log(chalk.gray(`   ${time}`));

    if (details.length > 0) {
      console.log(chalk.red('\nFailed entries:'));
      for (const line of details) {
        console.log(line.startsWith('  ') ? chalk.red(`   ${line}`) : chalk.yellow(`   ${line}`));
      }
    }
  }

  private createProgressBar(): string {
    const width = 20;
    const ratio = this.total > 0 ? Math.min(1, this.processed / this.total) : 0;
    const filled = Math.round(ratio * width);

    return `[${chalk.green('█'.repeat(filled))}${chalk.gray('░'.repeat(width - filled))}]`;
  }
}
