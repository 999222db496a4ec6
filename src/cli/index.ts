#!/usr/bin/env node

import { Command } from 'commander';
import { fetchCommand } from './commands/fetch.js';
import { manifestCommand } from './commands/manifest.js';
import { parseNonNegativeInt, parsePositiveInt } from './utils/download-session.js';

const program = new Command();

program
  .name('media-harvest')
  .description('Download media from image sites with per-origin rate limits')
  .version('1.0.0');

function withCommonOptions(command: Command): Command {
  return command
    .option('-r, --root <dir>', 'Download root directory (or set DOWNLOAD_ROOT)')
    .option('-w, --workers <count>', 'Entries launched per group (or set DOWNLOAD_WORKERS)', parsePositiveInt)
    .option('--group-delay <ms>', 'Pause between launch groups (or set DOWNLOAD_GROUP_DELAY_MS)', parseNonNegativeInt)
    .option('--proxy <url>', 'Forward proxy for every request (or set HTTP_PROXY_URL)')
    .option('--failure-log <path>', 'Append failed entries to this CSV file')
    .option('-q, --quiet', 'Only print the summary', false);
}

withCommonOptions(
  program
    .command('fetch [urls...]')
    .description('Parse each URL and download its media; reads stdin until "q" when no URL or input file is given')
    .option('-i, --input <file>', 'File with one URL per line, optionally followed by entry indices')
).action(fetchCommand);

withCommonOptions(
  program
    .command('manifest <file>')
    .description('Download the batches listed in a JSON manifest')
).action(manifestCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
