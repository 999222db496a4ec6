import chalk from 'chalk';
import { readFile } from 'fs/promises';
import { createDefaultRegistry } from '../../parsers/index.js';
import type { ParserRegistry } from '../../parsers/index.js';
import type { DownloadFailure, ParseResult } from '../../types/index.js';
import { errorMessage, ParseError } from '../../utils/errors.js';
import { parseInputLine, parseInputLines, readInputLines, selectByIndices } from '../utils/input-parser.js';
import type { InputLine } from '../utils/input-parser.js';
import { DownloadSession } from '../utils/download-session.js';
import type { CommonOptions, SessionDependencies } from '../utils/download-session.js';

export interface FetchOptions extends CommonOptions {
  input?: string;
}

export interface FetchDependencies extends SessionDependencies {
  registry?: ParserRegistry;
}

/**
 * Parses every line and submits its entries with the line's URL as tag.
 * Sources are handled concurrently; lines repeating a URL wait for the
 * earlier batch under that tag.
 */
export async function runFetch(
  lines: InputLine[],
  options: FetchOptions,
  deps: FetchDependencies = {}
): Promise<DownloadFailure[]> {
  const registry = deps.registry ?? createDefaultRegistry();
  const session = new DownloadSession(options, deps);
  await session.start();

  await Promise.all(lines.map(async ({ url, indices }) => {
    let result: ParseResult;
    try {
      result = await registry.parseUrl(url);
    } catch (error) {
      if (error instanceof ParseError && error.recommendedNames.length > 0) {
        session.recordSourceFailure(url, url, 'parse', `${error.message} (known parsers: ${error.recommendedNames.join(', ')})`);
      } else {
        session.recordSourceFailure(url, url, 'parse', errorMessage(error));
      }
      return;
    }

    const entries = selectByIndices(result.entries, indices);
    await session.submit(entries, url, result.subDirectory, result.headers);
  }));

  return session.finish();
}

async function collectLines(urls: string[], options: FetchOptions): Promise<InputLine[]> {
  if (urls.length > 0) {
    return urls.flatMap(url => {
      const line = parseInputLine(url);
      return line ? [line] : [];
    });
  }

  if (options.input) {
    return parseInputLines(await readFile(options.input, 'utf-8'));
  }

  if (process.stdin.isTTY) {
    console.log(chalk.blue('Input links, q to finish.'));
  }
  return readInputLines(process.stdin);
}

export async function fetchCommand(urls: string[], options: FetchOptions): Promise<void> {
  try {
    const lines = await collectLines(urls, options);
    if (lines.length === 0) {
      console.log(chalk.yellow('Nothing to download.'));
      return;
    }

    console.log(chalk.blue(`📥 Fetching ${lines.length} source${lines.length === 1 ? '' : 's'}...`));
    const failures = await runFetch(lines, options);
    if (failures.length > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    console.error(chalk.red('❌ Fetch failed:'), errorMessage(error));
    process.exitCode = 1;
  }
}
