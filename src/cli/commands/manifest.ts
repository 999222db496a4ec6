import chalk from 'chalk';
import { readFile } from 'fs/promises';
import type { DownloadFailure } from '../../types/index.js';
import { createDownloadEntry } from '../../utils/download-entry.js';
import { errorMessage } from '../../utils/errors.js';
import { ManifestSchema } from '../../utils/validation.js';
import type { ManifestInput } from '../../utils/validation.js';
import { DownloadSession } from '../utils/download-session.js';
import type { CommonOptions, SessionDependencies } from '../utils/download-session.js';

export class ManifestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ManifestError';
  }
}

export function parseManifest(text: string): ManifestInput {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ManifestError(`Manifest is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }

  const result = ManifestSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ManifestError(`Invalid manifest: ${issues}`);
  }
  return result.data;
}

export async function runManifest(
  manifest: ManifestInput,
  options: CommonOptions,
  deps: SessionDependencies = {}
): Promise<DownloadFailure[]> {
  const session = new DownloadSession(options, deps);
  await session.start();

  await Promise.all(manifest.batches.map(batch =>
    session.submit(
      batch.entries.map(entry => createDownloadEntry(entry)),
      batch.tag,
      batch.subDirectory,
      batch.headers
    )
  ));

  return session.finish();
}

export async function manifestCommand(file: string, options: CommonOptions): Promise<void> {
  try {
    const manifest = parseManifest(await readFile(file, 'utf-8'));
    const total = manifest.batches.reduce((sum, batch) => sum + batch.entries.length, 0);
    console.log(chalk.blue(`📥 ${manifest.batches.length} batches, ${total} entries from ${file}`));

    const failures = await runManifest(manifest, options);
    if (failures.length > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    console.error(chalk.red('❌ Manifest run failed:'), errorMessage(error));
    process.exitCode = 1;
  }
}
