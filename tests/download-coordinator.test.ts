import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync } from 'fs';
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import type { FetchedMedia } from '../src/interfaces/media-fetcher.interface.js';
import { BatchTracker } from '../src/services/batch-tracker.js';
import { DownloadCoordinator } from '../src/services/download-coordinator.js';
import type { DownloadCoordinatorOptions } from '../src/services/download-coordinator.js';
import { RateLimiter } from '../src/services/rate-limiter.js';
import type { DownloadOutcome } from '../src/types/index.js';
import { createDownloadEntry } from '../src/utils/download-entry.js';
import { FetchTimeoutError } from '../src/utils/errors.js';
import { FakeClock } from './helpers/fake-clock.js';
import { FakeFetcher, bodyOf } from './helpers/fake-fetcher.js';

const IMG = 'https://img.test';

describe('DownloadCoordinator', () => {
  let root: string;
  let fetcher: FakeFetcher;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'media-harvest-'));
    fetcher = new FakeFetcher({
      [`${IMG}/a.png`]: 'alpha',
      [`${IMG}/b.png`]: 'beta',
      [`${IMG}/c.png`]: 'gamma',
    });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function createCoordinator(overrides: Partial<DownloadCoordinatorOptions> = {}): DownloadCoordinator {
    return new DownloadCoordinator({
      config: {
        rootDir: root,
        workerCount: 4,
        groupDelayMs: 0,
        fetchTimeoutMs: 1000,
        defaultHeaders: { 'User-Agent': 'media-harvest-test' },
      },
      rateLimiter: new RateLimiter({ defaultLimit: { concurrency: 2, minIntervalMs: 0 } }),
      tracker: new BatchTracker({ pollIntervalMs: 5 }),
      fetcher,
      ...overrides,
    });
  }

  function entries(...names: string[]) {
    return names.map(name => createDownloadEntry({ url: `${IMG}/${name}` }));
  }

  it('writes every entry under root and sub directory', async () => {
    const coordinator = createCoordinator();

    await coordinator.submit(entries('a.png', 'b.png'), 'post-1', 'artist');
    await coordinator.waitForTagCompletion('post-1');

    expect(await readFile(path.join(root, 'artist', 'a.png'), 'utf-8')).toBe('alpha');
    expect(await readFile(path.join(root, 'artist', 'b.png'), 'utf-8')).toBe('beta');
    expect(coordinator.getStats()).toEqual({ downloaded: 2, skipped: 0, failed: 0, inFlight: 0, bytes: 9 });
  });

  it('rewrites destination paths to absolute paths', async () => {
    const coordinator = createCoordinator();
    const batch = entries('a.png');

    await coordinator.submit(batch, 'post-1', 'artist');
    await coordinator.idle();

    expect(batch[0]?.destinationPath).toBe(path.join(root, 'artist', 'a.png'));
  });

  it('skips files that already exist without fetching them', async () => {
    const first = createCoordinator();
    await first.submit(entries('a.png', 'b.png'), 'post-1');
    await first.waitForTagCompletion('post-1');
    expect(fetcher.calls).toHaveLength(2);

    const second = createCoordinator();
    await second.submit(entries('a.png', 'b.png'), 'post-1');
    await second.waitForTagCompletion('post-1');

    expect(fetcher.calls).toHaveLength(2);
    expect(second.getStats()).toMatchObject({ downloaded: 0, skipped: 2 });
  });

  it('downloads again over an empty file', async () => {
    await writeFile(path.join(root, 'a.png'), '');
    const coordinator = createCoordinator();

    await coordinator.submit(entries('a.png'), 'post-1');
    await coordinator.waitForTagCompletion('post-1');

    expect(await readFile(path.join(root, 'a.png'), 'utf-8')).toBe('alpha');
  });

  it('runs post-processing with the final path after a write only', async () => {
    const postProcess = vi.fn();
    const coordinator = createCoordinator();
    const make = () => [createDownloadEntry({ url: `${IMG}/a.png`, postProcess })];

    await coordinator.submit(make(), 'post-1');
    await coordinator.waitForTagCompletion('post-1');
    await coordinator.submit(make(), 'post-1');
    await coordinator.waitForTagCompletion('post-1');

    expect(postProcess).toHaveBeenCalledTimes(1);
    expect(postProcess).toHaveBeenCalledWith(path.join(root, 'a.png'));
  });

  it('reports a throwing post-process step as a failure', async () => {
    const coordinator = createCoordinator();
    const entry = createDownloadEntry({
      url: `${IMG}/a.png`,
      postProcess: async () => {
        throw new Error('bad archive');
      },
    });

    await coordinator.submit([entry], 'post-1');
    await coordinator.waitForTagCompletion('post-1');

    const [failure] = coordinator.getFailures();
    expect(failure?.phase).toBe('post-process');
    expect(failure?.message).toBe(`Post-processing ${path.join(root, 'a.png')} failed: bad archive`);
  });

  it('drains the batch and collects the failure when a fetch fails', async () => {
    const coordinator = createCoordinator();

    await coordinator.submit(entries('a.png', 'missing.png'), 'post-1');
    await coordinator.waitForTagCompletion('post-1');

    expect(coordinator.getStats()).toMatchObject({ downloaded: 1, failed: 1 });
    expect(coordinator.getFailures()).toEqual([
      expect.objectContaining({
        tag: 'post-1',
        url: `${IMG}/missing.png`,
        path: path.join(root, 'missing.png'),
        phase: 'fetch',
        message: `${IMG}/missing.png 404`,
      }),
    ]);
    expect(existsSync(path.join(root, 'missing.png'))).toBe(false);
  });

  it('removes the partial file when the body breaks off', async () => {
    fetcher.set(`${IMG}/broken.png`, () => ({
      body: new Readable({
        read() {
          this.push('par');
          this.destroy(new Error('socket hang up'));
        },
      }),
    }));
    const coordinator = createCoordinator();

    await coordinator.submit(entries('broken.png'), 'post-1');
    await coordinator.waitForTagCompletion('post-1');

    expect(coordinator.getFailures()[0]?.phase).toBe('fetch');
    expect(await readdir(root)).toEqual([]);
  });

  it('reports a write failure with the write phase', async () => {
    await mkdir(path.join(root, 'a.png.part'));
    const coordinator = createCoordinator();

    await coordinator.submit(entries('a.png'), 'post-1');
    await coordinator.waitForTagCompletion('post-1');

    expect(coordinator.getFailures()[0]?.phase).toBe('write');
  });

  it('turns an invalid url into a failed outcome', async () => {
    const coordinator = createCoordinator();

    await coordinator.submit([createDownloadEntry({ url: 'not a url', filename: 'x.png' })], 'post-1');
    await coordinator.waitForTagCompletion('post-1');

    expect(coordinator.getFailures()[0]).toMatchObject({ phase: 'fetch', message: 'Invalid URL: not a url' });
    expect(fetcher.calls).toEqual([]);
  });

  it('merges default, batch and entry headers with the entry winning', async () => {
    const coordinator = createCoordinator();
    const entry = createDownloadEntry({ url: `${IMG}/a.png`, headers: { Referer: 'https://entry.test/' } });

    await coordinator.submit([entry], 'post-1', '', { Referer: 'https://batch.test/', 'X-Batch': '1' });
    await coordinator.waitForTagCompletion('post-1');

    expect(fetcher.calls[0]?.headers).toEqual({
      'User-Agent': 'media-harvest-test',
      Referer: 'https://entry.test/',
      'X-Batch': '1',
    });
  });

  it('reports each outcome once to the listener', async () => {
    const seen: Array<[DownloadOutcome['status'], string]> = [];
    const coordinator = createCoordinator({
      onOutcome: (outcome, tag) => seen.push([outcome.status, tag]),
    });

    await coordinator.submit(entries('a.png', 'missing.png'), 'post-1');
    await coordinator.idle();

    expect(seen).toHaveLength(2);
    expect(seen).toEqual(expect.arrayContaining([['downloaded', 'post-1'], ['failed', 'post-1']]));
  });

  it('keeps the drain wait pending until skipped and fetched entries are all counted', async () => {
    await writeFile(path.join(root, 'a.png'), 'on disk');
    let openGate = () => {};
    const gate = new Promise<void>(resolve => {
      openGate = resolve;
    });
    fetcher.set(`${IMG}/b.png`, async () => {
      await gate;
      return bodyOf('beta');
    });
    const coordinator = createCoordinator();

    await coordinator.submit(entries('a.png', 'b.png'), 'post-1');
    let drained = false;
    const draining = coordinator.waitForTagCompletion('post-1').then(() => {
      drained = true;
    });

    await vi.waitFor(() => expect(coordinator.getStats().skipped).toBe(1));
    await new Promise(resolve => setTimeout(resolve, 30));
    expect(drained).toBe(false);

    openGate();
    await draining;

    expect(drained).toBe(true);
    expect(coordinator.getStats()).toMatchObject({ downloaded: 1, skipped: 1 });
    expect(await readFile(path.join(root, 'a.png'), 'utf-8')).toBe('on disk');
  });

  it('holds a second batch under the same tag until the first drains', async () => {
    let releaseGate = () => {};
    const gate = new Promise<void>(resolve => {
      releaseGate = resolve;
    });
    fetcher.set(`${IMG}/slow.png`, async () => {
      await gate;
      return bodyOf('slow');
    });
    const coordinator = createCoordinator();

    await coordinator.submit(entries('slow.png'), 'post-1');
    let secondAccepted = false;
    const second = coordinator.submit(entries('b.png'), 'post-1').then(() => {
      secondAccepted = true;
    });

    await new Promise(resolve => setTimeout(resolve, 30));
    expect(secondAccepted).toBe(false);
    expect(fetcher.calls.map(call => call.url)).toEqual([`${IMG}/slow.png`]);

    releaseGate();
    await second;
    await coordinator.waitForTagCompletion('post-1');
    expect(coordinator.getStats()).toMatchObject({ downloaded: 2 });
  });

  it('fails an entry that waits too long for an origin slot', async () => {
    const rateLimiter = new RateLimiter({
      defaultLimit: { concurrency: 1, minIntervalMs: 0 },
      admissionTimeoutMs: 20,
    });
    const held = await rateLimiter.acquire(`${IMG}/other.png`);
    const coordinator = createCoordinator({ rateLimiter });

    await coordinator.submit(entries('a.png'), 'post-1');
    await coordinator.waitForTagCompletion('post-1');
    rateLimiter.release(held);

    expect(coordinator.getFailures()[0]).toMatchObject({
      phase: 'admission',
      message: `No slot for ${IMG} within 20ms`,
    });
    expect(fetcher.calls).toEqual([]);
  });

  it('fails a fetch that outlives the fetch timeout and frees the slot', async () => {
    fetcher.set(`${IMG}/hang.png`, options => new Promise<FetchedMedia>((_resolve, reject) => {
      options.signal?.addEventListener('abort', () => reject(options.signal?.reason));
    }));
    const rateLimiter = new RateLimiter({ defaultLimit: { concurrency: 1, minIntervalMs: 0 } });
    const coordinator = new DownloadCoordinator({
      config: {
        rootDir: root,
        workerCount: 4,
        groupDelayMs: 0,
        fetchTimeoutMs: 20,
        defaultHeaders: {},
      },
      rateLimiter,
      tracker: new BatchTracker({ pollIntervalMs: 5 }),
      fetcher,
    });

    await coordinator.submit(entries('hang.png'), 'post-1');
    await coordinator.waitForTagCompletion('post-1');

    const [failure] = coordinator.getFailures();
    expect(failure?.message).toBe(new FetchTimeoutError(`${IMG}/hang.png`, 20).message);
    expect(failure?.phase).toBe('fetch');
    expect(rateLimiter.getOriginState(IMG)?.inFlight).toBe(0);
  });

  it('pauses between launch groups but not after the last one', async () => {
    const clock = new FakeClock();
    const coordinator = new DownloadCoordinator({
      config: {
        rootDir: root,
        workerCount: 2,
        groupDelayMs: 30,
        fetchTimeoutMs: 1000,
        defaultHeaders: {},
      },
      rateLimiter: new RateLimiter({ defaultLimit: { concurrency: 4, minIntervalMs: 0 } }),
      tracker: new BatchTracker({ pollIntervalMs: 5 }),
      fetcher,
      clock,
    });

    let submitted = false;
    const submitting = coordinator.submit(entries('a.png', 'b.png', 'c.png'), 'post-1').then(() => {
      submitted = true;
    });

    await vi.waitFor(() => expect(clock.sleeps).toEqual([30]));
    expect(submitted).toBe(false);

    await clock.advance(30);
    await submitting;
    await coordinator.idle();

    expect(clock.sleeps).toEqual([30]);
    expect(coordinator.getStats()).toMatchObject({ downloaded: 3, inFlight: 0 });
  });

  it('resolves idle() once every launched worker settled', async () => {
    const coordinator = createCoordinator();

    await coordinator.submit(entries('a.png', 'b.png', 'c.png'), 'post-1');
    await coordinator.submit(entries('missing.png'), 'post-2');
    await coordinator.idle();

    expect(coordinator.getStats()).toEqual({ downloaded: 3, skipped: 0, failed: 1, inFlight: 0, bytes: 14 });
  });
});
