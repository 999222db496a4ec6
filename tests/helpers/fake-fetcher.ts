import { Readable } from 'stream';
import type { FetchedMedia, IMediaFetcher } from '../../src/interfaces/media-fetcher.interface.js';
import type { FetchRequestOptions } from '../../src/types/index.js';
import { HttpStatusError } from '../../src/utils/errors.js';

export type FakeResponse =
  | string
  | Error
  | ((options: FetchRequestOptions) => FetchedMedia | Promise<FetchedMedia>);

export interface FetchCall {
  url: string;
  headers: Record<string, string>;
}

export function bodyOf(content: string): FetchedMedia {
  return { body: Readable.from([Buffer.from(content)]) };
}

/**
 * In-memory stand-in for the network. Unknown URLs answer 404.
 */
export class FakeFetcher implements IMediaFetcher {
  readonly calls: FetchCall[] = [];
  closed = false;

  constructor(private readonly responses: Record<string, FakeResponse> = {}) {}

  set(url: string, response: FakeResponse): void {
    this.responses[url] = response;
  }

  async fetch(url: string, options: FetchRequestOptions): Promise<FetchedMedia> {
    this.calls.push({ url, headers: { ...options.headers } });

    const response = this.responses[url];
    if (response === undefined) throw new HttpStatusError(404, url);
    if (response instanceof Error) throw response;
    if (typeof response === 'string') return bodyOf(response);
    return response(options);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
