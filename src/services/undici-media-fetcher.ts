import { ProxyAgent, request } from 'undici';
import type { Dispatcher } from 'undici';
import type { FetchedMedia, IMediaFetcher } from '../interfaces/media-fetcher.interface.js';
import type { FetchRequestOptions } from '../types/index.js';
import { HttpStatusError } from '../utils/errors.js';

const MAX_REDIRECTIONS = 5;

export interface UndiciMediaFetcherOptions {
  /** Forward proxy every request goes through, e.g. http://127.0.0.1:7890 */
  proxyUrl?: string;
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * undici-backed fetcher. Responses are streamed, never buffered whole.
 */
export class UndiciMediaFetcher implements IMediaFetcher {
  private readonly dispatcher: Dispatcher | undefined;

  constructor(options: UndiciMediaFetcherOptions = {}) {
    this.dispatcher = options.proxyUrl ? new ProxyAgent(options.proxyUrl) : undefined;
  }

  async fetch(url: string, options: FetchRequestOptions): Promise<FetchedMedia> {
    const response = await request(url, {
      method: 'GET',
      headers: options.headers,
      signal: options.signal,
      dispatcher: this.dispatcher,
      maxRedirections: MAX_REDIRECTIONS,
    });

    if (response.statusCode < 200 || response.statusCode >= 300) {
      // Drain so the connection goes back to the pool
      await response.body.dump();
      throw new HttpStatusError(response.statusCode, url);
    }

    const contentLength = firstHeader(response.headers['content-length']);
    return {
      body: response.body,
      contentType: firstHeader(response.headers['content-type']),
      contentLength: contentLength !== undefined ? Number(contentLength) : undefined,
    };
  }

  async close(): Promise<void> {
    await this.dispatcher?.close();
  }
}
