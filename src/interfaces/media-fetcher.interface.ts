import type { Readable } from 'stream';
import type { FetchRequestOptions } from '../types/index.js';

export interface FetchedMedia {
  body: Readable;
  contentType?: string;
  contentLength?: number;
}

/**
 * Network seam of the downloader. Implementations issue a GET for the url
 * and hand back the body as a stream.
 */
export interface IMediaFetcher {
  /**
   * Fetch a remote resource
   * @throws HttpStatusError when the response status is not 2xx
   */
  fetch(url: string, options: FetchRequestOptions): Promise<FetchedMedia>;

  /**
   * Release pooled connections
   */
  close(): Promise<void>;
}
