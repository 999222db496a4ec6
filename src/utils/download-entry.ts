import path from 'path';
import type { DownloadEntry, DownloadEntryInit } from '../types/index.js';

/**
 * Last path segment of the url, query and fragment stripped.
 * "https://i.pximg.net/img-original/img/2024/01/01/00/00/00/123_p0.png?x=1" → "123_p0.png"
 */
export function filenameFromUrl(url: string): string {
  const { pathname } = new URL(url);
  const segment = pathname.split('/').filter(Boolean).pop();
  if (!segment) {
    throw new TypeError(`Cannot derive a filename from ${url}`);
  }
  return path.basename(decodeURIComponent(segment));
}

export function createDownloadEntry(init: DownloadEntryInit): DownloadEntry {
  return {
    remoteLocation: init.url,
    destinationPath: init.filename ?? filenameFromUrl(init.url),
    headers: init.headers,
    postProcess: init.postProcess,
  };
}
