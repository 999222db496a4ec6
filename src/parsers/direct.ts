import type { ParseResult } from '../types/index.js';
import { createDownloadEntry, filenameFromUrl } from '../utils/download-entry.js';
import { ParseError } from '../utils/errors.js';
import { SiteParser } from './base.js';

export const MEDIA_EXTENSIONS = [
  'jpg', 'jpeg', 'png', 'gif', 'webp', 'apng', 'avif', 'bmp',
  'mp4', 'webm', 'zip',
] as const;

/**
 * Handles URLs that already point at a media file.
 */
export class DirectMediaParser extends SiteParser {
  readonly name = 'direct';
  readonly urlPattern = new RegExp(
    `^https?://[^/?#]+/[^?#]*\\.(?:${MEDIA_EXTENSIONS.join('|')})(?:[?#].*)?$`,
    'i'
  );

  async parse(url: string): Promise<ParseResult> {
    if (!this.canParse(url)) {
      throw new ParseError('Not a direct media URL', url);
    }

    const filename = filenameFromUrl(url);
    return {
      entries: [createDownloadEntry({ url, filename })],
      sourceUrl: url,
      metadata: { filename },
    };
  }
}
