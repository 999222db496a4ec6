import type { ParseResult } from '../types/index.js';

/**
 * Turns a page or media URL into the entries to download plus whatever
 * metadata the site exposes.
 */
export abstract class SiteParser {
  abstract readonly name: string;
  abstract readonly urlPattern: RegExp;

  canParse(url: string): boolean {
    return this.urlPattern.test(url);
  }

  abstract parse(url: string): Promise<ParseResult>;
}
