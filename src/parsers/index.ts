import type { ParseResult } from '../types/index.js';
import { ParseError } from '../utils/errors.js';
import { SiteParser } from './base.js';
import { DirectMediaParser } from './direct.js';

/**
 * Ordered set of site parsers. The first registered parser whose pattern
 * matches a URL handles it.
 */
export class ParserRegistry {
  private readonly parsers: SiteParser[] = [];

  register(parser: SiteParser): this {
    if (this.parsers.some(existing => existing.name === parser.name)) {
      throw new Error(`Parser "${parser.name}" is already registered`);
    }
    this.parsers.push(parser);
    return this;
  }

  getParser(url: string): SiteParser | undefined {
    return this.parsers.find(parser => parser.canParse(url));
  }

  async parseUrl(url: string): Promise<ParseResult> {
    const parser = this.getParser(url);
    if (!parser) {
      throw new ParseError('No parser matches URL', url, this.list());
    }
    return parser.parse(url);
  }

  list(): string[] {
    return this.parsers.map(parser => parser.name);
  }
}

export function createDefaultRegistry(): ParserRegistry {
  return new ParserRegistry().register(new DirectMediaParser());
}

export { SiteParser } from './base.js';
export { DirectMediaParser, MEDIA_EXTENSIONS } from './direct.js';
