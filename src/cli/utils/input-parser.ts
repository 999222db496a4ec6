import { createInterface } from 'readline';
import type { Readable } from 'stream';

export interface InputLine {
  url: string;
  /** Zero-based positions of the parse result's entries to keep; all when absent */
  indices?: number[];
}

export const END_OF_INPUT = 'q';

/**
 * One line of URL input: `<url> [index ...]`.
 * Blank lines, lines starting with whitespace and `#` comments yield nothing.
 */
export function parseInputLine(line: string): InputLine | null {
  if (line.trim() === '' || /^\s/.test(line) || line.startsWith('#')) {
    return null;
  }

  const [url = '', ...rest] = line.trim().split(/\s+/);
  const indices = rest
    .map(token => Number(token))
    .filter(value => Number.isInteger(value) && value >= 0);

  return indices.length > 0 ? { url, indices } : { url };
}

export function parseInputLines(text: string): InputLine[] {
  const lines: InputLine[] = [];
  for (const raw of text.split(/\r?\n/)) {
    if (raw.trim() === END_OF_INPUT) break;
    const parsed = parseInputLine(raw);
    if (parsed) lines.push(parsed);
  }
  return lines;
}

/**
 * Reads lines until `q` or end of stream.
 */
export async function readInputLines(input: Readable): Promise<InputLine[]> {
  const reader = createInterface({ input, crlfDelay: Infinity });
  const lines: InputLine[] = [];
  try {
    for await (const raw of reader) {
      if (raw.trim() === END_OF_INPUT) break;
      const parsed = parseInputLine(raw);
      if (parsed) lines.push(parsed);
    }
  } finally {
    reader.close();
  }
  return lines;
}

export function selectByIndices<T>(items: T[], indices?: number[]): T[] {
  if (!indices) return items;
  return indices.flatMap(index => {
    const item = items[index];
    return item === undefined ? [] : [item];
  });
}
