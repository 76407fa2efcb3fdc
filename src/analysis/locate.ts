import { readFileSync } from 'node:fs';
import type { ChangeEvent, ChangeEventKind } from '../model/event.js';

// Opening tag of each change element; group 1 is the attribute text.
const TAG_PATTERNS: Record<ChangeEventKind, RegExp> = {
  tableCreated: /<createTable\s+([^>]+)>/g,
  tableDropped: /<dropTable\s+([^>]+)>/g,
  columnDropped: /<dropColumn\s+([^>]+)>/g,
  notNullAdded: /<addNotNullConstraint\s+([^>]+)>/g,
};

export function splitLines(text: string): string[] {
  const lines = text.split(/\r\n|\r|\n/);
  if (lines.length > 1 && lines[lines.length - 1] === '') lines.pop();
  return lines;
}

export function matchesAttributes(event: ChangeEvent, attributes: string): boolean {
  if (!attributes.includes(`tableName="${event.table}"`)) return false;
  switch (event.kind) {
    case 'columnDropped':
    case 'notNullAdded':
      return attributes.includes(`columnName="${event.column}"`);
    default:
      return true;
  }
}

/**
 * Offset of the first tag for `event` in `joined`, the file's lines
 * concatenated without separators. -1 when nothing matches.
 */
export function findTagOffset(event: ChangeEvent, joined: string): number {
  const pattern = new RegExp(TAG_PATTERNS[event.kind].source, 'g');
  for (const match of joined.matchAll(pattern)) {
    const attributes = match[1] ?? '';
    if (matchesAttributes(event, attributes)) return match.index ?? -1;
  }
  return -1;
}

/**
 * 1-based line whose range [start, start + length) holds `offset`.
 * Empty lines own no offsets.
 */
export function lineAtOffset(lengths: readonly number[], offset: number): number | undefined {
  let start = 0;
  for (let i = 0; i < lengths.length; i++) {
    const end = start + lengths[i];
    if (offset >= start && offset < end) return i + 1;
    start = end;
  }
  return undefined;
}

export function locateInLines(event: ChangeEvent, lines: readonly string[]): number {
  const offset = findTagOffset(event, lines.join(''));
  if (offset < 0) return 1;
  return lineAtOffset(lines.map(line => line.length), offset) ?? 1;
}

export function locateInText(event: ChangeEvent, text: string): number {
  return locateInLines(event, splitLines(text));
}

/** Reads `event.file` on every call. Read errors propagate. */
export function locate(event: ChangeEvent): number {
  return locateInText(event, readFileSync(event.file, 'utf-8'));
}

/**
 * Locator that splits each file once per instance. Results are the same as
 * calling `locate` for every event.
 */
export class SourceLocator {
  private lineCache = new Map<string, string[]>();

  constructor(private readonly readText: (filePath: string) => string = path => readFileSync(path, 'utf-8')) {}

  locate(event: ChangeEvent): number {
    let lines = this.lineCache.get(event.file);
    if (!lines) {
      lines = splitLines(this.readText(event.file));
      this.lineCache.set(event.file, lines);
    }
    return locateInLines(event, lines);
  }
}
