import { EntryNotFoundError } from './exceptions.js';
import type { Entry } from './models/entry.js';

const LEADING_SEPARATORS = /^\/+/;
const BINARY_SUFFIX = /(\.bin)+$/i;

/** Accepts both "/arm9.bin" and "arm9". Idempotent. */
export function normalizeEntryPath(path: string): string {
  return path.replace(LEADING_SEPARATORS, '').replace(BINARY_SUFFIX, '');
}

export class EntryTable implements Iterable<Entry> {
  private readonly entries = new Map<string, Entry>();

  constructor(entries: Iterable<Entry> = []) {
    for (const entry of entries) {
      if (this.entries.has(entry.path)) {
        throw new Error(`Duplicate entry path: ${entry.path}`);
      }
      this.entries.set(entry.path, entry);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  has(path: string, normalize = true): boolean {
    return this.entries.has(normalize ? normalizeEntryPath(path) : path);
  }

  resolve(path: string, normalize = true): Entry {
    const key = normalize ? normalizeEntryPath(path) : path;
    const entry = this.entries.get(key);
    if (!entry) throw new EntryNotFoundError(path);
    return entry;
  }

  paths(): string[] {
    return [...this.entries.keys()];
  }

  [Symbol.iterator](): Iterator<Entry> {
    return this.entries.values();
  }
}
