import { describe, expect, it } from 'vitest';
import { EntryTable, normalizeEntryPath } from '../src/entry-table.js';
import { EntryNotFoundError } from '../src/exceptions.js';
import type { Entry } from '../src/models/entry.js';

const ENTRIES: Entry[] = [
  { kind: 'direct', path: 'arm9', offset: 0x4000, size: 0x100 },
  { kind: 'direct', path: 'icon', offset: 0x1000, size: 0x2400 },
  {
    kind: 'reconstructed',
    path: 'icon.png',
    format: 'srl-icon-png',
    metadata: { iconOffset: 0x1000 },
  },
];

describe('normalizeEntryPath', () => {
  it('treats "/name.bin" and "name" as the same entry', () => {
    expect(normalizeEntryPath('/arm9.bin')).toBe('arm9');
    expect(normalizeEntryPath('arm9')).toBe('arm9');
  });

  it('matches the suffix case-insensitively', () => {
    expect(normalizeEntryPath('ARM7.BIN')).toBe('ARM7');
  });

  it('leaves other extensions alone', () => {
    expect(normalizeEntryPath('/icon.png')).toBe('icon.png');
  });

  it('is idempotent', () => {
    for (const path of ['/arm9.bin', '//fat.bin.bin', 'fnt', '/x.BIN', '', '/', 'a.bin/b']) {
      const once = normalizeEntryPath(path);
      expect(normalizeEntryPath(once)).toBe(once);
    }
  });
});

describe('EntryTable', () => {
  const table = new EntryTable(ENTRIES);

  it('resolves a normalized path', () => {
    expect(table.resolve('/arm9.bin')).toEqual(ENTRIES[0]);
  });

  it('resolves reconstructed entries by their tag', () => {
    const entry = table.resolve('icon.png');
    expect(entry.kind).toBe('reconstructed');
  });

  it('skips normalization when asked', () => {
    expect(() => table.resolve('/arm9.bin', false)).toThrow(EntryNotFoundError);
    expect(table.resolve('arm9', false).path).toBe('arm9');
  });

  it('throws EntryNotFoundError carrying the requested path', () => {
    let caught: unknown;
    try {
      table.resolve('/missing.bin');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(EntryNotFoundError);
    expect(caught).toMatchObject({
      path: '/missing.bin',
      message: 'Entry not found: /missing.bin',
    });
  });

  it('reports size, paths and membership', () => {
    expect(table.size).toBe(3);
    expect(table.paths()).toEqual(['arm9', 'icon', 'icon.png']);
    expect(table.has('/icon.bin')).toBe(true);
    expect(table.has('banner')).toBe(false);
  });

  it('iterates entries in insertion order', () => {
    expect([...table].map((e) => e.path)).toEqual(['arm9', 'icon', 'icon.png']);
  });

  it('rejects duplicate paths', () => {
    expect(() => new EntryTable([ENTRIES[0], ENTRIES[0]])).toThrow('Duplicate entry path: arm9');
  });

  it('can be empty', () => {
    const empty = new EntryTable();
    expect(empty.size).toBe(0);
    expect(() => empty.resolve('arm9')).toThrow(EntryNotFoundError);
  });
});
