import {
  FileSource,
  flagNames,
  readLittleEndian,
  SharedSource,
  SubsectionView,
  withView,
} from '@cartkit/core';
import {
  appTitle,
  type AppTitle,
  EMPTY_APP_TITLE,
  isEmptyAppTitle,
  UNKNOWN_APP_TITLE,
} from './app-title.js';
import {
  PALETTE_OFFSET,
  PALETTE_SIZE,
  REGION_LOCK_ALL,
  REGION_LOCK_OFFSET,
  SMALL_ICON_OFFSET,
  SMALL_ICON_SIZE,
  SRL_ICON_SIZE,
  TITLE_RECORD_SIZE,
  TITLE_TABLE_OFFSET,
} from './constants.js';
import { MalformedIconError } from './exceptions.js';
import { REGION_LOCK_FLAGS, REGION_NAMES, type RegionName, TITLE_LOOKUP_ORDER } from './regions.js';

export type IconLoadResult =
  | { readonly ok: true; readonly icon: SrlIcon }
  | { readonly ok: false; readonly error: MalformedIconError };

export type RegionTitles = ReadonlyMap<RegionName, AppTitle | null>;

const LINE_BREAK = /\r\n|[\n\r\v\f\x1c\x1d\x1e\x85\u2028\u2029]/;

export function splitTitleLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split(LINE_BREAK);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/** Decode one 0x100-byte UTF-16LE title record. */
export function decodeTitleRecord(record: Uint8Array): AppTitle {
  const text = new TextDecoder('utf-16le').decode(record).replace(/^\0+|\0+$/g, '');
  const lines = splitTitleLines(text);

  if (lines.length === 3) {
    return appTitle(lines[0], `${lines[0]} ${lines[1]}`, lines[2]);
  }
  if (lines.length === 2) {
    return appTitle(lines[0], lines[0], lines[1]);
  }
  return EMPTY_APP_TITLE;
}

export function describeRegionLock(bits: number): string {
  if (bits === REGION_LOCK_ALL) return 'ALL';
  return flagNames(REGION_LOCK_FLAGS, bits).join(',');
}

/**
 * The icon/title block of a DS image: per-region titles, the 32x32 icon and its palette,
 * and the region-lock bitmask.
 */
export class SrlIcon {
  readonly titles: RegionTitles;

  /**
   * Always empty: the decomposed names are available from `describeRegionLock(regionLockBits)`.
   */
  readonly regionLock = '';

  constructor(
    names: Partial<Record<RegionName, AppTitle>>,
    readonly regionLockBits: number,
    readonly smallIcon: Uint8Array,
    readonly palette: Uint8Array,
  ) {
    this.titles = new Map(
      REGION_NAMES.map((region): [RegionName, AppTitle | null] => [region, names[region] ?? null]),
    );
  }

  getTitle(language: RegionName | readonly RegionName[] = TITLE_LOOKUP_ORDER): AppTitle {
    const order = typeof language === 'string' ? [language] : language;
    for (const region of order) {
      const title = this.titles.get(region);
      if (title && !isEmptyAppTitle(title)) return title;
    }
    return UNKNOWN_APP_TITLE;
  }

  toString(): string {
    return `<SrlIcon title: ${this.getTitle().shortDesc}>`;
  }

  static load(data: Uint8Array): SrlIcon {
    if (data.length < SRL_ICON_SIZE) {
      throw new MalformedIconError(
        `Icon block too short: ${data.length} bytes, expected ${SRL_ICON_SIZE}`,
      );
    }

    const names: Partial<Record<RegionName, AppTitle>> = {};
    // 16 slots are reserved; only the first 12 carry a region.
    REGION_NAMES.forEach((region, slot) => {
      const start = TITLE_TABLE_OFFSET + slot * TITLE_RECORD_SIZE;
      names[region] = decodeTitleRecord(data.subarray(start, start + TITLE_RECORD_SIZE));
    });

    const regionLockBits = readLittleEndian(
      data.subarray(REGION_LOCK_OFFSET, REGION_LOCK_OFFSET + 4),
    );
    const smallIcon = data.slice(SMALL_ICON_OFFSET, SMALL_ICON_OFFSET + SMALL_ICON_SIZE);
    const palette = data.slice(PALETTE_OFFSET, PALETTE_OFFSET + PALETTE_SIZE);

    return new SrlIcon(names, regionLockBits, smallIcon, palette);
  }

  static tryLoad(data: Uint8Array): IconLoadResult {
    try {
      return { ok: true, icon: SrlIcon.load(data) };
    } catch (error) {
      if (error instanceof MalformedIconError) return { ok: false, error };
      const message = error instanceof Error ? error.message : String(error);
      return {
        ok: false,
        error: new MalformedIconError(`Icon block unreadable: ${message}`, error),
      };
    }
  }

  /** Load a standalone icon dump. */
  static fromFile(filePath: string): SrlIcon {
    const shared = new SharedSource(new FileSource(filePath));
    try {
      return withView(new SubsectionView(shared, 0, SRL_ICON_SIZE), (view) =>
        SrlIcon.load(view.read()),
      );
    } finally {
      shared.close();
    }
  }
}
