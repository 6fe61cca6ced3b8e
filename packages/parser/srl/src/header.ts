import { type Entry, readLittleEndian } from '@cartkit/core';
import {
  APP_TITLE_LENGTH,
  APP_TITLE_OFFSET,
  EXTENDED_HEADER_OFFSET,
  EXTENDED_HEADER_SIZE,
  GAME_CODE_LENGTH,
  GAME_CODE_OFFSET,
  GAME_TITLE_LENGTH,
  HEADER_ENTRY,
  HEADER_ENTRY_FIELDS,
  HEADER_SIZE_FIELD,
  ICON_ENTRY,
  ICON_OFFSET_FIELD,
  MAKER_CODE_LENGTH,
  MAKER_CODE_OFFSET,
  PRIMARY_HEADER_SIZE,
  REGION_LOCKOUT_CHINA,
  REGION_LOCKOUT_KOREA,
  REGION_LOCKOUT_NORMAL,
  REGION_LOCKOUT_OFFSET,
  ROM_SIZE_FIELD,
  SRL_ICON_SIZE,
  UNIT_CODE_EXTENDED_BIT,
  UNIT_CODE_OFFSET,
} from './constants.js';

/** Unrecognised lockout bytes are kept as their decimal string. */
export type RegionLockout = 'Normal' | 'China' | 'Korea' | `${number}`;

export interface PrimaryHeader {
  readonly appTitle: Uint8Array;
  readonly gameTitle: string;
  readonly gameCode: string;
  readonly makerCode: string;
  readonly unitCode: number;
  readonly iconOffset: number;
  readonly romSize: number;
  readonly headerSize: number;
}

function u32(header: Uint8Array, offset: number): number {
  return readLittleEndian(header.subarray(offset, offset + 4));
}

function ascii(bytes: Uint8Array): string {
  return new TextDecoder('latin1').decode(bytes).replace(/\0+$/, '');
}

export function parsePrimaryHeader(header: Uint8Array): PrimaryHeader {
  return {
    appTitle: header.slice(APP_TITLE_OFFSET, APP_TITLE_OFFSET + APP_TITLE_LENGTH),
    gameTitle: ascii(header.subarray(APP_TITLE_OFFSET, APP_TITLE_OFFSET + GAME_TITLE_LENGTH)),
    gameCode: ascii(header.subarray(GAME_CODE_OFFSET, GAME_CODE_OFFSET + GAME_CODE_LENGTH)),
    makerCode: ascii(header.subarray(MAKER_CODE_OFFSET, MAKER_CODE_OFFSET + MAKER_CODE_LENGTH)),
    unitCode: header[UNIT_CODE_OFFSET],
    iconOffset: u32(header, ICON_OFFSET_FIELD),
    romSize: u32(header, ROM_SIZE_FIELD),
    headerSize: u32(header, HEADER_SIZE_FIELD),
  };
}

export function hasExtendedHeader(unitCode: number): boolean {
  return (unitCode & UNIT_CODE_EXTENDED_BIT) !== 0;
}

export function decodeRegionLockout(raw: number): RegionLockout {
  switch (raw) {
    case REGION_LOCKOUT_NORMAL:
      return 'Normal';
    case REGION_LOCKOUT_CHINA:
      return 'China';
    case REGION_LOCKOUT_KOREA:
      return 'Korea';
    default:
      return `${raw}`;
  }
}

export function readRegionLockout(extendedHeader: Uint8Array): RegionLockout {
  return decodeRegionLockout(
    readLittleEndian(
      extendedHeader.subarray(REGION_LOCKOUT_OFFSET, REGION_LOCKOUT_OFFSET + 1),
    ),
  );
}

/** Direct entries described by the header; zero-offset, zero-size fields are skipped. */
export function headerEntries(header: Uint8Array, extended: boolean): Entry[] {
  const entries: Entry[] = [
    {
      kind: 'direct',
      path: HEADER_ENTRY,
      offset: 0,
      size: extended ? EXTENDED_HEADER_OFFSET + EXTENDED_HEADER_SIZE : PRIMARY_HEADER_SIZE,
    },
  ];

  for (const [path, offsetField, sizeField] of HEADER_ENTRY_FIELDS) {
    const offset = u32(header, offsetField);
    const size = u32(header, sizeField);
    if (offset === 0 && size === 0) continue;
    entries.push({ kind: 'direct', path, offset, size });
  }

  const iconOffset = u32(header, ICON_OFFSET_FIELD);
  if (iconOffset !== 0) {
    entries.push({ kind: 'direct', path: ICON_ENTRY, offset: iconOffset, size: SRL_ICON_SIZE });
  }

  return entries;
}
