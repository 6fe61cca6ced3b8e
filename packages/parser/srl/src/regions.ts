import type { FlagTable } from '@cartkit/core';

/** Title-table slot order inside the icon block. */
export const REGION_NAMES = [
  'Japanese',
  'English',
  'French',
  'German',
  'Italian',
  'Spanish',
  'Simplified Chinese',
  'Korean',
  'Dutch',
  'Portuguese',
  'Russian',
  'Traditional Chinese',
] as const;

export type RegionName = (typeof REGION_NAMES)[number];

/** Default `getTitle` order: English is checked before Japanese. */
export const TITLE_LOOKUP_ORDER: readonly RegionName[] = [
  'English',
  'Japanese',
  'French',
  'German',
  'Italian',
  'Spanish',
  'Simplified Chinese',
  'Korean',
  'Dutch',
  'Portuguese',
  'Russian',
  'Traditional Chinese',
];

export const REGION_LOCK_FLAGS: FlagTable = [
  { name: 'JPN', value: 0x01 },
  { name: 'USA', value: 0x02 },
  { name: 'EUR', value: 0x04 },
  { name: 'EUR', value: 0x08 },
  { name: 'CHN', value: 0x10 },
  { name: 'KOR', value: 0x20 },
  { name: 'TWN', value: 0x40 },
  { name: 'FREE', value: 0x80 },
];

