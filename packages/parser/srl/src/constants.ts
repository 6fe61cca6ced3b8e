export const PRIMARY_HEADER_SIZE = 0x180;
export const EXTENDED_HEADER_OFFSET = 0x180;
export const EXTENDED_HEADER_SIZE = 0xe80;

export const APP_TITLE_OFFSET = 0x00;
export const APP_TITLE_LENGTH = 0x12;
export const GAME_TITLE_LENGTH = 0x0c;
export const GAME_CODE_OFFSET = 0x0c;
export const GAME_CODE_LENGTH = 4;
export const MAKER_CODE_OFFSET = 0x10;
export const MAKER_CODE_LENGTH = 2;
export const UNIT_CODE_OFFSET = 0x12;
export const UNIT_CODE_EXTENDED_BIT = 0x01;
export const ICON_OFFSET_FIELD = 0x68;
export const ROM_SIZE_FIELD = 0x80;
export const HEADER_SIZE_FIELD = 0x84;

/** Relative to the extended header. */
export const REGION_LOCKOUT_OFFSET = 0x34;
export const REGION_LOCKOUT_CHINA = 0x80;
export const REGION_LOCKOUT_KOREA = 0x40;
export const REGION_LOCKOUT_NORMAL = 0x00;

/** [path, offset field, size field] in the primary header. */
export const HEADER_ENTRY_FIELDS = [
  ['arm9', 0x20, 0x2c],
  ['arm7', 0x30, 0x3c],
  ['fnt', 0x40, 0x44],
  ['fat', 0x48, 0x4c],
  ['arm9ovt', 0x50, 0x54],
  ['arm7ovt', 0x58, 0x5c],
] as const;

export const HEADER_ENTRY = 'header';
export const ICON_ENTRY = 'icon';
export const ICON_PNG_ENTRY = 'icon.png';
export const ICON_PNG_FORMAT = 'srl-icon-png';

export const SRL_ICON_SIZE = 0x2400;
export const SMALL_ICON_OFFSET = 0x20;
export const SMALL_ICON_SIZE = 0x200;
export const PALETTE_OFFSET = 0x220;
export const PALETTE_SIZE = 0x20;
export const TITLE_TABLE_OFFSET = 0x240;
export const TITLE_RECORD_SIZE = 0x100;
export const TITLE_RECORD_SLOTS = 16;
export const REGION_LOCK_OFFSET = 0x2018;
export const REGION_LOCK_ALL = 0x7fffffff;

export const ICON_WIDTH = 32;
export const ICON_HEIGHT = 32;
export const ICON_TILE_SIZE = 8;
