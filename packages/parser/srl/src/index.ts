export { appTitle, EMPTY_APP_TITLE, UNKNOWN_APP_TITLE } from './app-title.js';
export type { AppTitle } from './app-title.js';
export {
  HEADER_ENTRY,
  ICON_ENTRY,
  ICON_PNG_ENTRY,
  ICON_PNG_FORMAT,
  SRL_ICON_SIZE,
} from './constants.js';
export { InvalidContainerError, MalformedIconError, ReaderClosedError } from './exceptions.js';
export { decodeRegionLockout } from './header.js';
export type { RegionLockout } from './header.js';
export { decodeTitleRecord, describeRegionLock, SrlIcon } from './icon.js';
export type { IconLoadResult, RegionTitles } from './icon.js';
export { decodeIconPixels, renderIconPng } from './icon-renderer.js';
export { DEFAULT_READER_OPTIONS } from './options.js';
export type { ReaderOptions } from './options.js';
export { REGION_LOCK_FLAGS, REGION_NAMES, TITLE_LOOKUP_ORDER } from './regions.js';
export type { RegionName } from './regions.js';
export { SrlReader } from './reader.js';
export type { OpenOptions } from './reader.js';
export { iconPngStrategy } from './strategies.js';
