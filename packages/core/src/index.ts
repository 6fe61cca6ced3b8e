export * from './models/index.js';
export type { ByteSource, ReconstructionStrategy } from './ports/index.js';

export {
  EntryNotFoundError,
  LockContentionError,
  ReconstructionUnavailableError,
  SourceClosedError,
  ViewClosedError,
} from './exceptions.js';

export { createLogger } from './logger.js';
export type { Logger, Namespace } from './logger.js';

export {
  MAX_NUMBER_FIELD_BYTES,
  readBigEndian,
  readBigEndianBig,
  readLittleEndian,
  readLittleEndianBig,
  roundUp,
} from './byte-codec.js';

export { decomposeFlags, flagNames } from './flags.js';
export type { FlagDecomposition, FlagMember, FlagTable } from './flags.js';

export { EntryTable, normalizeEntryPath } from './entry-table.js';

export { BufferSource } from './io/buffer-source.js';
export { FileSource } from './io/file-source.js';
export { ExclusiveLock } from './io/exclusive-lock.js';
export { SharedSource } from './io/shared-source.js';
export { SubsectionView } from './io/subsection-view.js';
export { DecodedEntryView } from './io/decoded-entry-view.js';
export { withView } from './io/entry-view.js';
export type { EntryView, SeekOrigin } from './io/entry-view.js';
