import {
  BufferSource,
  type ByteSource,
  createLogger,
  DecodedEntryView,
  type EntryView,
  EntryTable,
  FileSource,
  ReconstructionUnavailableError,
  type ReconstructionStrategy,
  SharedSource,
  SubsectionView,
  withView,
} from '@cartkit/core';
import {
  EXTENDED_HEADER_OFFSET,
  EXTENDED_HEADER_SIZE,
  ICON_PNG_ENTRY,
  ICON_PNG_FORMAT,
  PRIMARY_HEADER_SIZE,
  SRL_ICON_SIZE,
} from './constants.js';
import { InvalidContainerError, MalformedIconError, ReaderClosedError } from './exceptions.js';
import {
  hasExtendedHeader,
  headerEntries,
  parsePrimaryHeader,
  readRegionLockout,
  type RegionLockout,
} from './header.js';
import { type IconLoadResult, SrlIcon } from './icon.js';
import { type ReaderOptions, resolveReaderOptions } from './options.js';
import { iconPngStrategy } from './strategies.js';

const log = createLogger('Reader');

export interface OpenOptions {
  /** Strip a leading "/" and a trailing ".bin" before lookup */
  normalize?: boolean;
}

/**
 * Reads a DS cartridge image. Header, extended header and icon are decoded in the
 * constructor; entries are read on demand through views over the shared source.
 */
export class SrlReader {
  readonly appTitle: Uint8Array;
  readonly gameTitle: string;
  readonly gameCode: string;
  readonly makerCode: string;
  readonly unitCode: number;
  readonly romSize: number;
  readonly headerSize: number;
  readonly hasExtendedHeader: boolean;
  /** Set only when the extended header is present */
  readonly regionLock: RegionLockout | undefined;
  readonly iconOffset: number;
  readonly icon: SrlIcon | undefined;
  readonly entries: EntryTable;

  private readonly shared: SharedSource;
  private readonly options: ReaderOptions;
  private readonly strategies: Map<string, ReconstructionStrategy>;
  private isClosed = false;

  constructor(source: ByteSource, options?: Partial<ReaderOptions>) {
    this.options = resolveReaderOptions(options);
    this.shared = new SharedSource(source);
    this.strategies = new Map(
      [iconPngStrategy, ...this.options.strategies].map(
        (strategy): [string, ReconstructionStrategy] => [strategy.format, strategy],
      ),
    );

    const header = this.shared.readAt(0, PRIMARY_HEADER_SIZE);
    if (header.length < PRIMARY_HEADER_SIZE) {
      this.releaseSource();
      throw new InvalidContainerError(
        `Header too short: ${header.length} bytes, expected ${PRIMARY_HEADER_SIZE}`,
      );
    }

    const primary = parsePrimaryHeader(header);
    this.appTitle = primary.appTitle;
    this.gameTitle = primary.gameTitle;
    this.gameCode = primary.gameCode;
    this.makerCode = primary.makerCode;
    this.unitCode = primary.unitCode;
    this.romSize = primary.romSize;
    this.headerSize = primary.headerSize;
    this.hasExtendedHeader = hasExtendedHeader(primary.unitCode);

    if (this.hasExtendedHeader) {
      const extended = this.shared.readAt(EXTENDED_HEADER_OFFSET, EXTENDED_HEADER_SIZE);
      if (extended.length < EXTENDED_HEADER_SIZE) {
        log.warn(
          `Extended header cut short: ${extended.length} of ${EXTENDED_HEADER_SIZE} bytes`,
        );
      }
      // A lockout byte past the end of the image reads as 0.
      this.regionLock = readRegionLockout(extended);
    }

    this.iconOffset = primary.iconOffset;

    const entries = headerEntries(header, this.hasExtendedHeader);
    // Offset 0 means the image carries no banner.
    if (this.options.loadIcon && this.iconOffset !== 0) {
      const result = this.loadIcon();
      if (result.ok) {
        this.icon = result.icon;
        entries.push({
          kind: 'reconstructed',
          path: ICON_PNG_ENTRY,
          format: ICON_PNG_FORMAT,
          metadata: { iconOffset: this.iconOffset },
        });
      } else {
        log.warn(`Icon block at 0x${this.iconOffset.toString(16)} ignored`, result.error);
      }
    }
    this.entries = new EntryTable(entries);
  }

  static fromFile(filePath: string, options?: Partial<ReaderOptions>): SrlReader {
    return new SrlReader(new FileSource(filePath), options);
  }

  static fromBuffer(
    data: ArrayBufferLike | Uint8Array,
    options?: Partial<ReaderOptions>,
  ): SrlReader {
    return new SrlReader(new BufferSource(data), options);
  }

  get entryCount(): number {
    return this.entries.size;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  open(path: string, { normalize = true }: OpenOptions = {}): EntryView {
    if (this.closed) throw new ReaderClosedError();
    const entry = this.entries.resolve(path, normalize);

    switch (entry.kind) {
      case 'direct':
        return new SubsectionView(this.shared, entry.offset, entry.size);
      case 'reconstructed': {
        const strategy = this.strategies.get(entry.format);
        if (!strategy) throw new ReconstructionUnavailableError(entry.format, entry.path);
        log.info(`Reconstructing ${entry.path} with ${entry.format}`);
        return new DecodedEntryView(strategy.reconstruct(entry, this.shared));
      }
    }
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.releaseSource();
  }

  toString(): string {
    return `<SrlReader ${this.gameTitle} (${this.gameCode})>`;
  }

  private loadIcon(): IconLoadResult {
    try {
      const view = new SubsectionView(this.shared, this.iconOffset, SRL_ICON_SIZE);
      return SrlIcon.tryLoad(withView(view, (v) => v.read()));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return {
        ok: false,
        error: new MalformedIconError(`Icon block unreadable: ${message}`, error),
      };
    }
  }

  private releaseSource(): void {
    if (this.options.closeSource) this.shared.close();
  }
}
