import { ViewClosedError } from '../exceptions.js';
import { type EntryView, resolveSeek, type SeekOrigin } from './entry-view.js';
import type { SharedSource } from './shared-source.js';

/**
 * A window of `length` bytes at `baseOffset` in a shared source.
 * Positions are local to the window and translated on every read.
 */
export class SubsectionView implements EntryView {
  private position = 0;
  private isClosed = false;

  constructor(
    private readonly shared: SharedSource,
    readonly baseOffset: number,
    readonly length: number,
  ) {
    if (!Number.isSafeInteger(baseOffset) || baseOffset < 0) {
      throw new RangeError(`Invalid subsection offset: ${baseOffset}`);
    }
    if (!Number.isSafeInteger(length) || length < 0) {
      throw new RangeError(`Invalid subsection length: ${length}`);
    }
  }

  get size(): number {
    return this.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  read(length?: number): Uint8Array {
    this.assertOpen();
    const remaining = this.length - this.position;
    const wanted = length === undefined || length < 0 ? remaining : Math.min(length, remaining);
    if (wanted <= 0) return new Uint8Array(0);

    const bytes = this.shared.readAt(this.baseOffset + this.position, wanted);
    this.position += bytes.length;
    return bytes;
  }

  readAll(): Uint8Array {
    this.seek(0);
    return this.read();
  }

  seek(offset: number, origin: SeekOrigin = 'start'): number {
    this.assertOpen();
    this.position = resolveSeek(offset, origin, this.position, this.length);
    return this.position;
  }

  tell(): number {
    this.assertOpen();
    return this.position;
  }

  /** Closes this view only; the shared source stays open. */
  close(): void {
    this.isClosed = true;
  }

  private assertOpen(): void {
    if (this.isClosed) throw new ViewClosedError();
  }
}
