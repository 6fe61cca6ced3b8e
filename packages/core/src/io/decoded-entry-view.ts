import { ViewClosedError } from '../exceptions.js';
import { type EntryView, resolveSeek, type SeekOrigin } from './entry-view.js';

/** EntryView over bytes that were rebuilt in memory rather than read as one range. */
export class DecodedEntryView implements EntryView {
  private position = 0;
  private isClosed = false;

  constructor(private readonly data: Uint8Array) {}

  get size(): number {
    return this.data.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  read(length?: number): Uint8Array {
    this.assertOpen();
    const end =
      length === undefined || length < 0
        ? this.data.length
        : Math.min(this.data.length, this.position + length);
    const bytes = this.data.slice(this.position, end);
    this.position += bytes.length;
    return bytes;
  }

  readAll(): Uint8Array {
    this.seek(0);
    return this.read();
  }

  seek(offset: number, origin: SeekOrigin = 'start'): number {
    this.assertOpen();
    this.position = resolveSeek(offset, origin, this.position, this.data.length);
    return this.position;
  }

  tell(): number {
    this.assertOpen();
    return this.position;
  }

  close(): void {
    this.isClosed = true;
  }

  private assertOpen(): void {
    if (this.isClosed) throw new ViewClosedError();
  }
}
