import { SourceClosedError } from '../exceptions.js';
import type { ByteSource } from '../ports/byte-source.js';
import { ExclusiveLock } from './exclusive-lock.js';

/**
 * Sole owner of a ByteSource. Every read goes through `readAt` under the lock;
 * views keep a reference to this object, never to the source itself.
 */
export class SharedSource {
  private readonly lock = new ExclusiveLock();
  private isClosed = false;

  constructor(private readonly source: ByteSource) {}

  get size(): number {
    return this.source.size;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  get locked(): boolean {
    return this.lock.held;
  }

  readAt(position: number, length: number): Uint8Array {
    if (this.isClosed) throw new SourceClosedError();
    return this.lock.run(() => this.source.readAt(position, length));
  }

  close(): void {
    if (this.isClosed) return;
    this.lock.run(() => this.source.close());
    this.isClosed = true;
  }
}
