import type { ByteSource } from '../ports/byte-source.js';
import { assertRange } from './range.js';

export class BufferSource implements ByteSource {
  private bytes: Uint8Array;

  constructor(data: ArrayBufferLike | Uint8Array) {
    this.bytes = data instanceof Uint8Array ? data : new Uint8Array(data);
  }

  get size(): number {
    return this.bytes.length;
  }

  readAt(position: number, length: number): Uint8Array {
    assertRange(position, length);
    return this.bytes.slice(position, position + length);
  }

  close(): void {
    this.bytes = new Uint8Array(0);
  }
}
