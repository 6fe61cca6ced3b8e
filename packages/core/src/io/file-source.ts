import * as fs from 'node:fs';
import type { ByteSource } from '../ports/byte-source.js';
import { assertRange } from './range.js';

/** Positional reads against a file descriptor; no shared cursor. */
export class FileSource implements ByteSource {
  private fd: number | null;
  readonly size: number;

  constructor(readonly filePath: string) {
    const fd = fs.openSync(filePath, 'r');
    try {
      this.size = fs.fstatSync(fd).size;
    } catch (error) {
      fs.closeSync(fd);
      throw error;
    }
    this.fd = fd;
  }

  readAt(position: number, length: number): Uint8Array {
    assertRange(position, length);
    const fd = this.fd;
    if (fd === null) {
      throw new Error(`File already closed: ${this.filePath}`);
    }
    const available = Math.max(0, Math.min(length, this.size - position));
    const buffer = new Uint8Array(available);
    let filled = 0;
    while (filled < available) {
      const read = fs.readSync(fd, buffer, filled, available - filled, position + filled);
      if (read === 0) break;
      filled += read;
    }
    return filled === available ? buffer : buffer.slice(0, filled);
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    fs.closeSync(fd);
  }
}
