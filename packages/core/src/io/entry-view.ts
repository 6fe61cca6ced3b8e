export type SeekOrigin = 'start' | 'current' | 'end';

/** Read-only, independently seekable handle onto one entry's bytes. */
export interface EntryView {
  readonly size: number;
  readonly closed: boolean;
  read(length?: number): Uint8Array;
  readAll(): Uint8Array;
  seek(offset: number, origin?: SeekOrigin): number;
  tell(): number;
  close(): void;
}

export function resolveSeek(
  offset: number,
  origin: SeekOrigin,
  position: number,
  size: number,
): number {
  if (!Number.isSafeInteger(offset)) {
    throw new RangeError(`Invalid seek offset: ${offset}`);
  }
  const base = origin === 'start' ? 0 : origin === 'current' ? position : size;
  return Math.min(Math.max(base + offset, 0), size);
}

/** Run `fn` with `view`, closing the view afterwards even if `fn` throws. */
export function withView<V extends EntryView, T>(view: V, fn: (view: V) => T): T {
  try {
    return fn(view);
  } finally {
    view.close();
  }
}
