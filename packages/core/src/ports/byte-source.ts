export interface ByteSource {
  /** Total number of readable bytes */
  readonly size: number;

  /**
   * Read up to `length` bytes starting at `position`.
   * Returns fewer bytes (possibly none) when the range runs past the end.
   */
  readAt(position: number, length: number): Uint8Array;

  /** Release the underlying handle */
  close(): void;
}
