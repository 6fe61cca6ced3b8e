import type { ReconstructionStrategy } from '@cartkit/core';

export interface ReaderOptions {
  /** Decode the icon block during construction */
  loadIcon: boolean;
  /** Close the byte source when the reader is closed */
  closeSource: boolean;
  /** Extra strategies for reconstructed entries; a matching format replaces the built-in one */
  strategies: ReconstructionStrategy[];
}

export const DEFAULT_READER_OPTIONS: ReaderOptions = {
  loadIcon: true,
  closeSource: true,
  strategies: [],
};

export function resolveReaderOptions(options?: Partial<ReaderOptions>): ReaderOptions {
  return { ...DEFAULT_READER_OPTIONS, ...options };
}
