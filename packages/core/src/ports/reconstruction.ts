import type { ReconstructedEntry } from '../models/entry.js';
import type { SharedSource } from '../io/shared-source.js';

export interface ReconstructionStrategy {
  /** Matches `ReconstructedEntry.format` */
  readonly format: string;

  /** Produce the full contents of an entry that is not stored as one byte range */
  reconstruct(entry: ReconstructedEntry, source: SharedSource): Uint8Array;
}
