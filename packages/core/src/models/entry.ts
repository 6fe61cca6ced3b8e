export interface DirectEntry {
  readonly kind: 'direct';
  readonly path: string;
  readonly offset: number;
  readonly size: number;
}

export interface ReconstructedEntry {
  readonly kind: 'reconstructed';
  readonly path: string;
  /** Key of the reconstruction strategy that rebuilds this entry */
  readonly format: string;
  readonly metadata: Readonly<Record<string, string | number>>;
}

export type Entry = DirectEntry | ReconstructedEntry;
