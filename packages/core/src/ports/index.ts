export type { ByteSource } from './byte-source.js';
export type { ReconstructionStrategy } from './reconstruction.js';
