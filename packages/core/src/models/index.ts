export type { DirectEntry, Entry, ReconstructedEntry } from './entry.js';
