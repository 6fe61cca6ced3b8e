import {
  type ReconstructedEntry,
  type ReconstructionStrategy,
  type SharedSource,
  SubsectionView,
  withView,
} from '@cartkit/core';
import { ICON_PNG_FORMAT, SRL_ICON_SIZE } from './constants.js';
import { SrlIcon } from './icon.js';
import { renderIconPng } from './icon-renderer.js';

function iconOffsetOf(entry: ReconstructedEntry): number {
  const offset = entry.metadata.iconOffset;
  if (typeof offset !== 'number') {
    throw new Error(`Entry ${entry.path} has no icon offset`);
  }
  return offset;
}

/** Renders the icon block's 32x32 bitmap as a PNG. */
export const iconPngStrategy: ReconstructionStrategy = {
  format: ICON_PNG_FORMAT,
  reconstruct(entry: ReconstructedEntry, source: SharedSource): Uint8Array {
    const view = new SubsectionView(source, iconOffsetOf(entry), SRL_ICON_SIZE);
    const icon = withView(view, (v) => SrlIcon.load(v.read()));
    return renderIconPng(icon);
  },
};
