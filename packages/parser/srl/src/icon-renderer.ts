import { PNG } from 'pngjs';
import {
  ICON_HEIGHT,
  ICON_TILE_SIZE,
  ICON_WIDTH,
  PALETTE_SIZE,
  SMALL_ICON_SIZE,
} from './constants.js';
import { MalformedIconError } from './exceptions.js';
import type { SrlIcon } from './icon.js';

const TILES_PER_ROW = ICON_WIDTH / ICON_TILE_SIZE;
const TILE_BYTES = (ICON_TILE_SIZE * ICON_TILE_SIZE) / 2;

function expand5to8(n: number): number {
  return (n << 3) | (n >>> 2);
}

/** RGBA 32x32 pixels from a 4bpp tiled bitmap and a BGR555 palette; index 0 is transparent. */
export function decodeIconPixels(smallIcon: Uint8Array, palette: Uint8Array): Uint8Array {
  if (smallIcon.length < SMALL_ICON_SIZE || palette.length < PALETTE_SIZE) {
    throw new MalformedIconError('Icon bitmap or palette too short');
  }

  const pal = new DataView(palette.buffer, palette.byteOffset, PALETTE_SIZE);
  const pixels = new Uint8Array(ICON_WIDTH * ICON_HEIGHT * 4);

  for (let y = 0; y < ICON_HEIGHT; y++) {
    for (let x = 0; x < ICON_WIDTH; x++) {
      const tile = Math.floor(y / ICON_TILE_SIZE) * TILES_PER_ROW + Math.floor(x / ICON_TILE_SIZE);
      const inTile = (y % ICON_TILE_SIZE) * ICON_TILE_SIZE + (x % ICON_TILE_SIZE);
      const packed = smallIcon[tile * TILE_BYTES + (inTile >>> 1)];
      const index = inTile & 1 ? packed >>> 4 : packed & 0x0f;

      const color = pal.getUint16(index * 2, true);
      const dst = 4 * (y * ICON_WIDTH + x);
      pixels[dst + 0] = expand5to8(color & 0x1f);
      pixels[dst + 1] = expand5to8((color >>> 5) & 0x1f);
      pixels[dst + 2] = expand5to8((color >>> 10) & 0x1f);
      pixels[dst + 3] = index === 0 ? 0x00 : 0xff;
    }
  }

  return pixels;
}

export function renderIconPng(icon: SrlIcon): Uint8Array {
  const png = new PNG({ width: ICON_WIDTH, height: ICON_HEIGHT });
  png.data.set(decodeIconPixels(icon.smallIcon, icon.palette));
  return new Uint8Array(PNG.sync.write(png));
}
