import type { Tile } from '../types/image';

/**
 * Split a width x height plane into row-major tiles of at most
 * tileWidth x tileHeight. The last column and row are shortened to fit, so
 * every pixel belongs to exactly one tile.
 *
 * An empty plane yields no tiles.
 */
export function partitionTiles(
  width: number,
  height: number,
  tileWidth: number,
  tileHeight: number
): Tile[] {
  if (width <= 0 || height <= 0) return [];

  const stepX = Math.min(Math.max(1, Math.floor(tileWidth)), width);
  const stepY = Math.min(Math.max(1, Math.floor(tileHeight)), height);
  const tiles: Tile[] = [];

  for (let y = 0; y < height; y += stepY) {
    for (let x = 0; x < width; x += stepX) {
      tiles.push({
        x,
        y,
        width: Math.min(stepX, width - x),
        height: Math.min(stepY, height - y),
      });
    }
  }

  return tiles;
}

export function tileArea(tile: Tile): number {
  return tile.width * tile.height;
}
