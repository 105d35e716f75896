import { describe, expect, test } from 'vitest';
import type { Tile } from '../types/image';
import { partitionTiles, tileArea } from './tiling';

function coverage(width: number, height: number, tiles: Tile[]): number[] {
  const counts = new Array<number>(width * height).fill(0);
  for (const tile of tiles) {
    for (let y = tile.y; y < tile.y + tile.height; y++) {
      for (let x = tile.x; x < tile.x + tile.width; x++) {
        counts[y * width + x] = (counts[y * width + x] ?? 0) + 1;
      }
    }
  }
  return counts;
}

describe('partitionTiles', () => {
  test('splits row-major and shortens the last row and column', () => {
    const tiles = partitionTiles(10, 7, 4, 3);
    expect(tiles).toHaveLength(9);
    expect(tiles[0]).toEqual({ x: 0, y: 0, width: 4, height: 3 });
    expect(tiles[2]).toEqual({ x: 8, y: 0, width: 2, height: 3 });
    expect(tiles[8]).toEqual({ x: 8, y: 6, width: 2, height: 1 });
  });

  test('covers every pixel exactly once', () => {
    for (const [w, h, tw, th] of [
      [10, 7, 4, 3],
      [5, 5, 1, 1],
      [17, 3, 16, 16],
      [1, 9, 2, 2],
    ] as const) {
      const tiles = partitionTiles(w, h, tw, th);
      expect(coverage(w, h, tiles).every((count) => count === 1)).toBe(true);
      expect(tiles.reduce((sum, tile) => sum + tileArea(tile), 0)).toBe(w * h);
    }
  });

  test('a plane smaller than the tile extent is a single tile', () => {
    expect(partitionTiles(4, 4, 256, 256)).toEqual([{ x: 0, y: 0, width: 4, height: 4 }]);
    expect(partitionTiles(1, 1, 256, 256)).toEqual([{ x: 0, y: 0, width: 1, height: 1 }]);
  });

  test('1x1 tiles give one tile per pixel', () => {
    expect(partitionTiles(3, 2, 1, 1)).toHaveLength(6);
  });

  test('non-positive tile extents are clamped to 1', () => {
    expect(partitionTiles(2, 2, 0, -3)).toHaveLength(4);
  });

  test('an empty plane has no tiles', () => {
    expect(partitionTiles(0, 5, 4, 4)).toEqual([]);
    expect(partitionTiles(5, 0, 4, 4)).toEqual([]);
  });
});
