/**
 * In-memory grids for tests
 */

import { createGrid } from '../image/grid';
import type { Pixel, PixelFormat, PixelGrid } from '../types/image';

export const WHITE: Pixel = { r: 255, g: 255, b: 255, a: 255 };
export const BLACK: Pixel = { r: 0, g: 0, b: 0, a: 255 };
export const GRAY: Pixel = { r: 128, g: 128, b: 128, a: 255 };
export const RED: Pixel = { r: 255, g: 0, b: 0, a: 255 };

/**
 * Build a grid from rows of palette keys, e.g. `['WB', 'BW']`.
 */
export function gridFromRows(
  rows: string[],
  palette: Record<string, Pixel>,
  format: PixelFormat = 'nrgba'
): PixelGrid {
  const height = rows.length;
  const width = rows[0]?.length ?? 0;
  const grid = createGrid(width, height, format);
  rows.forEach((row, y) => {
    [...row].forEach((key, x) => {
      const pixel = palette[key];
      if (!pixel) throw new Error(`No palette entry for "${key}"`);
      grid.setPixel(x, y, pixel);
    });
  });
  return grid;
}

export function solidGrid(width: number, height: number, pixel: Pixel): PixelGrid {
  const grid = createGrid(width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      grid.setPixel(x, y, pixel);
    }
  }
  return grid;
}

/**
 * Grid filled by `fn(x, y)`.
 */
export function gridFrom(
  width: number,
  height: number,
  fn: (x: number, y: number) => Pixel
): PixelGrid {
  const grid = createGrid(width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      grid.setPixel(x, y, fn(x, y));
    }
  }
  return grid;
}

/**
 * Deterministic pseudo-random pixels (LCG) with a small palette, so equal
 * neighbors and anti-aliasing candidates both occur.
 */
export function noiseGrid(width: number, height: number, seed: number): PixelGrid {
  const palette = [WHITE, BLACK, GRAY, RED, { r: 200, g: 200, b: 200, a: 255 }];
  let state = seed >>> 0;
  return gridFrom(width, height, () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return palette[state % palette.length] ?? WHITE;
  });
}

/**
 * Copy of a grid with `fn` applied to every pixel.
 */
export function mapGrid(
  source: PixelGrid,
  fn: (pixel: Pixel, x: number, y: number) => Pixel
): PixelGrid {
  return gridFrom(source.width, source.height, (x, y) => fn(source.getPixel(x, y), x, y));
}
