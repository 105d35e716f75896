import type { PixelGrid } from '../types/image';
import { pixelsEqual } from './delta';

/**
 * The 3x3 window around a pixel, clamped to the plane.
 */
export interface Neighborhood {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
  /**
   * 1 when the window was clipped by any side of the plane, else 0.
   * Counted as a virtual equal neighbor by both scans.
   */
  edgeSeed: 0 | 1;
}

export function neighborhood(x: number, y: number, width: number, height: number): Neighborhood {
  const x0 = Math.max(x - 1, 0);
  const y0 = Math.max(y - 1, 0);
  const x1 = Math.min(x + 1, width - 1);
  const y1 = Math.min(y + 1, height - 1);
  const edgeSeed = x === x0 || x === x1 || y === y0 || y === y1 ? 1 : 0;
  return { x0, y0, x1, y1, edgeSeed };
}

/**
 * Whether the pixel has 3+ adjacent pixels of exactly the same color.
 */
export function hasManySiblings(grid: PixelGrid, x: number, y: number): boolean {
  const { x0, y0, x1, y1, edgeSeed } = neighborhood(x, y, grid.width, grid.height);
  const center = grid.getPixel(x, y);
  let zeroes: number = edgeSeed;

  for (let nx = x0; nx <= x1; nx++) {
    for (let ny = y0; ny <= y1; ny++) {
      if (nx === x && ny === y) continue;
      if (pixelsEqual(center, grid.getPixel(nx, ny))) zeroes++;
      if (zeroes > 2) return true;
    }
  }

  return false;
}
