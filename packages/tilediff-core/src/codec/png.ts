/**
 * PNG boundary: decode files into grids and encode output grids.
 */

import { PNG } from 'pngjs';
import { NrgbaGrid } from '../image/grid';
import type { PixelGrid } from '../types/image';

/**
 * Decode PNG bytes into a straight-alpha grid.
 * @throws Error if the bytes are not a valid PNG
 */
export function decodePng(buffer: Buffer): NrgbaGrid {
  const png = PNG.sync.read(buffer);
  return new NrgbaGrid(png.width, png.height, png.data);
}

/**
 * Encode a grid as PNG bytes. Premultiplied grids are converted to straight alpha.
 */
export function encodePng(grid: PixelGrid): Buffer {
  const png = new PNG({ width: grid.width, height: grid.height });
  if (grid.format === 'nrgba') {
    png.data.set(grid.data);
  } else {
    for (let y = 0; y < grid.height; y++) {
      for (let x = 0; x < grid.width; x++) {
        const { r, g, b, a } = grid.getPixel(x, y);
        const i = (y * grid.width + x) * 4;
        png.data[i] = r;
        png.data[i + 1] = g;
        png.data[i + 2] = b;
        png.data[i + 3] = a;
      }
    }
  }
  return PNG.sync.write(png);
}
