/**
 * Anti-aliased pixel detection after "Anti-aliased Pixel and Intensity Slope
 * Detector" (V. Vysniauskas, 2009).
 */

import type { PixelGrid } from '../types/image';
import { colorDelta } from './delta';
import { hasManySiblings, neighborhood } from './siblings';

/**
 * Check whether the pixel at (x, y) of `image` looks like part of an
 * anti-aliased edge. `other` is the image it is being compared against.
 */
export function isAntialiased(image: PixelGrid, x: number, y: number, other: PixelGrid): boolean {
  const { x0, y0, x1, y1, edgeSeed } = neighborhood(x, y, image.width, image.height);
  const center = image.getPixel(x, y);
  let zeroes: number = edgeSeed;
  let min = 0;
  let max = 0;
  let minX = 0;
  let minY = 0;
  let maxX = 0;
  let maxY = 0;

  for (let nx = x0; nx <= x1; nx++) {
    for (let ny = y0; ny <= y1; ny++) {
      if (nx === x && ny === y) continue;

      // brightness delta between the center pixel and this neighbor
      const delta = colorDelta(center, image.getPixel(nx, ny), true);

      if (delta === 0) {
        zeroes++;
        // more than 2 equal siblings: flat area, not anti-aliasing
        if (zeroes > 2) return false;
      } else if (delta < min) {
        min = delta;
        minX = nx;
        minY = ny;
      } else if (delta > max) {
        max = delta;
        maxX = nx;
        maxY = ny;
      }
    }
  }

  // needs both a darker and a brighter neighbor
  if (min === 0 || max === 0) return false;

  // the pixel is anti-aliased if the darkest or the brightest neighbor sits in a
  // flat area of both images
  return (
    (hasManySiblings(image, minX, minY) && hasManySiblings(other, minX, minY)) ||
    (hasManySiblings(image, maxX, maxY) && hasManySiblings(other, maxX, maxY))
  );
}
