/**
 * Output pixel painting
 */

import type { DiffOptions } from '../config/schema';
import type { Pixel } from '../types/image';
import { blend, rgb2y } from './yiq';

/**
 * Classification of one compared pixel.
 * - `same`: below threshold
 * - `antialiased`: above threshold but explained by anti-aliasing
 * - `diff`: a real difference
 */
export type PixelClass = { kind: 'same' } | { kind: 'antialiased' } | { kind: 'diff' };

/**
 * Grayscale background pixel: the luma of `pixel` blended toward white by
 * `alpha` scaled with the pixel's own opacity.
 */
export function grayPixel({ r, g, b, a }: Pixel, alpha: number): Pixel {
  const value = Math.min(255, Math.max(0, Math.floor(blend(rgb2y(r, g, b), (alpha * a) / 255))));
  return { r: value, g: value, b: value, a: 255 };
}

/**
 * Pick the output color for a classified pixel.
 * Returns `null` when the output pixel must stay untouched (mask mode).
 */
export function compositePixel(
  source: Pixel,
  classification: PixelClass,
  options: Readonly<DiffOptions>
): Pixel | null {
  switch (classification.kind) {
    case 'antialiased':
      // anti-aliased pixels are not part of a mask
      return options.diffMask ? null : options.aaColor;
    case 'diff':
      // diffColorAlt is carried in the options but never painted
      return options.diffColor;
    case 'same':
      return options.diffMask ? null : grayPixel(source, options.alpha);
  }
}
