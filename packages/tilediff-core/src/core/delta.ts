/**
 * Perceptual color difference from "Measuring perceived color difference using
 * YIQ NTSC transmission color space in mobile applications" (Kotsarenko, Ramos).
 */

import type { Pixel } from '../types/image';
import { toYiq } from './yiq';

/**
 * Largest possible magnitude of `colorDelta` in full mode.
 */
export const MAX_YIQ_DELTA = 35215;

export function pixelsEqual(p1: Pixel, p2: Pixel): boolean {
  return p1.r === p2.r && p1.g === p2.g && p1.b === p2.b && p1.a === p2.a;
}

/**
 * Signed distance between two pixels.
 *
 * With `yOnly` the result is the plain luma difference `Y1 - Y2`. Otherwise it is
 * the weighted squared YIQ distance, negative when `p1` is brighter than `p2`
 * (the second pixel is darker).
 */
export function colorDelta(p1: Pixel, p2: Pixel, yOnly = false): number {
  if (pixelsEqual(p1, p2)) return 0;

  const c1 = toYiq(p1);
  const c2 = toYiq(p2);
  const y = c1.y - c2.y;

  // brightness difference only
  if (yOnly) return y;

  const i = c1.i - c2.i;
  const q = c1.q - c2.q;
  const delta = 0.5053 * y * y + 0.299 * i * i + 0.1957 * q * q;

  return c1.y > c2.y ? -delta : delta;
}

/**
 * Maximum acceptable squared distance for a threshold in 0..1.
 */
export function maxDelta(threshold: number): number {
  return MAX_YIQ_DELTA * threshold * threshold;
}
