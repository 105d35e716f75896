/**
 * NTSC YIQ conversion used by the perceptual delta.
 */

import type { Pixel } from '../types/image';

export interface Yiq {
  y: number;
  i: number;
  q: number;
}

export function rgb2y(r: number, g: number, b: number): number {
  return r * 0.29889531 + g * 0.58662247 + b * 0.11448223;
}

export function rgb2i(r: number, g: number, b: number): number {
  return r * 0.59597799 - g * 0.2741761 - b * 0.32180189;
}

export function rgb2q(r: number, g: number, b: number): number {
  return r * 0.21147017 - g * 0.52261711 + b * 0.31114694;
}

/**
 * Blend a channel toward white; `a` is an opacity in 0..1.
 */
export function blend(c: number, a: number): number {
  return 255 + (c - 255) * a;
}

/**
 * Convert a pixel to YIQ, compositing it over white when not fully opaque.
 */
export function toYiq({ r, g, b, a }: Pixel): Yiq {
  if (a < 255) {
    const opacity = a / 255;
    r = blend(r, opacity);
    g = blend(g, opacity);
    b = blend(b, opacity);
  }
  return { y: rgb2y(r, g, b), i: rgb2i(r, g, b), q: rgb2q(r, g, b) };
}
