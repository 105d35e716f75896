/**
 * Pixel grid packings.
 *
 * The diff kernel only sees the `PixelGrid` capability; the concrete packing is
 * chosen once, where the caller wraps its buffer.
 */

import type { Pixel, PixelFormat, PixelGrid } from '../types/image';

abstract class BaseGrid implements PixelGrid {
  abstract readonly format: PixelFormat;

  constructor(
    readonly width: number,
    readonly height: number,
    readonly data: Uint8Array
  ) {}

  protected offset(x: number, y: number): number {
    return (y * this.width + x) * 4;
  }

  abstract getPixel(x: number, y: number): Pixel;
  abstract setPixel(x: number, y: number, pixel: Pixel): void;
}

/**
 * Straight-alpha RGBA bytes (PNG's packing).
 */
export class NrgbaGrid extends BaseGrid {
  readonly format = 'nrgba';

  getPixel(x: number, y: number): Pixel {
    const i = this.offset(x, y);
    const d = this.data;
    return { r: d[i] ?? 0, g: d[i + 1] ?? 0, b: d[i + 2] ?? 0, a: d[i + 3] ?? 0 };
  }

  setPixel(x: number, y: number, { r, g, b, a }: Pixel): void {
    const i = this.offset(x, y);
    const d = this.data;
    d[i] = r;
    d[i + 1] = g;
    d[i + 2] = b;
    d[i + 3] = a;
  }
}

const unpremultiply = (c: number, a: number): number => Math.min(255, Math.round((c * 255) / a));
const premultiply = (c: number, a: number): number => Math.round((c * a) / 255);

/**
 * Premultiplied-alpha RGBA bytes (canvas/compositor packing).
 * Fully transparent pixels read back as transparent black.
 */
export class PremultipliedRgbaGrid extends BaseGrid {
  readonly format = 'rgba-premultiplied';

  getPixel(x: number, y: number): Pixel {
    const i = this.offset(x, y);
    const d = this.data;
    const a = d[i + 3] ?? 0;
    if (a === 0) return { r: 0, g: 0, b: 0, a: 0 };
    if (a === 255) return { r: d[i] ?? 0, g: d[i + 1] ?? 0, b: d[i + 2] ?? 0, a };
    return {
      r: unpremultiply(d[i] ?? 0, a),
      g: unpremultiply(d[i + 1] ?? 0, a),
      b: unpremultiply(d[i + 2] ?? 0, a),
      a,
    };
  }

  setPixel(x: number, y: number, { r, g, b, a }: Pixel): void {
    const i = this.offset(x, y);
    const d = this.data;
    d[i] = premultiply(r, a);
    d[i + 1] = premultiply(g, a);
    d[i + 2] = premultiply(b, a);
    d[i + 3] = a;
  }
}

/**
 * Wrap an existing RGBA buffer without copying.
 * @throws RangeError if the buffer length is not width * height * 4
 */
export function wrapPixels(
  data: Uint8Array,
  width: number,
  height: number,
  format: PixelFormat = 'nrgba'
): PixelGrid {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
    throw new RangeError(`Invalid grid dimensions: ${width}x${height}`);
  }
  if (data.length !== width * height * 4) {
    throw new RangeError(
      `Buffer length ${data.length} does not match ${width}x${height} RGBA (${width * height * 4} bytes)`
    );
  }
  return format === 'nrgba'
    ? new NrgbaGrid(width, height, data)
    : new PremultipliedRgbaGrid(width, height, data);
}

/**
 * Allocate a zero-filled (transparent) grid.
 */
export function createGrid(width: number, height: number, format: PixelFormat = 'nrgba'): PixelGrid {
  return wrapPixels(new Uint8Array(Math.max(0, width * height * 4)), width, height, format);
}
