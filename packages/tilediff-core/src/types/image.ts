/**
 * Pixel and grid types shared by the diff kernel
 */

/**
 * One 8-bit RGBA pixel with straight (non-premultiplied) alpha.
 */
export interface Pixel {
  r: number;
  g: number;
  b: number;
  a: number;
}

/**
 * Byte packing of a grid's backing buffer.
 * - `nrgba`: straight alpha, as decoded from PNG
 * - `rgba-premultiplied`: color channels stored multiplied by alpha
 */
export type PixelFormat = 'nrgba' | 'rgba-premultiplied';

/**
 * Readable and writable rectangular pixel grid.
 * `getPixel` and `setPixel` always speak straight alpha, whatever the packing.
 */
export interface PixelGrid {
  readonly width: number;
  readonly height: number;
  readonly format: PixelFormat;
  /** Backing bytes, `width * height * 4` long */
  readonly data: Uint8Array;
  getPixel(x: number, y: number): Pixel;
  setPixel(x: number, y: number, pixel: Pixel): void;
}

/**
 * Axis-aligned rectangle of the image plane owned by one task.
 */
export interface Tile {
  x: number;
  y: number;
  width: number;
  height: number;
}
