import { describe, expect, test } from 'vitest';
import type { Pixel } from '../types/image';
import { colorDelta, MAX_YIQ_DELTA, maxDelta, pixelsEqual } from './delta';

const white: Pixel = { r: 255, g: 255, b: 255, a: 255 };
const black: Pixel = { r: 0, g: 0, b: 0, a: 255 };
const red: Pixel = { r: 255, g: 0, b: 0, a: 255 };
const teal: Pixel = { r: 0, g: 128, b: 128, a: 255 };

describe('colorDelta', () => {
  test('is zero for identical pixels', () => {
    for (const p of [white, black, red, teal, { r: 12, g: 34, b: 56, a: 78 }]) {
      expect(colorDelta(p, p)).toBe(0);
      expect(colorDelta(p, p, true)).toBe(0);
    }
  });

  test('white to black is negative (second pixel darker)', () => {
    expect(colorDelta(white, black)).toBeCloseTo(-32857.13, 1);
  });

  test('black to white is positive', () => {
    expect(colorDelta(black, white)).toBeCloseTo(32857.13, 1);
  });

  test('is antisymmetric when lumas differ', () => {
    const pairs: Array<[Pixel, Pixel]> = [
      [white, black],
      [red, teal],
      [teal, { r: 10, g: 200, b: 30, a: 255 }],
      [{ r: 40, g: 40, b: 40, a: 128 }, red],
    ];
    for (const [a, b] of pairs) {
      expect(colorDelta(a, b)).toBeCloseTo(-colorDelta(b, a), 9);
      expect(colorDelta(a, b, true)).toBeCloseTo(-colorDelta(b, a, true), 9);
    }
  });

  test('luma-only mode returns the plain luma difference', () => {
    expect(colorDelta(white, black, true)).toBeCloseTo(255, 4);
    expect(colorDelta(black, red, true)).toBeCloseTo(-76.21830405, 6);
  });

  test('transparent pixels compare equal to white', () => {
    expect(colorDelta({ r: 0, g: 0, b: 0, a: 0 }, white)).toBe(0);
  });

  test('never exceeds the documented maximum', () => {
    expect(Math.abs(colorDelta(white, black))).toBeLessThanOrEqual(MAX_YIQ_DELTA);
    expect(Math.abs(colorDelta({ r: 0, g: 255, b: 0, a: 255 }, { r: 255, g: 0, b: 255, a: 255 }))).toBeLessThanOrEqual(MAX_YIQ_DELTA);
  });
});

describe('maxDelta', () => {
  test('scales the maximum by the squared threshold', () => {
    expect(maxDelta(0.1)).toBeCloseTo(352.15, 6);
    expect(maxDelta(1)).toBe(MAX_YIQ_DELTA);
    expect(maxDelta(0)).toBe(0);
  });
});

describe('pixelsEqual', () => {
  test('compares all four channels', () => {
    expect(pixelsEqual(red, { ...red })).toBe(true);
    expect(pixelsEqual(red, { ...red, a: 254 })).toBe(false);
  });
});
