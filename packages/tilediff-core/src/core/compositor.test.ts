import { describe, expect, test } from 'vitest';
import { mergeDiffOptions } from '../config/loader';
import { BLACK, RED, WHITE } from '../test-utils/grids';
import { compositePixel, grayPixel } from './compositor';

describe('grayPixel', () => {
  test('blends the luma toward white by alpha', () => {
    expect(grayPixel(RED, 0.1)).toEqual({ r: 237, g: 237, b: 237, a: 255 });
    expect(grayPixel(BLACK, 0.1)).toEqual({ r: 229, g: 229, b: 229, a: 255 });
    expect(grayPixel(WHITE, 0.1)).toEqual({ r: 255, g: 255, b: 255, a: 255 });
  });

  test('alpha 1 keeps the full luma', () => {
    expect(grayPixel(BLACK, 1)).toEqual({ r: 0, g: 0, b: 0, a: 255 });
  });

  test('transparent source pixels become white', () => {
    expect(grayPixel({ r: 0, g: 0, b: 0, a: 0 }, 0.5)).toEqual({ r: 255, g: 255, b: 255, a: 255 });
  });
});

describe('compositePixel', () => {
  const defaults = mergeDiffOptions();
  const masked = mergeDiffOptions({ diffMask: true });
  const withAlt = mergeDiffOptions({ diffColorAlt: { r: 0, g: 0, b: 255, a: 255 } });

  test('anti-aliased pixels use aaColor unless masking', () => {
    expect(compositePixel(WHITE, { kind: 'antialiased' }, defaults)).toEqual({
      r: 255,
      g: 255,
      b: 0,
      a: 255,
    });
    expect(compositePixel(WHITE, { kind: 'antialiased' }, masked)).toBeNull();
  });

  test('differences use diffColor, also in mask mode', () => {
    expect(compositePixel(WHITE, { kind: 'diff' }, defaults)).toEqual(RED);
    expect(compositePixel(WHITE, { kind: 'diff' }, masked)).toEqual(RED);
  });

  test('a configured diffColorAlt is not painted', () => {
    expect(compositePixel(WHITE, { kind: 'diff' }, withAlt)).toEqual(RED);
  });

  test('unchanged pixels get the gray background unless masking', () => {
    expect(compositePixel(BLACK, { kind: 'same' }, defaults)).toEqual({
      r: 229,
      g: 229,
      b: 229,
      a: 255,
    });
    expect(compositePixel(BLACK, { kind: 'same' }, masked)).toBeNull();
  });
});
