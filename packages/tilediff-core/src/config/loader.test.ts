import { describe, expect, test } from 'vitest';
import { DEFAULT_DIFF_OPTIONS } from './defaults';
import { loadDiffOptions, mergeDiffOptions, parseColor } from './loader';

describe('mergeDiffOptions', () => {
  test('returns the defaults when nothing is given', () => {
    expect(mergeDiffOptions()).toEqual(DEFAULT_DIFF_OPTIONS);
  });

  test('overrides only the given keys', () => {
    const options = mergeDiffOptions({ threshold: 0.3, diffMask: true });
    expect(options.threshold).toBe(0.3);
    expect(options.diffMask).toBe(true);
    expect(options.alpha).toBe(0.1);
    expect(options.diffColorAlt).toBeNull();
  });

  test('keeps defaults for keys set to undefined', () => {
    expect(mergeDiffOptions({ threshold: undefined }).threshold).toBe(0.1);
  });

  test('returns a frozen snapshot', () => {
    const options = mergeDiffOptions();
    expect(Object.isFrozen(options)).toBe(true);
    expect(Object.isFrozen(options.diffColor)).toBe(true);
  });

  test('rejects out-of-range values', () => {
    expect(() => mergeDiffOptions({ threshold: 1.5 })).toThrow();
    expect(() => mergeDiffOptions({ tileWidth: 0 })).toThrow();
    expect(() => mergeDiffOptions({ concurrency: 1.5 })).toThrow();
    expect(() => mergeDiffOptions({ aaColor: { r: 256, g: 0, b: 0, a: 255 } })).toThrow();
  });
});

describe('loadDiffOptions', () => {
  test('falls back to defaults for an empty environment', () => {
    expect(loadDiffOptions({})).toEqual(DEFAULT_DIFF_OPTIONS);
  });

  test('reads every supported variable', () => {
    const options = loadDiffOptions({
      TILEDIFF_THRESHOLD: '0.25',
      TILEDIFF_INCLUDE_AA: 'true',
      TILEDIFF_ALPHA: '0.5',
      TILEDIFF_DIFF_MASK: '1',
      TILEDIFF_TILE_SIZE: '64',
      TILEDIFF_CONCURRENCY: '8',
    });
    expect(options).toMatchObject({
      threshold: 0.25,
      includeAA: true,
      alpha: 0.5,
      diffMask: true,
      tileWidth: 64,
      tileHeight: 64,
      concurrency: 8,
    });
  });

  test('treats blank values as unset', () => {
    expect(loadDiffOptions({ TILEDIFF_THRESHOLD: '' }).threshold).toBe(0.1);
  });

  test('rejects malformed values', () => {
    expect(() => loadDiffOptions({ TILEDIFF_THRESHOLD: 'abc' })).toThrow();
    expect(() => loadDiffOptions({ TILEDIFF_INCLUDE_AA: 'yes' })).toThrow();
    expect(() => loadDiffOptions({ TILEDIFF_TILE_SIZE: '2.5' })).toThrow();
  });
});

describe('parseColor', () => {
  test('parses rgb with an opaque default alpha', () => {
    expect(parseColor('255,0,0')).toEqual({ r: 255, g: 0, b: 0, a: 255 });
  });

  test('parses rgba with spaces', () => {
    expect(parseColor(' 0, 128 ,255, 64')).toEqual({ r: 0, g: 128, b: 255, a: 64 });
  });

  test('rejects malformed strings', () => {
    expect(() => parseColor('red')).toThrow('Invalid color "red": expected r,g,b or r,g,b,a');
    expect(() => parseColor('1,2')).toThrow();
    expect(() => parseColor('1,2,3,4,5')).toThrow();
  });

  test('rejects channels above 255', () => {
    expect(() => parseColor('300,0,0')).toThrow();
  });
});
