import { describe, expect, test } from 'vitest';
import type { Pixel } from '../types/image';
import { BLACK, GRAY, gridFrom, gridFromRows, solidGrid, WHITE } from '../test-utils/grids';
import { isAntialiased } from './antialiasing';

const palette = { B: BLACK, G: GRAY, W: WHITE };

// hard vertical edge vs. the same edge with a gray transition column at x = 2
const hard = gridFromRows(Array<string>(6).fill('BBBWWW'), palette);
const smooth = gridFromRows(Array<string>(6).fill('BBGWWW'), palette);

describe('isAntialiased', () => {
  test('gray transition pixels between two flat areas are anti-aliasing', () => {
    for (let y = 0; y < 6; y++) {
      expect(isAntialiased(smooth, 2, y, hard)).toBe(true);
    }
  });

  test('the hard edge pixel itself sits in a flat area', () => {
    for (let y = 0; y < 6; y++) {
      expect(isAntialiased(hard, 2, y, smooth)).toBe(false);
    }
  });

  test('flat areas are never anti-aliasing', () => {
    const flat = solidGrid(3, 3, WHITE);
    expect(isAntialiased(flat, 1, 1, flat)).toBe(false);
    expect(isAntialiased(flat, 0, 0, flat)).toBe(false);
  });

  test('an isolated dark pixel has no brighter neighbor', () => {
    const dot = gridFromRows(['WWW', 'WBW', 'WWW'], palette);
    expect(isAntialiased(dot, 1, 1, solidGrid(3, 3, WHITE))).toBe(false);
  });

  test('a smooth gradient without flat neighbors is a real change', () => {
    const levels = [0, 60, 120, 180, 240];
    const gradient = gridFrom(5, 5, (x): Pixel => {
      const v = levels[x] ?? 0;
      return { r: v, g: v, b: v, a: 255 };
    });
    expect(isAntialiased(gradient, 2, 2, gradient)).toBe(false);
  });

  test('the extreme neighbor must be flat in both images', () => {
    // every pixel of the other image has a distinct color, so nothing is flat there
    const unique = gridFrom(6, 6, (x, y): Pixel => {
      const v = (x * 6 + y) * 7;
      return { r: v, g: v, b: v, a: 255 };
    });
    expect(isAntialiased(smooth, 2, 2, hard)).toBe(true);
    expect(isAntialiased(smooth, 2, 2, unique)).toBe(false);
  });
});
