/**
 * Default configuration values
 */

import type { DiffOptions } from './schema';

/**
 * Default diff options.
 * Frozen: callers get their own snapshot through `mergeDiffOptions`.
 */
export const DEFAULT_DIFF_OPTIONS: Readonly<DiffOptions> = Object.freeze({
  threshold: 0.1,
  includeAA: false,
  alpha: 0.1,
  aaColor: Object.freeze({ r: 255, g: 255, b: 0, a: 255 }),
  diffColor: Object.freeze({ r: 255, g: 0, b: 0, a: 255 }),
  diffColorAlt: null,
  diffMask: false,
  tileWidth: 256,
  tileHeight: 256,
  concurrency: 4,
});
