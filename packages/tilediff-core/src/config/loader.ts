/**
 * Option merging and loading from environment variables
 */

import { DEFAULT_DIFF_OPTIONS } from './defaults';
import {
  ColorSchema,
  DiffEnvSchema,
  DiffOptionsSchema,
  type DiffOptions,
  type DiffOptionsInput,
  type MarkerColor,
} from './schema';

function freezeOptions(options: DiffOptions): Readonly<DiffOptions> {
  Object.freeze(options.aaColor);
  Object.freeze(options.diffColor);
  if (options.diffColorAlt) Object.freeze(options.diffColorAlt);
  return Object.freeze(options);
}

/**
 * Merge partial options with defaults.
 * Keys explicitly set to `undefined` keep their default.
 *
 * @returns Validated, frozen options snapshot
 * @throws ZodError if a value is out of range
 */
export function mergeDiffOptions(partial: DiffOptionsInput = {}): Readonly<DiffOptions> {
  const defined = Object.fromEntries(
    Object.entries(partial).filter(([, value]) => value !== undefined)
  );
  return freezeOptions(DiffOptionsSchema.parse({ ...DEFAULT_DIFF_OPTIONS, ...defined }));
}

/**
 * Load diff options from environment variables with validation.
 * Falls back to defaults for missing values.
 *
 * Environment variables:
 * - TILEDIFF_THRESHOLD: matching threshold (0-1)
 * - TILEDIFF_INCLUDE_AA: true/false, report anti-aliasing as differences
 * - TILEDIFF_ALPHA: background opacity (0-1)
 * - TILEDIFF_DIFF_MASK: true/false, draw a mask instead of a background
 * - TILEDIFF_TILE_SIZE: tile width and height in pixels
 * - TILEDIFF_CONCURRENCY: maximum tile tasks queued at once
 *
 * @param env - Environment variables object (defaults to process.env)
 * @throws ZodError if configuration is invalid
 */
export function loadDiffOptions(
  env: Record<string, string | undefined> = process.env
): Readonly<DiffOptions> {
  const parsed = DiffEnvSchema.parse(env);
  return mergeDiffOptions({
    threshold: parsed.TILEDIFF_THRESHOLD,
    includeAA: parsed.TILEDIFF_INCLUDE_AA,
    alpha: parsed.TILEDIFF_ALPHA,
    diffMask: parsed.TILEDIFF_DIFF_MASK,
    tileWidth: parsed.TILEDIFF_TILE_SIZE,
    tileHeight: parsed.TILEDIFF_TILE_SIZE,
    concurrency: parsed.TILEDIFF_CONCURRENCY,
  });
}

/**
 * Parse a color string such as `255,0,0` or `255,0,0,128`.
 * Alpha defaults to 255.
 *
 * @throws Error if the string is not 3 or 4 comma separated channels
 * @throws ZodError if a channel is outside 0-255
 */
export function parseColor(value: string): MarkerColor {
  const parts = value.split(',').map((part) => part.trim());
  if ((parts.length !== 3 && parts.length !== 4) || parts.some((part) => !/^\d+$/.test(part))) {
    throw new Error(`Invalid color "${value}": expected r,g,b or r,g,b,a`);
  }
  const [r, g, b, a = '255'] = parts;
  return ColorSchema.parse({
    r: Number(r),
    g: Number(g),
    b: Number(b),
    a: Number(a),
  });
}
