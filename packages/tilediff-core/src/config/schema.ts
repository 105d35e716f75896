/**
 * Configuration schemas with validation
 */

import { z } from 'zod';

const channel = z.number().int().min(0).max(255);

/**
 * RGBA marker color (straight alpha, 0-255 per channel)
 */
export const ColorSchema = z.object({
  r: channel,
  g: channel,
  b: channel,
  a: channel,
});

/**
 * Diff options schema
 */
export const DiffOptionsSchema = z.object({
  /**
   * Matching threshold (0 to 1). Smaller = more sensitive.
   * @default 0.1
   */
  threshold: z.number().min(0).max(1),

  /**
   * Report anti-aliased pixels as differences instead of suppressing them
   * @default false
   */
  includeAA: z.boolean(),

  /**
   * Opacity of the first image in the grayscale background of the output
   * @default 0.1
   */
  alpha: z.number().min(0).max(1),

  /**
   * Color of anti-aliased pixels in the output
   * @default yellow
   */
  aaColor: ColorSchema,

  /**
   * Color of differing pixels in the output
   * @default red
   */
  diffColor: ColorSchema,

  /**
   * Reserved directional color for differences where the second image is darker.
   * Validated and carried in the snapshot, but never painted: every difference
   * uses `diffColor`.
   * @default null
   */
  diffColorAlt: ColorSchema.nullable(),

  /**
   * Draw only anti-aliased and differing pixels, leaving the rest untouched
   * @default false
   */
  diffMask: z.boolean(),

  /**
   * Maximum tile width in pixels
   * @default 256
   */
  tileWidth: z.number().int().positive(),

  /**
   * Maximum tile height in pixels
   * @default 256
   */
  tileHeight: z.number().int().positive(),

  /**
   * Maximum number of tile tasks queued at once. Tasks share one thread and
   * run one after another, so this bounds scheduling, not parallel work.
   * @default 4
   */
  concurrency: z.number().int().positive(),
});

export type MarkerColor = z.infer<typeof ColorSchema>;
export type DiffOptions = z.infer<typeof DiffOptionsSchema>;

/**
 * Caller-facing options: any subset, merged over the defaults.
 */
export type DiffOptionsInput = Partial<DiffOptions>;

const blankToUndefined = (value: unknown): unknown => (value === '' ? undefined : value);

const envNumber = z.preprocess(blankToUndefined, z.coerce.number().optional());

const envInteger = z.preprocess(blankToUndefined, z.coerce.number().int().optional());

const envBoolean = z.preprocess(
  blankToUndefined,
  z
    .enum(['true', 'false', '1', '0'])
    .transform((value) => value === 'true' || value === '1')
    .optional()
);

/**
 * Environment variables understood by `loadDiffOptions`
 */
export const DiffEnvSchema = z.object({
  TILEDIFF_THRESHOLD: envNumber,
  TILEDIFF_INCLUDE_AA: envBoolean,
  TILEDIFF_ALPHA: envNumber,
  TILEDIFF_DIFF_MASK: envBoolean,
  TILEDIFF_TILE_SIZE: envInteger,
  TILEDIFF_CONCURRENCY: envInteger,
});
