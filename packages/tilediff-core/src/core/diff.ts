/**
 * Image diff entry points
 */

import { silentLogger, type Logger } from '@tilediff/shared-logging';
import { mergeDiffOptions } from '../config/loader';
import type { DiffOptions, DiffOptionsInput } from '../config/schema';
import type { DiffError } from '../types/errors';
import type { PixelGrid, Tile } from '../types/image';
import type { DiffSummary, TileTally } from '../types/index';
import { ok, type Result } from '../types/result';
import { runTiles, runTilesSync } from './executor';
import { createTileContext, processTile, sumTallies } from './tile-task';
import { partitionTiles } from './tiling';
import { checkImages } from './validate';

export interface DiffContext {
  /** Receives debug records about the run; silent by default */
  logger?: Logger;
}

interface PreparedRun {
  options: Readonly<DiffOptions>;
  tiles: Tile[];
  task: (tile: Tile) => TileTally;
}

function prepare(
  img1: PixelGrid,
  img2: PixelGrid,
  output: PixelGrid,
  input: DiffOptionsInput,
  logger: Logger
): Result<PreparedRun, DiffError> {
  const options = mergeDiffOptions(input);

  const checked = checkImages(img1, img2, output);
  if (!checked.success) {
    logger.debug({ code: checked.error.code }, checked.error.message);
    return checked;
  }

  const tiles = partitionTiles(output.width, output.height, options.tileWidth, options.tileHeight);
  const context = createTileContext(img1, img2, output, options);

  logger.debug(
    {
      width: output.width,
      height: output.height,
      tiles: tiles.length,
      concurrency: options.concurrency,
      threshold: options.threshold,
    },
    'diff started'
  );

  return ok({ options, tiles, task: (tile: Tile) => processTile(context, tile) });
}

function summarize(output: PixelGrid, tiles: Tile[], tallies: TileTally[]): DiffSummary {
  const { diffCount, antialiasedCount } = sumTallies(tallies);
  const totalPixels = output.width * output.height;
  return {
    diffCount,
    antialiasedCount,
    totalPixels,
    diffRatio: diffCount / totalPixels,
    tileCount: tiles.length,
  };
}

/**
 * Compare two images and paint the differences into `output`.
 *
 * All three grids must have the same non-zero size; otherwise the result is a
 * failure and `output` is left untouched. Tiles are processed as independent
 * tasks, each writing only its own rectangle of `output`.
 *
 * @param options - Partial options merged over `DEFAULT_DIFF_OPTIONS`
 * @throws ZodError if `options` holds an invalid value
 *
 * @example
 * ```ts
 * const output = createGrid(before.width, before.height);
 * const result = await diff(before, after, output, { threshold: 0.05 });
 * if (result.success) console.log(result.value.diffCount);
 * ```
 */
export async function diff(
  img1: PixelGrid,
  img2: PixelGrid,
  output: PixelGrid,
  options: DiffOptionsInput = {},
  context: DiffContext = {}
): Promise<Result<DiffSummary, DiffError>> {
  const logger = context.logger ?? silentLogger;
  const prepared = prepare(img1, img2, output, options, logger);
  if (!prepared.success) return prepared;

  const { tiles, task } = prepared.value;
  const startedAt = Date.now();
  const tallies = await runTiles(tiles, task, { concurrency: prepared.value.options.concurrency });
  const summary = summarize(output, tiles, tallies);

  logger.debug({ ...summary, elapsedMs: Date.now() - startedAt }, 'diff finished');
  return ok(summary);
}

/**
 * Synchronous variant of `diff`: same partition and kernel, tiles run in order.
 */
export function diffSync(
  img1: PixelGrid,
  img2: PixelGrid,
  output: PixelGrid,
  options: DiffOptionsInput = {},
  context: DiffContext = {}
): Result<DiffSummary, DiffError> {
  const logger = context.logger ?? silentLogger;
  const prepared = prepare(img1, img2, output, options, logger);
  if (!prepared.success) return prepared;

  const { tiles, task } = prepared.value;
  const summary = summarize(output, tiles, runTilesSync(tiles, task));

  logger.debug({ ...summary }, 'diff finished');
  return ok(summary);
}
