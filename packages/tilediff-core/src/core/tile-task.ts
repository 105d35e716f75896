import type { DiffOptions } from '../config/schema';
import type { TileTally } from '../types/index';
import type { PixelGrid, Tile } from '../types/image';
import { isAntialiased } from './antialiasing';
import { compositePixel, type PixelClass } from './compositor';
import { colorDelta, maxDelta } from './delta';

/**
 * Read-only state shared by every tile task of one run.
 */
export interface TileContext {
  readonly img1: PixelGrid;
  readonly img2: PixelGrid;
  /** Written only inside the tile being processed */
  readonly output: PixelGrid;
  readonly options: Readonly<DiffOptions>;
  /** Absolute threshold derived from options.threshold */
  readonly maxDelta: number;
}

export function createTileContext(
  img1: PixelGrid,
  img2: PixelGrid,
  output: PixelGrid,
  options: Readonly<DiffOptions>
): TileContext {
  return { img1, img2, output, options, maxDelta: maxDelta(options.threshold) };
}

/**
 * Classify the pixel at (x, y). Neighborhood reads may fall outside the tile.
 */
export function classifyPixel(context: TileContext, x: number, y: number): PixelClass {
  const { img1, img2, options } = context;

  // squared YIQ distance; the sign only marks which image is darker
  const delta = colorDelta(img1.getPixel(x, y), img2.getPixel(x, y));
  if (Math.abs(delta) <= context.maxDelta) return { kind: 'same' };

  if (
    !options.includeAA &&
    (isAntialiased(img1, x, y, img2) || isAntialiased(img2, x, y, img1))
  ) {
    return { kind: 'antialiased' };
  }

  return { kind: 'diff' };
}

/**
 * Compare every pixel of one tile and paint the output inside it.
 */
export function processTile(context: TileContext, tile: Tile): TileTally {
  const { img1, output, options } = context;
  const tally: TileTally = { diffCount: 0, antialiasedCount: 0 };

  for (let y = tile.y; y < tile.y + tile.height; y++) {
    for (let x = tile.x; x < tile.x + tile.width; x++) {
      const classification = classifyPixel(context, x, y);
      if (classification.kind === 'diff') tally.diffCount++;
      else if (classification.kind === 'antialiased') tally.antialiasedCount++;

      const color = compositePixel(img1.getPixel(x, y), classification, options);
      if (color) output.setPixel(x, y, color);
    }
  }

  return tally;
}

export function sumTallies(tallies: readonly TileTally[]): TileTally {
  return tallies.reduce<TileTally>(
    (total, tally) => ({
      diffCount: total.diffCount + tally.diffCount,
      antialiasedCount: total.antialiasedCount + tally.antialiasedCount,
    }),
    { diffCount: 0, antialiasedCount: 0 }
  );
}
