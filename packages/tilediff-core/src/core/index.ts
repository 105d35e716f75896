export { isAntialiased } from './antialiasing';
export { compositePixel, grayPixel, type PixelClass } from './compositor';
export { colorDelta, MAX_YIQ_DELTA, maxDelta, pixelsEqual } from './delta';
export { diff, diffSync, type DiffContext } from './diff';
export { runTiles, runTilesSync, type RunTilesOptions } from './executor';
export { hasManySiblings, neighborhood, type Neighborhood } from './siblings';
export {
  classifyPixel,
  createTileContext,
  processTile,
  sumTallies,
  type TileContext,
} from './tile-task';
export { partitionTiles, tileArea } from './tiling';
export { checkImages, isEmptyImage } from './validate';
export { blend, rgb2i, rgb2q, rgb2y, toYiq, type Yiq } from './yiq';
