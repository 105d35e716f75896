export { decodePng, encodePng } from './codec/png';
export {
  ColorSchema,
  DEFAULT_DIFF_OPTIONS,
  DiffEnvSchema,
  DiffOptionsSchema,
  loadDiffOptions,
  mergeDiffOptions,
  parseColor,
} from './config/index';
export type { DiffOptions, DiffOptionsInput, MarkerColor } from './config/index';
export {
  blend,
  checkImages,
  classifyPixel,
  colorDelta,
  compositePixel,
  createTileContext,
  diff,
  diffSync,
  grayPixel,
  hasManySiblings,
  isAntialiased,
  isEmptyImage,
  MAX_YIQ_DELTA,
  maxDelta,
  neighborhood,
  partitionTiles,
  pixelsEqual,
  processTile,
  rgb2i,
  rgb2q,
  rgb2y,
  runTiles,
  runTilesSync,
  sumTallies,
  tileArea,
  toYiq,
} from './core/index';
export type {
  DiffContext,
  Neighborhood,
  PixelClass,
  RunTilesOptions,
  TileContext,
  Yiq,
} from './core/index';
export { createGrid, NrgbaGrid, PremultipliedRgbaGrid, wrapPixels } from './image/grid';
export {
  createEmptyImageError,
  createImageSizeMismatchError,
  err,
  isErr,
  isOk,
  ok,
  unwrap,
  unwrapOr,
} from './types/index';
export type {
  BaseError,
  DiffError,
  DiffSummary,
  EmptyImageError,
  Failure,
  ImageRole,
  ImageSizeMismatchError,
  Pixel,
  PixelFormat,
  PixelGrid,
  Result,
  SizeMismatchPair,
  Success,
  Tile,
  TileTally,
} from './types/index';
