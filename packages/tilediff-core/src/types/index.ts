export {
  createEmptyImageError,
  createImageSizeMismatchError,
} from './errors';
export type {
  BaseError,
  DiffError,
  EmptyImageError,
  ImageRole,
  ImageSizeMismatchError,
  SizeMismatchPair,
} from './errors';
export type { Pixel, PixelFormat, PixelGrid, Tile } from './image';
export { err, isErr, isOk, ok, unwrap, unwrapOr } from './result';
export type { Failure, Result, Success } from './result';

/**
 * Count of classified pixels produced by one tile task.
 */
export interface TileTally {
  diffCount: number;
  antialiasedCount: number;
}

/**
 * Outcome of a successful diff run.
 */
export interface DiffSummary {
  /** Pixels classified as real differences */
  diffCount: number;
  /** Pixels above threshold that were suppressed as anti-aliasing */
  antialiasedCount: number;
  totalPixels: number;
  /** diffCount / totalPixels (0 to 1) */
  diffRatio: number;
  tileCount: number;
}
