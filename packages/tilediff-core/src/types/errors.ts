/**
 * Error types for explicit error handling
 */

/**
 * Base error interface with error code
 */
export interface BaseError {
  code: string;
  message: string;
}

/**
 * Position of an image in a diff call, in argument order.
 */
export type ImageRole = 'first image' | 'second image' | 'output image';

/**
 * Two neighbouring images whose bounds differ.
 */
export interface SizeMismatchPair {
  left: { role: ImageRole; width: number; height: number };
  right: { role: ImageRole; width: number; height: number };
}

/**
 * One of the images has no pixels.
 */
export interface EmptyImageError extends BaseError {
  code: 'EMPTY_IMAGE';
  images: ImageRole[];
}

/**
 * Images do not share identical bounds.
 */
export interface ImageSizeMismatchError extends BaseError {
  code: 'IMAGE_SIZE_MISMATCH';
  pairs: SizeMismatchPair[];
}

/**
 * Precondition failures of a diff run. Both are detected before any pixel work.
 */
export type DiffError = EmptyImageError | ImageSizeMismatchError;

export function createEmptyImageError(images: ImageRole[]): EmptyImageError {
  return {
    code: 'EMPTY_IMAGE',
    message: `image is empty: images: ${images.join(',')}`,
    images,
  };
}

export function createImageSizeMismatchError(pairs: SizeMismatchPair[]): ImageSizeMismatchError {
  const described = pairs.map(
    ({ left, right }) =>
      `"${left.role}" (${left.width}x${left.height}) != "${right.role}" (${right.width}x${right.height})`
  );
  return {
    code: 'IMAGE_SIZE_MISMATCH',
    message: `size of images must be equal: images: ${described.join(',')}`,
    pairs,
  };
}
