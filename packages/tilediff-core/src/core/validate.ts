import type { ImageRole, SizeMismatchPair } from '../types/errors';
import { createEmptyImageError, createImageSizeMismatchError, type DiffError } from '../types/errors';
import type { PixelGrid } from '../types/image';
import { err, ok, type Result } from '../types/result';

const ROLES: readonly ImageRole[] = ['first image', 'second image', 'output image'];

function roleOf(index: number): ImageRole {
  return ROLES[index] ?? 'output image';
}

export function isEmptyImage(image: PixelGrid): boolean {
  return image.width <= 0 || image.height <= 0;
}

/**
 * Check the diff preconditions: no empty image, and each image has the bounds
 * of the one after it.
 */
export function checkImages(...images: PixelGrid[]): Result<void, DiffError> {
  const empty = images.flatMap((image, index) => (isEmptyImage(image) ? [roleOf(index)] : []));
  if (empty.length > 0) {
    return err(createEmptyImageError(empty));
  }

  const pairs: SizeMismatchPair[] = [];
  for (let i = 0; i < images.length - 1; i++) {
    const left = images[i];
    const right = images[i + 1];
    if (!left || !right) continue;
    if (left.width !== right.width || left.height !== right.height) {
      pairs.push({
        left: { role: roleOf(i), width: left.width, height: left.height },
        right: { role: roleOf(i + 1), width: right.width, height: right.height },
      });
    }
  }

  if (pairs.length > 0) {
    return err(createImageSizeMismatchError(pairs));
  }

  return ok(undefined);
}
