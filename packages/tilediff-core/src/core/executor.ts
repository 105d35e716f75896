/**
 * Tile task dispatch.
 *
 * Each tile is one independent unit of work. Tasks are spread over at most
 * `concurrency` lanes; every task starts on a fresh event loop turn and then
 * runs synchronously to completion, so nothing inside a task interleaves with
 * another one. Lanes share the event loop thread: at most one task executes at
 * any moment, and `concurrency` only bounds how many are queued.
 */

import { setImmediate as nextTurn } from 'node:timers/promises';
import type { Tile } from '../types/image';

export interface RunTilesOptions {
  /** Maximum number of lanes pulling tiles */
  concurrency: number;
}

/**
 * Run `task` once per tile.
 * @returns Task results in tile order
 */
export async function runTiles<T>(
  tiles: readonly Tile[],
  task: (tile: Tile, index: number) => T,
  options: RunTilesOptions
): Promise<T[]> {
  const results: T[] = new Array<T>(tiles.length);
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < tiles.length) {
      const index = next++;
      const tile = tiles[index];
      if (!tile) continue;
      await nextTurn();
      results[index] = task(tile, index);
    }
  };

  const laneCount = Math.min(Math.max(1, Math.floor(options.concurrency)), tiles.length);
  await Promise.all(Array.from({ length: laneCount }, () => lane()));

  return results;
}

/**
 * Synchronous counterpart of `runTiles`: same tiles, same order, one at a time.
 */
export function runTilesSync<T>(tiles: readonly Tile[], task: (tile: Tile, index: number) => T): T[] {
  return tiles.map((tile, index) => task(tile, index));
}
