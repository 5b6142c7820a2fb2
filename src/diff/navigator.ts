import type { DiffBlock } from './types.js';

export type Direction = 'next' | 'previous';

export interface NavigationHit {
  index: number;
  wrapped: boolean;
}

/**
 * Finds the nearest non-equal block from `current` in the given direction,
 * wrapping to the opposite end (and back to `current` itself) when needed.
 * Returns null when no block differs.
 */
export function findDifference(
  blocks: readonly DiffBlock[],
  current: number,
  direction: Direction,
): NavigationHit | null {
  const n = blocks.length;
  if (n === 0) return null;

  if (direction === 'next') {
    for (let i = current + 1; i < n; i++) {
      if (blocks[i].kind !== 'equal') return { index: i, wrapped: false };
    }
    for (let i = 0; i <= Math.min(current, n - 1); i++) {
      if (blocks[i].kind !== 'equal') return { index: i, wrapped: true };
    }
    return null;
  }

  for (let i = Math.min(current - 1, n - 1); i >= 0; i--) {
    if (blocks[i].kind !== 'equal') return { index: i, wrapped: false };
  }
  for (let i = n - 1; i >= Math.max(current, 0); i--) {
    if (blocks[i].kind !== 'equal') return { index: i, wrapped: true };
  }
  return null;
}
