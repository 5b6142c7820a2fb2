import { isEmptyRange, type DiffBlock, type LineBuffer, type LineRange } from './types.js';

export type MergeDirection = 'left-to-right' | 'right-to-left';

function sliceRange(lines: readonly string[], range: LineRange): string[] {
  if (isEmptyRange(range)) return [];
  return lines.slice(range.start, range.end + 1);
}

/**
 * Replaces `targetRange` in `target` with the lines of `sourceRange` from
 * `source`, in place. The target buffer's length changes by the
 * difference between the two range lengths, but never drops below one line.
 */
export function spliceRange(
  source: readonly string[],
  sourceRange: LineRange,
  target: LineBuffer,
  targetRange: LineRange,
): void {
  const incoming = sliceRange(source, sourceRange);
  const removeCount = isEmptyRange(targetRange) ? 0 : targetRange.end - targetRange.start + 1;
  target.splice(targetRange.start, removeCount, ...incoming);
  if (target.length === 0) target.push('');
}

/**
 * Copies a block's content across in the given direction. Returns the side
 * whose buffer changed.
 */
export function mergeBlock(
  left: LineBuffer,
  right: LineBuffer,
  block: DiffBlock,
  direction: MergeDirection,
): 'left' | 'right' {
  if (direction === 'left-to-right') {
    spliceRange(left, block.leftRange, right, block.rightRange);
    return 'right';
  }
  spliceRange(right, block.rightRange, left, block.leftRange);
  return 'left';
}
