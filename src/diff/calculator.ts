import type { BlockKind, DiffBlock } from './types.js';

export const DEFAULT_LOOKAHEAD = 3;

function findAhead(
  lines: readonly string[],
  from: number,
  target: string,
  lookahead: number,
): number {
  for (let k = 1; k <= lookahead; k++) {
    const idx = from + k;
    if (idx >= lines.length) break;
    if (lines[idx] === target) return k;
  }
  return 0;
}

function classify(leftAdvanced: boolean, rightAdvanced: boolean): BlockKind {
  if (leftAdvanced && !rightAdvanced) return 'delete';
  if (rightAdvanced && !leftAdvanced) return 'add';
  return 'modify';
}

/**
 * Partitions two line buffers into an ordered list of classified blocks.
 *
 * Matching runs become `equal` blocks. On a mismatch the scan tries to
 * resynchronise within `lookahead` lines, skipping left lines first, then
 * right lines, and otherwise treats one line from each side as substituted.
 * Divergences longer than the window come out as `modify` rather than as
 * separate add/delete blocks. When one side runs out, the rest of the
 * other side becomes a single add or delete block.
 */
export function calculateDiff(
  left: readonly string[],
  right: readonly string[],
  lookahead: number = DEFAULT_LOOKAHEAD,
): DiffBlock[] {
  const blocks: DiffBlock[] = [];
  const leftLen = left.length;
  const rightLen = right.length;
  let i = 0;
  let j = 0;

  while (i < leftLen || j < rightLen) {
    if (i < leftLen && j < rightLen && left[i] === right[j]) {
      const leftStart = i;
      const rightStart = j;
      while (i < leftLen && j < rightLen && left[i] === right[j]) {
        i++;
        j++;
      }
      blocks.push({
        leftRange: { start: leftStart, end: i - 1 },
        rightRange: { start: rightStart, end: j - 1 },
        kind: 'equal',
      });
      continue;
    }

    const leftStart = i;
    const rightStart = j;

    if (i >= leftLen) {
      j = rightLen;
    } else if (j >= rightLen) {
      i = leftLen;
    } else {
      while (i < leftLen && j < rightLen && left[i] !== right[j]) {
        const skipLeft = findAhead(left, i, right[j], lookahead);
        if (skipLeft > 0) {
          i += skipLeft;
          continue;
        }
        const skipRight = findAhead(right, j, left[i], lookahead);
        if (skipRight > 0) {
          j += skipRight;
          continue;
        }
        i++;
        j++;
      }
    }

    blocks.push({
      leftRange: { start: leftStart, end: i - 1 },
      rightRange: { start: rightStart, end: j - 1 },
      kind: classify(i > leftStart, j > rightStart),
    });
  }

  if (blocks.length === 0) {
    blocks.push({
      leftRange: { start: 0, end: -1 },
      rightRange: { start: 0, end: -1 },
      kind: 'equal',
    });
  }

  return blocks;
}

export function hasDifferences(blocks: readonly DiffBlock[]): boolean {
  return blocks.some((b) => b.kind !== 'equal');
}
