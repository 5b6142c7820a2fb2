export type Side = 'left' | 'right';

export type BlockKind = 'equal' | 'add' | 'delete' | 'modify';

/**
 * Closed index interval into a line buffer. An empty range has
 * `end === start - 1`; `start` is then the offset where lines would go.
 */
export interface LineRange {
  start: number;
  end: number;
}

export interface DiffBlock {
  leftRange: LineRange;
  rightRange: LineRange;
  kind: BlockKind;
}

export type LineBuffer = string[];

export function rangeLength(range: LineRange): number {
  return range.end - range.start + 1;
}

export function isEmptyRange(range: LineRange): boolean {
  return range.end < range.start;
}

export function otherSide(side: Side): Side {
  return side === 'left' ? 'right' : 'left';
}
