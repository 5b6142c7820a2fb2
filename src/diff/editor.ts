import type { LineBuffer } from './types.js';

export interface Cursor {
  row: number;
  col: number;
}

export type CursorMove = 'up' | 'down' | 'left' | 'right' | 'home' | 'end';

export type EditOp =
  | { type: 'insert'; text: string }
  | { type: 'split' }
  | { type: 'backspace' }
  | { type: 'delete' }
  | { type: 'move'; to: CursorMove };

export interface EditOutcome {
  cursor: Cursor;
  changed: boolean;
}

export function clampCursor(lines: readonly string[], cursor: Cursor): Cursor {
  if (lines.length === 0) return { row: 0, col: 0 };
  const row = Math.max(0, Math.min(cursor.row, lines.length - 1));
  const col = Math.max(0, Math.min(cursor.col, lines[row].length));
  return { row, col };
}

function insertText(lines: LineBuffer, cursor: Cursor, text: string): EditOutcome {
  let { row, col } = cursor;
  for (const ch of text) {
    if (ch === '\n') {
      ({ row, col } = splitLine(lines, { row, col }).cursor);
      continue;
    }
    const line = lines[row];
    lines[row] = line.slice(0, col) + ch + line.slice(col);
    col += ch.length;
  }
  return { cursor: { row, col }, changed: text.length > 0 };
}

function splitLine(lines: LineBuffer, cursor: Cursor): EditOutcome {
  const line = lines[cursor.row];
  lines[cursor.row] = line.slice(0, cursor.col);
  lines.splice(cursor.row + 1, 0, line.slice(cursor.col));
  return { cursor: { row: cursor.row + 1, col: 0 }, changed: true };
}

function backspace(lines: LineBuffer, cursor: Cursor): EditOutcome {
  const { row, col } = cursor;
  if (col > 0) {
    const line = lines[row];
    lines[row] = line.slice(0, col - 1) + line.slice(col);
    return { cursor: { row, col: col - 1 }, changed: true };
  }
  if (row > 0) {
    const prevLen = lines[row - 1].length;
    lines[row - 1] += lines[row];
    lines.splice(row, 1);
    return { cursor: { row: row - 1, col: prevLen }, changed: true };
  }
  return { cursor, changed: false };
}

function deleteForward(lines: LineBuffer, cursor: Cursor): EditOutcome {
  const { row, col } = cursor;
  const line = lines[row];
  if (col < line.length) {
    lines[row] = line.slice(0, col) + line.slice(col + 1);
    return { cursor, changed: true };
  }
  if (row < lines.length - 1) {
    lines[row] = line + lines[row + 1];
    lines.splice(row + 1, 1);
    return { cursor, changed: true };
  }
  return { cursor, changed: false };
}

function move(lines: LineBuffer, cursor: Cursor, to: CursorMove): Cursor {
  const { row, col } = cursor;
  switch (to) {
    case 'up':
      if (row === 0) return cursor;
      return { row: row - 1, col: Math.min(col, lines[row - 1].length) };
    case 'down':
      if (row >= lines.length - 1) return cursor;
      return { row: row + 1, col: Math.min(col, lines[row + 1].length) };
    case 'left':
      return { row, col: Math.max(0, col - 1) };
    case 'right':
      return { row, col: Math.min(lines[row].length, col + 1) };
    case 'home':
      return { row, col: 0 };
    case 'end':
      return { row, col: lines[row].length };
  }
}

/**
 * Applies one edit to `lines` in place at `cursor`. An empty buffer is
 * given its one empty line first. Backspace at column 0 joins with the
 * previous line, delete at end of line joins the next one.
 */
export function applyEdit(lines: LineBuffer, cursor: Cursor, op: EditOp): EditOutcome {
  if (lines.length === 0) lines.push('');
  const at = clampCursor(lines, cursor);
  switch (op.type) {
    case 'insert':
      return insertText(lines, at, op.text);
    case 'split':
      return splitLine(lines, at);
    case 'backspace':
      return backspace(lines, at);
    case 'delete':
      return deleteForward(lines, at);
    case 'move':
      return { cursor: move(lines, at, op.to), changed: false };
  }
}
