import { calculateDiff, DEFAULT_LOOKAHEAD } from '../diff/calculator.js';
import { applyEdit, clampCursor, type Cursor, type EditOp } from '../diff/editor.js';
import { decodeText, DEFAULT_BINARY_PROBE_BYTES, isTextContent, parseLines, serializeLines } from '../diff/line-buffer.js';
import { mergeBlock, type MergeDirection } from '../diff/merger.js';
import { findDifference, type Direction } from '../diff/navigator.js';
import { otherSide, type DiffBlock, type LineBuffer, type Side } from '../diff/types.js';
import { NodeFileIO } from '../fs/file-io.js';
import { isParentEntry, type FileIO } from '../fs/types.js';
import { loggerStatusSink, type StatusSink } from '../status/status-sink.js';
import { logger } from '../utils/logger.js';
import type {
  CloseChoice,
  CloseGuard,
  CloseResult,
  DiffView,
  OpenRejection,
  OpenResult,
  SelectedEntry,
  SessionState,
} from './types.js';

export interface DiffSessionOptions {
  io?: FileIO;
  status?: StatusSink;
  lookahead?: number;
  binaryProbeBytes?: number;
  closeGuard?: CloseGuard;
}

export const DIFF_KEY_HELP = 'n:Next p:Prev >:Copy→ <:Copy← side:Switch e:Edit w:Save q:Close';

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * One side-by-side diff of two text files: the two line buffers, the
 * blocks derived from them, and the open/view/edit/close lifecycle.
 * A session holds at most one pair of files at a time; `open` on a
 * session that is not closed is rejected.
 */
export class DiffSession implements DiffView {
  private _state: SessionState = 'closed';
  private _leftPath = '';
  private _rightPath = '';
  private _left: LineBuffer = [];
  private _right: LineBuffer = [];
  private _blocks: DiffBlock[] = [];
  private _currentBlockIndex = 0;
  private _leftModified = false;
  private _rightModified = false;
  // Sides whose unsaved changes a two-step close warning dropped unwritten.
  private _leftDiscarded = false;
  private _rightDiscarded = false;
  private _activeSide: Side = 'left';
  private _cursor: Cursor = { row: 0, col: 0 };
  private _scrollLine = 0;

  private readonly io: FileIO;
  private readonly status: StatusSink;
  private readonly lookahead: number;
  private readonly binaryProbeBytes: number;
  private readonly closeGuard: CloseGuard;

  constructor(options: DiffSessionOptions = {}) {
    this.io = options.io ?? new NodeFileIO();
    this.status = options.status ?? loggerStatusSink;
    this.lookahead = options.lookahead ?? DEFAULT_LOOKAHEAD;
    this.binaryProbeBytes = options.binaryProbeBytes ?? DEFAULT_BINARY_PROBE_BYTES;
    this.closeGuard = options.closeGuard ?? 'two-step';
  }

  get state(): SessionState {
    return this._state;
  }
  get leftPath(): string {
    return this._leftPath;
  }
  get rightPath(): string {
    return this._rightPath;
  }
  /** A copy; the session's own buffers are only changed through its operations. */
  get left(): readonly string[] {
    return [...this._left];
  }
  get right(): readonly string[] {
    return [...this._right];
  }
  get blocks(): readonly DiffBlock[] {
    return this._blocks;
  }
  get currentBlockIndex(): number {
    return this._currentBlockIndex;
  }
  get leftModified(): boolean {
    return this._leftModified;
  }
  get rightModified(): boolean {
    return this._rightModified;
  }
  get activeSide(): Side {
    return this._activeSide;
  }
  get cursor(): Cursor {
    return { ...this._cursor };
  }
  get scrollLine(): number {
    return this._scrollLine;
  }

  get isOpen(): boolean {
    return this._state !== 'closed';
  }

  get hasUnsavedChanges(): boolean {
    return this._leftModified || this._rightModified;
  }

  /**
   * True after a two-step close warning dropped the modified flags while the
   * session stayed open: the edits are still unwritten, and the next close
   * will throw them away.
   */
  get hasDiscardPending(): boolean {
    return this._leftDiscarded || this._rightDiscarded;
  }

  private reject(reason: OpenRejection, message: string): OpenResult {
    this.status.setStatus(message);
    return { ok: false, reason, message };
  }

  private readSide(
    side: Side,
    entry: SelectedEntry,
  ): { ok: true; content: Uint8Array } | { ok: false; message: string } {
    try {
      return { ok: true, content: this.io.readFile(entry.path) };
    } catch (err) {
      return { ok: false, message: `Error reading ${side} file: ${errorMessage(err)}` };
    }
  }

  open(leftEntry: SelectedEntry | undefined, rightEntry: SelectedEntry | undefined): OpenResult {
    if (this._state !== 'closed') {
      return this.reject('already_open', 'A diff session is already open');
    }
    if (!leftEntry || !rightEntry) {
      return this.reject('no_selection', 'Both panes must have a file selected');
    }
    if (isParentEntry(leftEntry) || isParentEntry(rightEntry)) {
      return this.reject('parent_placeholder', 'Cannot diff parent directory link');
    }
    if (leftEntry.isDirectory || rightEntry.isDirectory) {
      return this.reject('directory', 'Both selections must be files, not directories');
    }

    const leftRead = this.readSide('left', leftEntry);
    if (!leftRead.ok) {
      return this.reject('unreadable', leftRead.message);
    }
    const rightRead = this.readSide('right', rightEntry);
    if (!rightRead.ok) {
      return this.reject('unreadable', rightRead.message);
    }
    const leftContent = leftRead.content;
    const rightContent = rightRead.content;

    if (
      !isTextContent(leftContent, this.binaryProbeBytes) ||
      !isTextContent(rightContent, this.binaryProbeBytes)
    ) {
      return this.reject('binary', 'Both files must be readable text files');
    }

    const leftText = decodeText(leftContent);
    const rightText = decodeText(rightContent);
    if (leftText === null || rightText === null) {
      return this.reject('encoding', 'Both files must be valid UTF-8 text');
    }

    this._leftPath = leftEntry.path;
    this._rightPath = rightEntry.path;
    this._left = parseLines(leftText);
    this._right = parseLines(rightText);
    this._leftModified = false;
    this._rightModified = false;
    this._leftDiscarded = false;
    this._rightDiscarded = false;
    this._currentBlockIndex = 0;
    this._scrollLine = 0;
    this._activeSide = 'left';
    this._cursor = { row: 0, col: 0 };
    this.recompute();
    this._state = 'viewing';

    this.status.setStatus(`Diff mode: ${DIFF_KEY_HELP}`);
    return { ok: true };
  }

  private requireViewing(): boolean {
    switch (this._state) {
      case 'viewing':
        return true;
      case 'closed':
        this.status.setStatus('No diff session open');
        return false;
      case 'editing':
        this.status.setStatus('Not available in edit mode');
        return false;
      case 'confirming':
        this.status.setStatus('Answer the close prompt first: save, discard or cancel');
        return false;
    }
  }

  /** Re-derives every block from the current buffers. */
  recompute(): void {
    this._blocks = calculateDiff(this._left, this._right, this.lookahead);
    if (this._currentBlockIndex >= this._blocks.length) {
      this._currentBlockIndex = this._blocks.length - 1;
    }
    this._scrollLine = Math.min(this._scrollLine, this.maxScrollLine());
    logger.debug(`Recomputed diff: ${this._blocks.length} block(s)`);
  }

  private maxScrollLine(): number {
    return Math.max(0, Math.max(this._left.length, this._right.length) - 1);
  }

  scroll(delta: number): void {
    if (!this.isOpen) return;
    this._scrollLine = Math.max(0, Math.min(this._scrollLine + delta, this.maxScrollLine()));
  }

  navigate(direction: Direction): boolean {
    if (!this.requireViewing()) return false;

    const hit = findDifference(this._blocks, this._currentBlockIndex, direction);
    if (!hit) {
      this.status.setStatus('No differences found');
      return false;
    }

    this._currentBlockIndex = hit.index;
    this._scrollLine = this._blocks[hit.index].leftRange.start;
    this.status.setStatus(
      `Difference ${hit.index + 1}/${this._blocks.length}${hit.wrapped ? ' (wrapped)' : ''}`,
    );
    return true;
  }

  jumpToNext(): boolean {
    return this.navigate('next');
  }

  jumpToPrevious(): boolean {
    return this.navigate('previous');
  }

  merge(direction: MergeDirection): boolean {
    if (!this.requireViewing()) return false;

    const block = this._blocks[this._currentBlockIndex];
    if (!block) {
      this.status.setStatus('No difference selected');
      return false;
    }
    if (block.kind === 'equal') {
      this.status.setStatus('No difference at current position');
      return false;
    }

    const changed = mergeBlock(this._left, this._right, block, direction);
    if (changed === 'left') {
      this._leftModified = true;
    } else {
      this._rightModified = true;
    }
    this.recompute();
    this.status.setStatus(direction === 'left-to-right' ? 'Copied left → right' : 'Copied right → left');
    return true;
  }

  copyLeftToRight(): boolean {
    return this.merge('left-to-right');
  }

  copyRightToLeft(): boolean {
    return this.merge('right-to-left');
  }

  switchSide(): boolean {
    if (!this.requireViewing()) return false;
    this._activeSide = otherSide(this._activeSide);
    this.status.setStatus(`Active side: ${this._activeSide}`);
    return true;
  }

  private activeBuffer(): LineBuffer {
    return this._activeSide === 'left' ? this._left : this._right;
  }

  enterEdit(): boolean {
    if (!this.requireViewing()) return false;
    this._cursor = clampCursor(this.activeBuffer(), { row: this._scrollLine, col: 0 });
    this._state = 'editing';
    this.status.setStatus(`Edit mode (${this._activeSide}): exit-edit to leave`);
    return true;
  }

  editOp(op: EditOp): boolean {
    if (this._state !== 'editing') {
      this.status.setStatus('Not in edit mode');
      return false;
    }
    const outcome = applyEdit(this.activeBuffer(), this._cursor, op);
    this._cursor = outcome.cursor;
    if (outcome.changed) {
      if (this._activeSide === 'left') {
        this._leftModified = true;
      } else {
        this._rightModified = true;
      }
    }
    return outcome.changed;
  }

  exitEdit(): boolean {
    if (this._state !== 'editing') {
      this.status.setStatus('Not in edit mode');
      return false;
    }
    this._state = 'viewing';
    this.recompute();
    this.status.setStatus('Edit mode exited');
    return true;
  }

  private writeSide(side: Side): string | null {
    const path = side === 'left' ? this._leftPath : this._rightPath;
    const lines = side === 'left' ? this._left : this._right;
    try {
      this.io.writeFile(path, serializeLines(lines));
      return null;
    } catch (err) {
      return `Error saving ${side} file: ${errorMessage(err)}`;
    }
  }

  /**
   * Writes back each modified side, left first. Stops at the first failed
   * write and leaves that side's flag set. Returns how many files were
   * written.
   */
  save(): number {
    if (!this.requireViewing()) return 0;

    let savedCount = 0;
    for (const side of ['left', 'right'] as const) {
      const modified = side === 'left' ? this._leftModified : this._rightModified;
      if (!modified) continue;

      const failure = this.writeSide(side);
      if (failure) {
        this.status.setStatus(failure);
        return savedCount;
      }
      if (side === 'left') {
        this._leftModified = false;
        this._leftDiscarded = false;
      } else {
        this._rightModified = false;
        this._rightDiscarded = false;
      }
      savedCount++;
    }

    if (savedCount === 0) {
      this.status.setStatus('No changes to save');
    } else if (savedCount === 1) {
      this.status.setStatus('Saved 1 file');
    } else {
      this.status.setStatus('Saved both files');
    }
    return savedCount;
  }

  close(): CloseResult {
    if (this._state === 'closed') {
      this.status.setStatus('No diff session open');
      return 'not_open';
    }
    if (!this.requireViewing()) return 'cancelled';

    if (!this.hasUnsavedChanges) {
      this.teardown();
      return 'closed';
    }

    if (this.closeGuard === 'prompt') {
      this._state = 'confirming';
      this.status.setStatus('Unsaved changes! Choose save, discard or cancel');
      return 'warned';
    }

    // The flags are dropped without writing anything, so the next close exits.
    this.status.setStatus('Unsaved changes! Save first, or close again to discard');
    this._leftDiscarded = this._leftDiscarded || this._leftModified;
    this._rightDiscarded = this._rightDiscarded || this._rightModified;
    this._leftModified = false;
    this._rightModified = false;
    return 'warned';
  }

  resolveClose(choice: CloseChoice): CloseResult {
    if (this._state !== 'confirming') {
      this.status.setStatus('No close pending');
      return this.isOpen ? 'cancelled' : 'not_open';
    }

    this._state = 'viewing';
    switch (choice) {
      case 'cancel':
        this.status.setStatus('Close cancelled');
        return 'cancelled';
      case 'save':
        this.save();
        if (this.hasUnsavedChanges) return 'cancelled';
        this.teardown();
        return 'closed';
      case 'discard':
        this.teardown();
        return 'closed';
    }
  }

  private teardown(): void {
    this._state = 'closed';
    this._left = [];
    this._right = [];
    this._blocks = [];
    this._leftModified = false;
    this._rightModified = false;
    this._leftDiscarded = false;
    this._rightDiscarded = false;
    this._currentBlockIndex = 0;
    this._scrollLine = 0;
    this._cursor = { row: 0, col: 0 };
    this.status.setStatus('Diff mode exited');
  }
}
