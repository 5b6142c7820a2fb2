import type { Cursor } from '../diff/editor.js';
import type { DiffBlock, Side } from '../diff/types.js';
import type { DirectoryEntry } from '../fs/types.js';

export type SessionState = 'closed' | 'viewing' | 'editing' | 'confirming';

/**
 * `two-step`: the first close with unsaved changes warns and drops the
 * modified flags, so the next close goes through.
 * `prompt`: the first close asks for save, discard or cancel.
 */
export type CloseGuard = 'two-step' | 'prompt';

export type CloseChoice = 'save' | 'discard' | 'cancel';

export type SelectedEntry = Pick<DirectoryEntry, 'name' | 'path' | 'isDirectory'>;

export type OpenRejection =
  | 'already_open'
  | 'no_selection'
  | 'parent_placeholder'
  | 'directory'
  | 'unreadable'
  | 'binary'
  | 'encoding';

export type OpenResult =
  | { ok: true }
  | { ok: false; reason: OpenRejection; message: string };

export type CloseResult = 'warned' | 'closed' | 'cancelled' | 'not_open';

export interface DiffView {
  readonly leftPath: string;
  readonly rightPath: string;
  readonly left: readonly string[];
  readonly right: readonly string[];
  readonly blocks: readonly DiffBlock[];
  readonly currentBlockIndex: number;
  readonly leftModified: boolean;
  readonly rightModified: boolean;
  readonly activeSide: Side;
  readonly cursor: Cursor;
  readonly scrollLine: number;
}
