import path from 'node:path';
import { otherSide, type Side } from '../diff/types.js';
import { createCopier } from '../fs/copy.js';
import { createLister } from '../fs/listing.js';
import { isParentEntry, PARENT_ENTRY_NAME, type CopyPrimitive, type DirectoryEntry, type DirectoryLister } from '../fs/types.js';
import { loggerStatusSink, type StatusSink } from '../status/status-sink.js';
import { logger } from '../utils/logger.js';
import { compareListings, formatSummary, summarize } from './comparator.js';
import type {
  BothWaysSyncResult,
  CompareSnapshot,
  CompareStatus,
  CompareSummary,
  OneWaySyncResult,
  PaneState,
  SyncDirection,
} from './types.js';

export interface CompareSessionOptions {
  lister?: DirectoryLister;
  copy?: CopyPrimitive;
  status?: StatusSink;
}

const SYNCABLE: Record<SyncDirection, readonly CompareStatus[]> = {
  'left-to-right': ['left_only', 'different'],
  'right-to-left': ['right_only', 'different'],
};

const ARROW: Record<SyncDirection, string> = {
  'left-to-right': 'left→right',
  'right-to-left': 'right→left',
};

function sourceSide(direction: SyncDirection): Side {
  return direction === 'left-to-right' ? 'left' : 'right';
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function emptyPane(): PaneState {
  return { path: '', entries: [], selected: new Set() };
}

/**
 * Compare mode over two directories. The snapshot is only ever replaced
 * wholesale: every sync relists both panes and classifies again.
 */
export class CompareSession {
  private _snapshot: CompareSnapshot | null = null;
  private readonly panes: Record<Side, PaneState> = { left: emptyPane(), right: emptyPane() };

  private readonly lister: DirectoryLister;
  private readonly copy: CopyPrimitive;
  private readonly status: StatusSink;

  constructor(options: CompareSessionOptions = {}) {
    this.lister = options.lister ?? createLister();
    this.copy = options.copy ?? createCopier();
    this.status = options.status ?? loggerStatusSink;
  }

  get active(): boolean {
    return this._snapshot !== null;
  }

  get snapshot(): CompareSnapshot | null {
    return this._snapshot;
  }

  pane(side: Side): PaneState {
    return this.panes[side];
  }

  enter(leftDir: string, rightDir: string): CompareSnapshot {
    this.panes.left = { ...emptyPane(), path: leftDir };
    this.panes.right = { ...emptyPane(), path: rightDir };
    return this.refresh();
  }

  exit(): void {
    this._snapshot = null;
    this.panes.left = emptyPane();
    this.panes.right = emptyPane();
    this.status.setStatus('Compare mode exited');
  }

  /** Relists both panes and rebuilds the snapshot from scratch. */
  refresh(): CompareSnapshot {
    for (const side of ['left', 'right'] as const) {
      const pane = this.panes[side];
      pane.entries = this.lister(pane.path);
      if (pane.highlighted && !pane.entries.some((e) => e.name === pane.highlighted)) {
        pane.highlighted = undefined;
      }
    }
    const snapshot = compareListings(this.panes.left.entries, this.panes.right.entries);
    this._snapshot = snapshot;
    this.status.setStatus(formatSummary(summarize(snapshot)));
    return snapshot;
  }

  summary(): CompareSummary | null {
    return this._snapshot ? summarize(this._snapshot) : null;
  }

  toggleSelection(side: Side, name: string): boolean {
    const pane = this.panes[side];
    if (name === PARENT_ENTRY_NAME || !pane.entries.some((e) => e.name === name)) return false;
    if (pane.selected.has(name)) {
      pane.selected.delete(name);
    } else {
      pane.selected.add(name);
    }
    return true;
  }

  highlight(side: Side, name: string): boolean {
    const pane = this.panes[side];
    if (!pane.entries.some((e) => e.name === name)) return false;
    pane.highlighted = name;
    return true;
  }

  private targets(direction: SyncDirection, snapshot: CompareSnapshot): DirectoryEntry[] {
    const side = sourceSide(direction);
    const pane = this.panes[side];
    const names = pane.selected.size > 0 ? [...pane.selected] : pane.highlighted ? [pane.highlighted] : [];

    const entries: DirectoryEntry[] = [];
    for (const name of names) {
      const compared = snapshot.get(name);
      if (!compared || !SYNCABLE[direction].includes(compared.status)) continue;
      const entry = compared[side];
      if (entry && !isParentEntry(entry)) entries.push(entry);
    }
    return entries;
  }

  private copyInto(entry: DirectoryEntry, to: Side): string | null {
    const dest = path.join(this.panes[to].path, entry.name);
    try {
      this.copy(entry.path, dest);
      logger.debug(`Copied ${entry.path} -> ${dest}`);
      return null;
    } catch (err) {
      const message = errorMessage(err);
      logger.debug(`Copy of ${entry.path} failed: ${message}`);
      return message;
    }
  }

  // Selections never survive a relist.
  private afterSync(): void {
    this.panes.left.selected.clear();
    this.panes.right.selected.clear();
    this.refresh();
  }

  syncOneDirection(direction: SyncDirection): OneWaySyncResult | null {
    if (!this._snapshot) {
      this.status.setStatus('Not in compare mode');
      return null;
    }

    const from = sourceSide(direction);
    const entries = this.targets(direction, this._snapshot);
    if (entries.length === 0) {
      this.status.setStatus(`No files to sync (select ${from}_only or different files)`);
      return { direction, attempted: 0, copiedCount: 0 };
    }

    const result: OneWaySyncResult = { direction, attempted: entries.length, copiedCount: 0 };
    for (const entry of entries) {
      const failure = this.copyInto(entry, otherSide(from));
      if (failure) {
        result.lastError = failure;
      } else {
        result.copiedCount++;
      }
    }

    this.afterSync();

    const base = `Synced ${result.copiedCount} file(s) ${ARROW[direction]}`;
    this.status.setStatus(result.lastError ? `${base}, last error: ${result.lastError}` : base);
    return result;
  }

  /**
   * Copies one-sided entries across and, for files that differ, the newer
   * file over the older. Equal modification times copy nothing.
   */
  syncBothWays(): BothWaysSyncResult | null {
    if (!this._snapshot) {
      this.status.setStatus('Not in compare mode');
      return null;
    }

    const result: BothWaysSyncResult = { leftToRightCount: 0, rightToLeftCount: 0, newerCopiedCount: 0 };
    const names = [...this._snapshot.keys()].sort();

    for (const name of names) {
      const compared = this._snapshot.get(name);
      if (!compared) continue;
      const { left, right } = compared;

      if (compared.status === 'left_only' && left) {
        const failure = this.copyInto(left, 'right');
        if (failure) result.lastError = failure;
        else result.leftToRightCount++;
      } else if (compared.status === 'right_only' && right) {
        const failure = this.copyInto(right, 'left');
        if (failure) result.lastError = failure;
        else result.rightToLeftCount++;
      } else if (compared.status === 'different' && left && right) {
        if (left.isDirectory || right.isDirectory) continue;
        const leftTime = left.modTime.getTime();
        const rightTime = right.modTime.getTime();
        if (leftTime === rightTime) continue;

        const leftNewer = leftTime > rightTime;
        const failure = leftNewer ? this.copyInto(left, 'right') : this.copyInto(right, 'left');
        if (failure) {
          result.lastError = failure;
        } else {
          if (leftNewer) result.leftToRightCount++;
          else result.rightToLeftCount++;
          result.newerCopiedCount++;
        }
      }
    }

    this.afterSync();

    const base =
      `Synced both ways: ${result.leftToRightCount} left→right, ` +
      `${result.rightToLeftCount} right→left, ${result.newerCopiedCount} newer copied`;
    this.status.setStatus(result.lastError ? `${base} | Error: ${result.lastError}` : base);
    return result;
  }
}
