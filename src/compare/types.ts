import type { DirectoryEntry } from '../fs/types.js';

export type CompareStatus = 'left_only' | 'right_only' | 'different' | 'identical';

export interface CompareEntry {
  name: string;
  status: CompareStatus;
  left?: DirectoryEntry;
  right?: DirectoryEntry;
}

export type CompareSnapshot = Map<string, CompareEntry>;

export type CompareSummary = Record<CompareStatus, number> & { total: number };

export type SyncDirection = 'left-to-right' | 'right-to-left';

export interface PaneState {
  path: string;
  entries: DirectoryEntry[];
  selected: Set<string>;
  highlighted?: string;
}

export interface OneWaySyncResult {
  direction: SyncDirection;
  attempted: number;
  copiedCount: number;
  lastError?: string;
}

export interface BothWaysSyncResult {
  leftToRightCount: number;
  rightToLeftCount: number;
  newerCopiedCount: number;
  lastError?: string;
}

export type SyncResult = OneWaySyncResult | BothWaysSyncResult;

export function isOneWaySync(result: SyncResult): result is OneWaySyncResult {
  return 'direction' in result;
}
