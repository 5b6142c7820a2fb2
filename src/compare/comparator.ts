import { isParentEntry, type DirectoryEntry } from '../fs/types.js';
import type { CompareEntry, CompareSnapshot, CompareStatus, CompareSummary } from './types.js';

function indexByName(entries: readonly DirectoryEntry[]): Map<string, DirectoryEntry> {
  const byName = new Map<string, DirectoryEntry>();
  for (const entry of entries) {
    if (isParentEntry(entry)) continue;
    byName.set(entry.name, entry);
  }
  return byName;
}

export function classifyPair(left: DirectoryEntry, right: DirectoryEntry): CompareStatus {
  if (left.isDirectory && right.isDirectory) {
    return 'identical';
  }
  if (!left.isDirectory && !right.isDirectory) {
    return left.size === right.size && left.modTime.getTime() === right.modTime.getTime()
      ? 'identical'
      : 'different';
  }
  return 'different';
}

/**
 * Classifies every name across two single-level listings. Directories on
 * both sides count as identical by name alone; files compare by size and
 * modification time.
 */
export function compareListings(
  leftEntries: readonly DirectoryEntry[],
  rightEntries: readonly DirectoryEntry[],
): CompareSnapshot {
  const leftByName = indexByName(leftEntries);
  const rightByName = indexByName(rightEntries);
  const snapshot: CompareSnapshot = new Map<string, CompareEntry>();

  for (const [name, left] of leftByName) {
    const right = rightByName.get(name);
    if (right) {
      snapshot.set(name, { name, status: classifyPair(left, right), left, right });
    } else {
      snapshot.set(name, { name, status: 'left_only', left });
    }
  }

  for (const [name, right] of rightByName) {
    if (!leftByName.has(name)) {
      snapshot.set(name, { name, status: 'right_only', right });
    }
  }

  return snapshot;
}

export function summarize(snapshot: CompareSnapshot): CompareSummary {
  const summary: CompareSummary = {
    total: snapshot.size,
    left_only: 0,
    right_only: 0,
    different: 0,
    identical: 0,
  };
  for (const entry of snapshot.values()) {
    summary[entry.status]++;
  }
  return summary;
}

export function formatSummary(summary: CompareSummary): string {
  return (
    `Compare: ${summary.total} files | Left only: ${summary.left_only} | ` +
    `Right only: ${summary.right_only} | Different: ${summary.different} | ` +
    `Identical: ${summary.identical}`
  );
}
