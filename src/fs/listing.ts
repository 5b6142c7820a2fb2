import fs from 'node:fs';
import path from 'node:path';
import { minimatch } from 'minimatch';
import { logger } from '../utils/logger.js';
import { PARENT_ENTRY_NAME, type DirectoryEntry, type DirectoryLister } from './types.js';

export interface ListingOptions {
  exclude?: string[];
  showHidden?: boolean;
}

function isExcluded(name: string, patterns: string[]): boolean {
  return patterns.some((p) => minimatch(name, p, { dot: true }));
}

// Rounded to the millisecond so a copy whose timestamps were set from the
// source compares equal to it.
function modTimeOf(stat: fs.Stats): Date {
  return new Date(Math.round(stat.mtimeMs));
}

function compareEntries(a: DirectoryEntry, b: DirectoryEntry): number {
  if (a.name === PARENT_ENTRY_NAME) return -1;
  if (b.name === PARENT_ENTRY_NAME) return 1;
  if (a.isDirectory !== b.isDirectory) return a.isDirectory ? -1 : 1;
  const x = a.name.toLowerCase();
  const y = b.name.toLowerCase();
  return x < y ? -1 : x > y ? 1 : 0;
}

/**
 * Lists one directory level. A `..` placeholder pointing at the parent
 * comes first unless `dir` is a filesystem root, then directories, then
 * files, each group ordered case-insensitively.
 */
export function listDirectory(dir: string, options: ListingOptions = {}): DirectoryEntry[] {
  const { exclude = [], showHidden = true } = options;
  const absDir = path.resolve(dir);
  const entries: DirectoryEntry[] = [];

  const parent = path.dirname(absDir);
  if (parent !== absDir) {
    entries.push({
      name: PARENT_ENTRY_NAME,
      path: parent,
      isDirectory: true,
      size: 0,
      modTime: new Date(0),
    });
  }

  for (const dirent of fs.readdirSync(absDir, { withFileTypes: true })) {
    if (!showHidden && dirent.name.startsWith('.')) continue;
    if (exclude.length > 0 && isExcluded(dirent.name, exclude)) continue;

    const fullPath = path.join(absDir, dirent.name);
    let stat: fs.Stats;
    try {
      stat = fs.statSync(fullPath);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.debug(`Skipping ${fullPath}: ${message}`);
      continue;
    }

    const isDirectory = stat.isDirectory();
    entries.push({
      name: dirent.name,
      path: fullPath,
      isDirectory,
      size: isDirectory ? 0 : stat.size,
      modTime: modTimeOf(stat),
    });
  }

  return entries.sort(compareEntries);
}

export function createLister(options: ListingOptions = {}): DirectoryLister {
  return (dir) => listDirectory(dir, options);
}

/** Builds an entry for a path given directly rather than picked from a listing. */
export function entryForPath(filePath: string): DirectoryEntry {
  const absPath = path.resolve(filePath);
  const name = path.basename(absPath);
  try {
    const stat = fs.statSync(absPath);
    return {
      name,
      path: absPath,
      isDirectory: stat.isDirectory(),
      size: stat.isDirectory() ? 0 : stat.size,
      modTime: modTimeOf(stat),
    };
  } catch {
    // Missing paths surface as read errors when the session opens them.
    return { name, path: absPath, isDirectory: false, size: 0, modTime: new Date(0) };
  }
}
