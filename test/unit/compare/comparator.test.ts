import { describe, it, expect } from 'vitest';
import { classifyPair, compareListings, formatSummary, summarize } from '../../../src/compare/comparator.js';
import type { DirectoryEntry } from '../../../src/fs/types.js';

function file(name: string, size: number, mtime: number): DirectoryEntry {
  return { name, path: `/x/${name}`, size, modTime: new Date(mtime), isDirectory: false };
}

function dir(name: string, mtime = 0): DirectoryEntry {
  return { name, path: `/x/${name}`, size: 0, modTime: new Date(mtime), isDirectory: true };
}

describe('classifyPair', () => {
  it('should treat files with equal size and mtime as identical', () => {
    expect(classifyPair(file('a', 10, 1000), file('a', 10, 1000))).toBe('identical');
  });

  it('should flag a size mismatch', () => {
    expect(classifyPair(file('a', 10, 1000), file('a', 11, 1000))).toBe('different');
  });

  it('should flag an mtime mismatch even with equal size', () => {
    expect(classifyPair(file('a', 10, 1000), file('a', 10, 2000))).toBe('different');
  });

  it('should treat two directories as identical regardless of mtime', () => {
    expect(classifyPair(dir('d', 1), dir('d', 2))).toBe('identical');
  });

  it('should flag a file against a directory', () => {
    expect(classifyPair(file('d', 0, 0), dir('d'))).toBe('different');
  });
});

describe('compareListings', () => {
  it('should classify every name once and ignore the parent placeholder', () => {
    const left = [dir('..'), file('a.txt', 5, 1000), file('b.txt', 5, 1000), file('c.txt', 1, 1000)];
    const right = [dir('..'), file('b.txt', 5, 1000), file('c.txt', 2, 1000), file('d.txt', 1, 1000)];

    const snapshot = compareListings(left, right);

    expect([...snapshot.keys()].sort()).toEqual(['a.txt', 'b.txt', 'c.txt', 'd.txt']);
    expect(snapshot.get('a.txt')?.status).toBe('left_only');
    expect(snapshot.get('a.txt')?.right).toBeUndefined();
    expect(snapshot.get('b.txt')?.status).toBe('identical');
    expect(snapshot.get('c.txt')?.status).toBe('different');
    expect(snapshot.get('d.txt')?.status).toBe('right_only');
    expect(snapshot.get('d.txt')?.left).toBeUndefined();
  });

  it('should return an empty snapshot for two empty listings', () => {
    expect(compareListings([dir('..')], []).size).toBe(0);
  });
});

describe('summarize', () => {
  it('should count each status and the total', () => {
    const snapshot = compareListings(
      [file('a', 1, 0), file('b', 1, 0), dir('sub')],
      [file('b', 2, 0), dir('sub'), file('z', 1, 0)],
    );

    const summary = summarize(snapshot);

    expect(summary).toEqual({ total: 4, left_only: 1, right_only: 1, different: 1, identical: 1 });
    expect(formatSummary(summary)).toBe(
      'Compare: 4 files | Left only: 1 | Right only: 1 | Different: 1 | Identical: 1',
    );
  });
});
