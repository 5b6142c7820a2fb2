import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createLister, entryForPath, listDirectory } from '../../../src/fs/listing.js';

describe('listDirectory', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'twinpane-list-'));
    fs.writeFileSync(path.join(tmpDir, 'B.txt'), 'bee');
    fs.writeFileSync(path.join(tmpDir, 'a.txt'), 'a');
    fs.writeFileSync(path.join(tmpDir, '.hidden'), '');
    fs.mkdirSync(path.join(tmpDir, 'zdir'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should put the parent first, then directories, then files', () => {
    const names = listDirectory(tmpDir).map((e) => e.name);
    expect(names).toEqual(['..', 'zdir', '.hidden', 'a.txt', 'B.txt']);
  });

  it('should point the parent placeholder at the parent directory', () => {
    const [parent] = listDirectory(tmpDir);
    expect(parent.path).toBe(path.dirname(path.resolve(tmpDir)));
    expect(parent.isDirectory).toBe(true);
  });

  it('should report file sizes and zero for directories', () => {
    const entries = listDirectory(tmpDir);
    expect(entries.find((e) => e.name === 'B.txt')?.size).toBe(3);
    expect(entries.find((e) => e.name === 'zdir')?.size).toBe(0);
    expect(entries.find((e) => e.name === 'zdir')?.isDirectory).toBe(true);
  });

  it('should hide dot files when asked', () => {
    const names = listDirectory(tmpDir, { showHidden: false }).map((e) => e.name);
    expect(names).toEqual(['..', 'zdir', 'a.txt', 'B.txt']);
  });

  it('should drop names matching an exclude glob', () => {
    const names = createLister({ exclude: ['*.txt'] })(tmpDir).map((e) => e.name);
    expect(names).toEqual(['..', 'zdir', '.hidden']);
  });

  it('should omit the parent at a filesystem root', () => {
    const root = path.parse(path.resolve(tmpDir)).root;
    const entries = listDirectory(root);
    expect(entries.some((e) => e.name === '..')).toBe(false);
  });

  it('should keep whole-millisecond modification times', () => {
    const when = new Date('2024-03-01T12:00:00Z');
    fs.utimesSync(path.join(tmpDir, 'a.txt'), when, when);
    const entry = listDirectory(tmpDir).find((e) => e.name === 'a.txt');
    expect(entry?.modTime.getTime()).toBe(when.getTime());
  });
});

describe('entryForPath', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'twinpane-entry-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should stat an existing file', () => {
    const filePath = path.join(tmpDir, 'f.txt');
    fs.writeFileSync(filePath, 'hello');
    expect(entryForPath(filePath)).toMatchObject({
      name: 'f.txt',
      path: filePath,
      isDirectory: false,
      size: 5,
    });
  });

  it('should mark directories', () => {
    expect(entryForPath(tmpDir).isDirectory).toBe(true);
  });

  it('should fall back to a plain file entry for a missing path', () => {
    const missing = path.join(tmpDir, 'nope.txt');
    expect(entryForPath(missing)).toEqual({
      name: 'nope.txt',
      path: missing,
      isDirectory: false,
      size: 0,
      modTime: new Date(0),
    });
  });
});
