import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { copyEntry, createCopier } from '../../../src/fs/copy.js';
import { NodeFileIO } from '../../../src/fs/file-io.js';

describe('copyEntry', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'twinpane-copy-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should overwrite a file and keep its modification time', () => {
    const src = path.join(tmpDir, 'src.txt');
    const dst = path.join(tmpDir, 'dst.txt');
    const when = new Date('2023-05-05T05:05:05Z');
    fs.writeFileSync(src, 'new');
    fs.utimesSync(src, when, when);
    fs.writeFileSync(dst, 'old');

    copyEntry(src, dst);

    expect(fs.readFileSync(dst, 'utf-8')).toBe('new');
    expect(Math.round(fs.statSync(dst).mtimeMs)).toBe(when.getTime());
  });

  it('should copy a directory tree into an existing directory', () => {
    const src = path.join(tmpDir, 'src');
    const dst = path.join(tmpDir, 'dst');
    fs.mkdirSync(path.join(src, 'nested'), { recursive: true });
    fs.writeFileSync(path.join(src, 'nested', 'deep.txt'), 'deep');
    fs.mkdirSync(dst);
    fs.writeFileSync(path.join(dst, 'keep.txt'), 'keep');

    createCopier()(src, dst);

    expect(fs.readFileSync(path.join(dst, 'nested', 'deep.txt'), 'utf-8')).toBe('deep');
    expect(fs.readFileSync(path.join(dst, 'keep.txt'), 'utf-8')).toBe('keep');
  });

  it('should fail for a missing source', () => {
    expect(() => copyEntry(path.join(tmpDir, 'missing'), path.join(tmpDir, 'x'))).toThrow();
  });
});

describe('NodeFileIO', () => {
  it('should write text and read back bytes', () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'twinpane-io-'));
    try {
      const io = new NodeFileIO();
      const filePath = path.join(tmpDir, 'f.txt');
      io.writeFile(filePath, 'héllo\n');
      expect(new TextDecoder().decode(io.readFile(filePath))).toBe('héllo\n');
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });
});
