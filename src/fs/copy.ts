import fs from 'node:fs';
import type { CopyPrimitive } from './types.js';

export interface CopyOptions {
  preserveTimestamps?: boolean;
}

/**
 * Copies a file, or a directory tree into `dst` (merging with whatever is
 * already there). File modes are kept.
 */
export function copyEntry(src: string, dst: string, options: CopyOptions = {}): void {
  const stat = fs.statSync(src);
  fs.cpSync(src, dst, {
    recursive: stat.isDirectory(),
    force: true,
    errorOnExist: false,
    preserveTimestamps: options.preserveTimestamps ?? true,
  });
}

export function createCopier(options: CopyOptions = {}): CopyPrimitive {
  return (src, dst) => copyEntry(src, dst, options);
}
