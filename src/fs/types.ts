export const PARENT_ENTRY_NAME = '..';

export interface FileMeta {
  size: number;
  modTime: Date;
  isDirectory: boolean;
}

export interface DirectoryEntry extends FileMeta {
  name: string;
  path: string;
}

export interface FileIO {
  readFile(filePath: string): Uint8Array;
  writeFile(filePath: string, content: string): void;
}

export type DirectoryLister = (dir: string) => DirectoryEntry[];

export type CopyPrimitive = (src: string, dst: string) => void;

export function isParentEntry(entry: { name: string }): boolean {
  return entry.name === PARENT_ENTRY_NAME;
}
