import fs from 'node:fs';
import type { FileIO } from './types.js';

export class NodeFileIO implements FileIO {
  readFile(filePath: string): Uint8Array {
    return fs.readFileSync(filePath);
  }

  writeFile(filePath: string, content: string): void {
    fs.writeFileSync(filePath, content, 'utf-8');
  }
}
