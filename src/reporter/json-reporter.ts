import type { CompareSnapshot, SyncResult } from '../compare/types.js';
import type { DiffView } from '../session/types.js';
import type { Reporter } from './reporter.js';

export class JsonReporter implements Reporter {
  reportDiff(view: DiffView): string {
    return JSON.stringify(
      {
        leftPath: view.leftPath,
        rightPath: view.rightPath,
        leftModified: view.leftModified,
        rightModified: view.rightModified,
        currentBlockIndex: view.currentBlockIndex,
        blocks: view.blocks,
      },
      null,
      2,
    );
  }

  reportCompare(snapshot: CompareSnapshot): string {
    const entries = [...snapshot.values()]
      .sort((a, b) => a.name.localeCompare(b.name))
      .map(({ name, status, left, right }) => ({
        name,
        status,
        ...(left && { left: { size: left.size, modTime: left.modTime.toISOString(), isDirectory: left.isDirectory } }),
        ...(right && { right: { size: right.size, modTime: right.modTime.toISOString(), isDirectory: right.isDirectory } }),
      }));
    return JSON.stringify(entries, null, 2);
  }

  reportSync(result: SyncResult): string {
    return JSON.stringify(result, null, 2);
  }
}
