import type { CompareSnapshot, SyncResult } from '../compare/types.js';
import type { DiffView } from '../session/types.js';
import { TextReporter } from './text-reporter.js';
import { JsonReporter } from './json-reporter.js';

export interface Reporter {
  reportDiff(view: DiffView): string;
  reportCompare(snapshot: CompareSnapshot): string;
  reportSync(result: SyncResult): string;
}

export function createReporter(format: 'text' | 'json'): Reporter {
  switch (format) {
    case 'text':
      return new TextReporter();
    case 'json':
      return new JsonReporter();
  }
}
