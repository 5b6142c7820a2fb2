import pc from 'picocolors';
import { formatSummary, summarize } from '../compare/comparator.js';
import { isOneWaySync, type CompareEntry, type CompareSnapshot, type CompareStatus, type SyncResult } from '../compare/types.js';
import { isEmptyRange, type BlockKind, type LineRange } from '../diff/types.js';
import type { DiffView } from '../session/types.js';
import { formatSize } from '../utils/format.js';
import type { Reporter } from './reporter.js';

function kindLabel(kind: BlockKind): string {
  switch (kind) {
    case 'equal':
      return pc.dim('[EQUAL]  ');
    case 'add':
      return pc.green('[ADD]    ');
    case 'delete':
      return pc.red('[DELETE] ');
    case 'modify':
      return pc.yellow('[MODIFY] ');
  }
}

function statusLabel(status: CompareStatus): string {
  switch (status) {
    case 'left_only':
      return pc.cyan('[LEFT ONLY]  ');
    case 'right_only':
      return pc.magenta('[RIGHT ONLY] ');
    case 'different':
      return pc.yellow('[DIFFERENT]  ');
    case 'identical':
      return pc.dim('[IDENTICAL]  ');
  }
}

/** 1-based, inclusive; an empty range shows where lines would be inserted. */
export function formatRange(range: LineRange): string {
  if (isEmptyRange(range)) return `(at ${range.start + 1})`;
  if (range.start === range.end) return `${range.start + 1}`;
  return `${range.start + 1}-${range.end + 1}`;
}

function describeSide(entry: CompareEntry['left']): string {
  if (!entry) return '-';
  return entry.isDirectory ? '<DIR>' : formatSize(entry.size);
}

export class TextReporter implements Reporter {
  reportDiff(view: DiffView): string {
    const lines: string[] = [];
    const differing = view.blocks.filter((b) => b.kind !== 'equal').length;

    lines.push('');
    lines.push(pc.bold('Diff Report'));
    lines.push('═'.repeat(50));
    lines.push(`Left:  ${view.leftPath}${view.leftModified ? pc.yellow(' [modified]') : ''}`);
    lines.push(`Right: ${view.rightPath}${view.rightModified ? pc.yellow(' [modified]') : ''}`);
    lines.push(`Blocks: ${view.blocks.length} (${differing} differing)`);
    lines.push('');

    view.blocks.forEach((block, idx) => {
      const marker = idx === view.currentBlockIndex ? '▶' : ' ';
      lines.push(
        `${marker} ${kindLabel(block.kind)} L ${formatRange(block.leftRange)}  R ${formatRange(block.rightRange)}`,
      );
      if (block.kind === 'equal') return;
      if (!isEmptyRange(block.leftRange)) {
        for (const text of view.left.slice(block.leftRange.start, block.leftRange.end + 1)) {
          lines.push(pc.red(`    - ${text}`));
        }
      }
      if (!isEmptyRange(block.rightRange)) {
        for (const text of view.right.slice(block.rightRange.start, block.rightRange.end + 1)) {
          lines.push(pc.green(`    + ${text}`));
        }
      }
    });

    lines.push('');
    return lines.join('\n');
  }

  reportCompare(snapshot: CompareSnapshot): string {
    const lines: string[] = [];

    lines.push('');
    lines.push(pc.bold('Compare Report'));
    lines.push('═'.repeat(50));

    const entries = [...snapshot.values()].sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      lines.push(
        `  ${statusLabel(entry.status)}${entry.name} ${pc.dim(`(${describeSide(entry.left)} | ${describeSide(entry.right)})`)}`,
      );
    }

    lines.push(pc.dim('─'.repeat(50)));
    lines.push(formatSummary(summarize(snapshot)));
    lines.push('');
    return lines.join('\n');
  }

  reportSync(result: SyncResult): string {
    if (isOneWaySync(result)) {
      const arrow = result.direction === 'left-to-right' ? 'left→right' : 'right→left';
      const base = `Synced ${result.copiedCount}/${result.attempted} file(s) ${arrow}`;
      return result.lastError ? `${base}\n${pc.red(`Last error: ${result.lastError}`)}` : base;
    }
    const base =
      `Synced both ways: ${result.leftToRightCount} left→right, ` +
      `${result.rightToLeftCount} right→left, ${result.newerCopiedCount} newer copied`;
    return result.lastError ? `${base}\n${pc.red(`Last error: ${result.lastError}`)}` : base;
  }
}
