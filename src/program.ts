import fs from 'node:fs';
import readline from 'node:readline';
import { Command } from 'commander';
import { CompareSession } from './compare/compare-session.js';
import type { SyncDirection, SyncResult } from './compare/types.js';
import { loadConfig, type CLIOptions } from './config/loader.js';
import type { TwinpaneConfig } from './config/schema.js';
import { createCopier } from './fs/copy.js';
import { createLister, entryForPath } from './fs/listing.js';
import { createReporter, type Reporter } from './reporter/reporter.js';
import {
  closeAtEndOfInput,
  CommandParseError,
  executeCommand,
  parseCommand,
  runCommands,
  type SessionCommand,
} from './session/commands.js';
import { DiffSession } from './session/diff-session.js';
import type { DiffView } from './session/types.js';
import { logger } from './utils/logger.js';

function withCommonOptions(command: Command): Command {
  return command
    .option('--config <path>', 'Path to config file')
    .option('--output <format>', 'Output format: text | json')
    .option('--lookahead <n>', 'Lines to look ahead when resynchronising a diff')
    .option('--exclude <glob...>', 'Leave out entries whose names match')
    .option('--close-guard <mode>', 'Unsaved-changes handling on close: two-step | prompt')
    .option('--verbose', 'Print debug output');
}

export function handleError(err: unknown): never {
  if (err instanceof CommandParseError) {
    logger.error(`${err.message} (input: ${err.input.trim()})`);
  } else if (err instanceof Error) {
    logger.error(err.message);
  } else {
    logger.error(String(err));
  }
  process.exit(1);
}

async function setup(opts: CLIOptions): Promise<{ config: TwinpaneConfig; reporter: Reporter }> {
  const config = await loadConfig(opts);
  logger.level = config.logLevel;
  return { config, reporter: createReporter(config.output) };
}

function print(config: TwinpaneConfig, output: string): void {
  if (config.output === 'json') {
    process.stdout.write(output + '\n');
  } else {
    logger.info(output);
  }
}

async function driveInteractively(session: DiffSession, show: (view: DiffView) => void): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, terminal: false });
  try {
    for await (const line of rl) {
      let command: SessionCommand | null;
      try {
        command = parseCommand(line);
      } catch (err) {
        if (!(err instanceof CommandParseError)) throw err;
        logger.warn(err.message);
        continue;
      }
      if (!command) continue;
      executeCommand(session, command, { show });
      if (!session.isOpen) break;
    }
  } finally {
    rl.close();
  }
}

interface DiffOptions extends CLIOptions {
  script?: string;
  report?: boolean;
}

function diffCommand(): Command {
  return new Command('diff')
    .description('Open two text files side by side and drive the session with commands')
    .argument('<left>', 'Left file')
    .argument('<right>', 'Right file')
    .option('--script <file>', 'Read session commands from a file instead of stdin')
    .option('--binary-probe-bytes <n>', 'Bytes scanned for a NUL when deciding a file is binary')
    .option('--report', 'Print the block report and exit')
    .action(async (left: string, right: string, opts: DiffOptions) => {
      try {
        const { config, reporter } = await setup(opts);
        const session = new DiffSession({
          lookahead: config.lookahead,
          binaryProbeBytes: config.binaryProbeBytes,
          closeGuard: config.closeGuard,
        });

        const opened = session.open(entryForPath(left), entryForPath(right));
        if (!opened.ok) {
          process.exit(1);
        }

        const show = (view: DiffView): void => print(config, reporter.reportDiff(view));
        if (opts.report) {
          show(session);
          return;
        }

        if (opts.script) {
          const lines = fs.readFileSync(opts.script, 'utf-8').split('\n');
          runCommands(session, lines, { show });
        } else {
          await driveInteractively(session, show);
        }

        if (closeAtEndOfInput(session) === 'unsaved') {
          logger.warn('Input ended with the session still open; unsaved edits were not written');
          process.exit(1);
        }
      } catch (err) {
        handleError(err);
      }
    });
}

function compareCommand(): Command {
  return new Command('compare')
    .description('Classify every entry of two directories')
    .argument('<leftDir>', 'Left directory')
    .argument('<rightDir>', 'Right directory')
    .option('--show-hidden', 'Include dot-files in listings')
    .option('--no-show-hidden', 'Leave dot-files out of listings')
    .action(async (leftDir: string, rightDir: string, opts: CLIOptions) => {
      try {
        const { config, reporter } = await setup(opts);
        const session = new CompareSession({
          lister: createLister({ exclude: config.exclude, showHidden: config.showHidden }),
        });
        const snapshot = session.enter(leftDir, rightDir);
        print(config, reporter.reportCompare(snapshot));
      } catch (err) {
        handleError(err);
      }
    });
}

interface SyncOptions extends CLIOptions {
  direction: string;
  all?: boolean;
  failOnError?: boolean;
}

function parseDirection(value: string): SyncDirection | 'both' {
  if (value === 'left-to-right' || value === 'right-to-left' || value === 'both') {
    return value;
  }
  throw new Error(`Unknown sync direction "${value}" (expected left-to-right, right-to-left or both)`);
}

function syncCommand(): Command {
  return new Command('sync')
    .description('Copy entries between two directories based on their comparison')
    .argument('<leftDir>', 'Left directory')
    .argument('<rightDir>', 'Right directory')
    .argument('[names...]', 'Entries to sync (one-way directions only)')
    .requiredOption('--direction <dir>', 'left-to-right | right-to-left | both')
    .option('--all', 'Select every entry on the source side')
    .option('--fail-on-error', 'Exit code 2 if any copy failed')
    .option('--show-hidden', 'Include dot-files in listings')
    .option('--no-show-hidden', 'Leave dot-files out of listings')
    .option('--preserve-timestamps', 'Give copies the modification time of their source')
    .option('--no-preserve-timestamps', 'Let copies take the time they were written')
    .action(async (leftDir: string, rightDir: string, names: string[], opts: SyncOptions) => {
      try {
        const { config, reporter } = await setup(opts);
        const direction = parseDirection(opts.direction);
        const session = new CompareSession({
          lister: createLister({ exclude: config.exclude, showHidden: config.showHidden }),
          copy: createCopier({ preserveTimestamps: config.preserveTimestamps }),
        });
        session.enter(leftDir, rightDir);

        let result: SyncResult | null;
        if (direction === 'both') {
          result = session.syncBothWays();
        } else {
          const side = direction === 'left-to-right' ? 'left' : 'right';
          const selection = opts.all ? session.pane(side).entries.map((e) => e.name) : names;
          for (const name of selection) {
            if (!session.toggleSelection(side, name) && !opts.all) {
              logger.warn(`No entry named "${name}" in ${session.pane(side).path}`);
            }
          }
          result = session.syncOneDirection(direction);
        }

        if (result) {
          print(config, reporter.reportSync(result));
          if (opts.failOnError && result.lastError) {
            process.exit(2);
          }
        }
      } catch (err) {
        handleError(err);
      }
    });
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('twinpane')
    .description('Side-by-side file diff/merge and directory compare/sync')
    .version('0.1.0');

  for (const command of [diffCommand(), compareCommand(), syncCommand()]) {
    program.addCommand(withCommonOptions(command));
  }
  return program;
}
