import type { EditOp } from '../diff/editor.js';
import type { MergeDirection } from '../diff/merger.js';
import type { Direction } from '../diff/navigator.js';
import type { DiffSession } from './diff-session.js';
import type { CloseChoice, DiffView } from './types.js';

export class CommandParseError extends Error {
  constructor(
    message: string,
    public readonly input: string,
  ) {
    super(message);
    this.name = 'CommandParseError';
  }
}

export type SessionCommand =
  | { kind: 'navigate'; direction: Direction }
  | { kind: 'merge'; direction: MergeDirection }
  | { kind: 'switch-side' }
  | { kind: 'enter-edit' }
  | { kind: 'exit-edit' }
  | { kind: 'edit'; op: EditOp }
  | { kind: 'scroll'; delta: number }
  | { kind: 'save' }
  | { kind: 'close' }
  | { kind: 'resolve-close'; choice: CloseChoice }
  | { kind: 'show' };

const SIMPLE_COMMANDS = new Map<string, SessionCommand>(Object.entries({
  next: { kind: 'navigate', direction: 'next' },
  n: { kind: 'navigate', direction: 'next' },
  prev: { kind: 'navigate', direction: 'previous' },
  p: { kind: 'navigate', direction: 'previous' },
  '>': { kind: 'merge', direction: 'left-to-right' },
  '<': { kind: 'merge', direction: 'right-to-left' },
  side: { kind: 'switch-side' },
  edit: { kind: 'enter-edit' },
  e: { kind: 'enter-edit' },
  'exit-edit': { kind: 'exit-edit' },
  enter: { kind: 'edit', op: { type: 'split' } },
  backspace: { kind: 'edit', op: { type: 'backspace' } },
  delete: { kind: 'edit', op: { type: 'delete' } },
  up: { kind: 'edit', op: { type: 'move', to: 'up' } },
  down: { kind: 'edit', op: { type: 'move', to: 'down' } },
  left: { kind: 'edit', op: { type: 'move', to: 'left' } },
  right: { kind: 'edit', op: { type: 'move', to: 'right' } },
  home: { kind: 'edit', op: { type: 'move', to: 'home' } },
  end: { kind: 'edit', op: { type: 'move', to: 'end' } },
  save: { kind: 'save' },
  w: { kind: 'save' },
  close: { kind: 'close' },
  q: { kind: 'close' },
  'save!': { kind: 'resolve-close', choice: 'save' },
  'discard!': { kind: 'resolve-close', choice: 'discard' },
  'cancel!': { kind: 'resolve-close', choice: 'cancel' },
  show: { kind: 'show' },
} satisfies Record<string, SessionCommand>));

/**
 * Parses one command line. Blank lines and `#` comments yield null.
 * Everything after `type ` is inserted verbatim, spaces included.
 */
export function parseCommand(line: string): SessionCommand | null {
  const raw = line.replace(/\r$/, '').replace(/^\s+/, '');
  if (raw === '' || raw.startsWith('#')) return null;

  const spaceAt = raw.indexOf(' ');
  const word = spaceAt === -1 ? raw : raw.slice(0, spaceAt);
  const rest = spaceAt === -1 ? '' : raw.slice(spaceAt + 1);

  if (word === 'type') {
    if (rest === '') {
      throw new CommandParseError('type needs text to insert', line);
    }
    return { kind: 'edit', op: { type: 'insert', text: rest } };
  }

  if (word === 'scroll') {
    const delta = Number(rest.trim());
    if (rest.trim() === '' || !Number.isInteger(delta)) {
      throw new CommandParseError(`scroll needs a whole number of lines, got "${rest.trim()}"`, line);
    }
    return { kind: 'scroll', delta };
  }

  const command = SIMPLE_COMMANDS.get(word);
  if (!command || rest.trim() !== '') {
    throw new CommandParseError(`Unknown command: ${raw.trim()}`, line);
  }
  return command;
}

export interface CommandHooks {
  show?: (view: DiffView) => void;
}

/** Applies one command; returns whether the session accepted it. */
export function executeCommand(
  session: DiffSession,
  command: SessionCommand,
  hooks: CommandHooks = {},
): boolean {
  switch (command.kind) {
    case 'navigate':
      return session.navigate(command.direction);
    case 'merge':
      return session.merge(command.direction);
    case 'switch-side':
      return session.switchSide();
    case 'enter-edit':
      return session.enterEdit();
    case 'exit-edit':
      return session.exitEdit();
    case 'edit':
      return session.editOp(command.op);
    case 'scroll':
      session.scroll(command.delta);
      return session.isOpen;
    case 'save':
      return session.save() > 0;
    case 'close':
      return session.close() === 'closed';
    case 'resolve-close':
      return session.resolveClose(command.choice) === 'closed';
    case 'show':
      if (!session.isOpen) return false;
      hooks.show?.(session);
      return true;
  }
}

/**
 * Runs command lines against an open session until they run out or the
 * session closes. Returns the number of commands executed.
 */
export function runCommands(
  session: DiffSession,
  lines: Iterable<string>,
  hooks: CommandHooks = {},
): number {
  let executed = 0;
  for (const line of lines) {
    if (!session.isOpen) break;
    const command = parseCommand(line);
    if (!command) continue;
    executeCommand(session, command, hooks);
    executed++;
  }
  return executed;
}

export type InputEnd = 'closed' | 'unsaved';

/**
 * Closes a session whose command input has run out. Leaves it open and
 * returns `unsaved` when closing would drop edits that were never written,
 * including edits a two-step close warning already let go of.
 */
export function closeAtEndOfInput(session: DiffSession): InputEnd {
  if (!session.isOpen) return 'closed';
  if (session.state === 'editing') session.exitEdit();
  if (session.state !== 'viewing' || session.hasUnsavedChanges || session.hasDiscardPending) {
    return 'unsaved';
  }
  return session.close() === 'closed' ? 'closed' : 'unsaved';
}
