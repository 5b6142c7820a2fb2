export { calculateDiff, hasDifferences, DEFAULT_LOOKAHEAD } from './diff/calculator.js';
export { findDifference } from './diff/navigator.js';
export type { Direction, NavigationHit } from './diff/navigator.js';
export { mergeBlock, spliceRange } from './diff/merger.js';
export type { MergeDirection } from './diff/merger.js';
export { applyEdit, clampCursor } from './diff/editor.js';
export type { Cursor, CursorMove, EditOp, EditOutcome } from './diff/editor.js';
export { decodeText, isTextContent, parseLines, serializeLines } from './diff/line-buffer.js';
export { isEmptyRange, rangeLength, otherSide } from './diff/types.js';
export type { BlockKind, DiffBlock, LineBuffer, LineRange, Side } from './diff/types.js';
export { DiffSession } from './session/diff-session.js';
export type { DiffSessionOptions } from './session/diff-session.js';
export {
  closeAtEndOfInput,
  CommandParseError,
  executeCommand,
  parseCommand,
  runCommands,
} from './session/commands.js';
export type { CommandHooks, InputEnd, SessionCommand } from './session/commands.js';
export type {
  CloseChoice,
  CloseGuard,
  CloseResult,
  DiffView,
  OpenRejection,
  OpenResult,
  SelectedEntry,
  SessionState,
} from './session/types.js';
export { compareListings, classifyPair, summarize, formatSummary } from './compare/comparator.js';
export { CompareSession } from './compare/compare-session.js';
export type { CompareSessionOptions } from './compare/compare-session.js';
export { isOneWaySync } from './compare/types.js';
export type {
  BothWaysSyncResult,
  CompareEntry,
  CompareSnapshot,
  CompareStatus,
  CompareSummary,
  OneWaySyncResult,
  PaneState,
  SyncDirection,
  SyncResult,
} from './compare/types.js';
export { NodeFileIO } from './fs/file-io.js';
export { listDirectory, createLister, entryForPath } from './fs/listing.js';
export type { ListingOptions } from './fs/listing.js';
export { copyEntry, createCopier } from './fs/copy.js';
export type { CopyOptions } from './fs/copy.js';
export { PARENT_ENTRY_NAME } from './fs/types.js';
export type { CopyPrimitive, DirectoryEntry, DirectoryLister, FileIO, FileMeta } from './fs/types.js';
export { StatusLog, loggerStatusSink } from './status/status-sink.js';
export type { StatusSink } from './status/status-sink.js';
export { createReporter } from './reporter/reporter.js';
export type { Reporter } from './reporter/reporter.js';
export { loadConfig, ConfigError } from './config/loader.js';
export type { CLIOptions } from './config/loader.js';
export { TwinpaneConfigSchema } from './config/schema.js';
export type { TwinpaneConfig } from './config/schema.js';
export { formatSize } from './utils/format.js';
