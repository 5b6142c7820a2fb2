import type { LineBuffer } from './types.js';

export const DEFAULT_BINARY_PROBE_BYTES = 8192;

// ignoreBOM keeps a leading BOM as the first character of line one.
const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Content is treated as text unless a NUL byte shows up within the first
 * `probeBytes` bytes.
 */
export function isTextContent(
  content: Uint8Array,
  probeBytes: number = DEFAULT_BINARY_PROBE_BYTES,
): boolean {
  const limit = Math.min(content.length, probeBytes);
  for (let i = 0; i < limit; i++) {
    if (content[i] === 0) return false;
  }
  return true;
}

/** Strict UTF-8 decode; null when the bytes are not valid UTF-8. */
export function decodeText(content: Uint8Array): string | null {
  try {
    return decoder.decode(content);
  } catch (err) {
    if (err instanceof TypeError) return null;
    throw err;
  }
}

/**
 * Splits text into lines. Bytes are decoded strictly; invalid UTF-8 throws
 * a TypeError, so check with `decodeText` first where that must not abort.
 */
export function parseLines(content: Uint8Array | string): LineBuffer {
  const text = typeof content === 'string' ? content : decoder.decode(content);
  const lines = text.split('\n');
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  if (lines.length === 0) {
    return [''];
  }
  return lines;
}

export function serializeLines(lines: readonly string[]): string {
  return lines.join('\n') + '\n';
}
