import { describe, it, expect } from 'vitest';
import { decodeText, isTextContent, parseLines, serializeLines } from '../../../src/diff/line-buffer.js';

describe('parseLines', () => {
  it('should drop the single empty line left by a trailing newline', () => {
    expect(parseLines('a\nb\n')).toEqual(['a', 'b']);
    expect(parseLines('a\nb')).toEqual(['a', 'b']);
  });

  it('should keep blank lines before the final newline', () => {
    expect(parseLines('a\n\n')).toEqual(['a', '']);
  });

  it('should normalise empty content to one empty line', () => {
    expect(parseLines('')).toEqual(['']);
    expect(parseLines('\n')).toEqual(['']);
  });

  it('should decode bytes as UTF-8', () => {
    expect(parseLines(Buffer.from('héllo\nwörld\n', 'utf-8'))).toEqual(['héllo', 'wörld']);
  });
});

describe('decodeText', () => {
  it('should keep a leading byte order mark', () => {
    const bytes = Uint8Array.from([0xef, 0xbb, 0xbf, 0x61, 0x0a]);
    expect(decodeText(bytes)).toBe('\uFEFFa\n');
  });

  it('should return null for bytes that are not UTF-8', () => {
    expect(decodeText(Uint8Array.from([0x63, 0x61, 0x66, 0xe9, 0x0a]))).toBeNull();
  });
});

describe('serializeLines', () => {
  it('should join with newlines and append exactly one', () => {
    expect(serializeLines(['a', 'b'])).toBe('a\nb\n');
    expect(serializeLines([''])).toBe('\n');
  });

  it('should write a byte order mark back unchanged', () => {
    const bytes = Uint8Array.from([0xef, 0xbb, 0xbf, 0x63, 0x61, 0x66, 0xc3, 0xa9, 0x0a, 0x78, 0x0a]);
    const written = Buffer.from(serializeLines(parseLines(bytes)), 'utf-8');
    expect([...written]).toEqual([...bytes]);
  });
});

describe('isTextContent', () => {
  it('should reject content with a NUL byte inside the probe window', () => {
    const bytes = new Uint8Array(100).fill(65);
    bytes[10] = 0;
    expect(isTextContent(bytes)).toBe(false);
  });

  it('should only look at the first probe bytes', () => {
    const bytes = new Uint8Array(8193).fill(65);
    bytes[8192] = 0;
    expect(isTextContent(bytes)).toBe(true);
    bytes[8191] = 0;
    expect(isTextContent(bytes)).toBe(false);
  });

  it('should accept a custom probe size', () => {
    const bytes = Uint8Array.from([65, 66, 0]);
    expect(isTextContent(bytes, 2)).toBe(true);
    expect(isTextContent(bytes, 3)).toBe(false);
  });
});
