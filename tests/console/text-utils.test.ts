import { describe, expect, it } from 'vitest';
import {
  clamp,
  charDisplayWidth,
  codePointLength,
  displayWidth,
  snapToCodePointBoundary,
  stepCodePoints,
  toSingleLine,
  truncateToBytes,
  utf8ByteLength,
} from '../../src/console/text-utils.js';

describe('text-utils', () => {
  describe('clamp', () => {
    it('floors and bounds values', () => {
      expect(clamp(3.7, 0, 100)).toBe(3);
      expect(clamp(-5, 0, 100)).toBe(0);
      expect(clamp(200, 0, 100)).toBe(100);
    });

    it('returns min for non-finite input', () => {
      expect(clamp(NaN, 10, 100)).toBe(10);
    });
  });

  it('counts UTF-8 bytes and code points', () => {
    expect(utf8ByteLength('a€😀')).toBe(8);
    expect(codePointLength('a€😀')).toBe(3);
    expect(utf8ByteLength('')).toBe(0);
  });

  describe('truncateToBytes', () => {
    it('never splits a code point', () => {
      expect(truncateToBytes('a€b', 3)).toBe('a');
      expect(truncateToBytes('a€b', 4)).toBe('a€');
      expect(truncateToBytes('😀', 3)).toBe('');
    });

    it('returns an empty string for no room', () => {
      expect(truncateToBytes('abc', 0)).toBe('');
      expect(truncateToBytes('abc', -1)).toBe('');
    });
  });

  it('snaps offsets down to code point boundaries', () => {
    expect(snapToCodePointBoundary('a€b', 2)).toBe(1);
    expect(snapToCodePointBoundary('a€b', 4)).toBe(4);
  });

  it('steps across code points', () => {
    expect(stepCodePoints('a€b', 0, 1)).toBe(1);
    expect(stepCodePoints('a€b', 1, 1)).toBe(4);
    expect(stepCodePoints('a€b', 5, -2)).toBe(1);
    expect(stepCodePoints('a€b', 5, 3)).toBe(5);
  });

  it('flattens text to a single line', () => {
    expect(toSingleLine('a\r\nb\tc\u0000d\u007f')).toBe('a b cd');
    expect(toSingleLine('plain')).toBe('plain');
  });

  describe('display width', () => {
    it('gives wide characters two cells and combining marks none', () => {
      expect(charDisplayWidth('漢')).toBe(2);
      expect(charDisplayWidth('\u0301')).toBe(0);
      expect(charDisplayWidth('\n')).toBe(0);
      expect(charDisplayWidth('')).toBe(0);
      expect(displayWidth('a漢\u0301')).toBe(3);
    });
  });
});
