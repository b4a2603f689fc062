/**
 * Pure text helpers for the console edit line and text metrics.
 *
 * Offsets into the edit line are UTF-8 byte offsets, so every helper here
 * works in bytes while never splitting a code point.
 */

export function clamp(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) return min;
  return Math.max(min, Math.min(max, Math.floor(value)));
}

export function codePointByteSize(cp: number): number {
  if (cp < 0x80) return 1;
  if (cp < 0x800) return 2;
  if (cp < 0x10000) return 3;
  return 4;
}

export function utf8ByteLength(text: string): number {
  let size = 0;
  for (const ch of text) {
    size += codePointByteSize(ch.codePointAt(0) ?? 0);
  }
  return size;
}

export function codePointLength(text: string): number {
  let count = 0;
  for (const _ of text) count += 1;
  return count;
}

/**
 * Longest prefix of `text` that fits in `maxBytes` UTF-8 bytes without
 * cutting a code point in half.
 */
export function truncateToBytes(text: string, maxBytes: number): string {
  if (maxBytes <= 0) return '';
  let size = 0;
  let end = 0;
  for (const ch of text) {
    const next = size + codePointByteSize(ch.codePointAt(0) ?? 0);
    if (next > maxBytes) break;
    size = next;
    end += ch.length;
  }
  return text.slice(0, end);
}

/** Largest code-point boundary in `text` that is ≤ `byteOffset`. */
export function snapToCodePointBoundary(text: string, byteOffset: number): number {
  return utf8ByteLength(truncateToBytes(text, byteOffset));
}

/** Byte offset of the code point boundary `delta` code points away from `byteOffset`. */
export function stepCodePoints(text: string, byteOffset: number, delta: number): number {
  const boundaries = [0];
  let size = 0;
  for (const ch of text) {
    size += codePointByteSize(ch.codePointAt(0) ?? 0);
    boundaries.push(size);
  }
  let index = 0;
  while (index + 1 < boundaries.length && boundaries[index + 1] <= byteOffset) index += 1;
  const target = Math.max(0, Math.min(boundaries.length - 1, index + delta));
  return boundaries[target];
}

export function charDisplayWidth(ch: string): number {
  if (!ch) return 0;
  const cp = ch.codePointAt(0);
  if (cp === undefined || cp === 0) return 0;

  if (cp < 32 || (cp >= 0x7f && cp < 0xa0)) return 0;

  // Combining marks and format controls take no advance.
  if (
    (cp >= 0x0300 && cp <= 0x036f) ||
    (cp >= 0x1ab0 && cp <= 0x1aff) ||
    (cp >= 0x1dc0 && cp <= 0x1dff) ||
    (cp >= 0x20d0 && cp <= 0x20ff) ||
    (cp >= 0xfe20 && cp <= 0xfe2f) ||
    cp === 0x200d || // zero-width joiner
    (cp >= 0xfe00 && cp <= 0xfe0f) // variation selectors
  ) {
    return 0;
  }

  if (
    (cp >= 0x1100 && cp <= 0x115f) ||
    (cp >= 0x2329 && cp <= 0x232a) ||
    (cp >= 0x2e80 && cp <= 0xa4cf) ||
    (cp >= 0xac00 && cp <= 0xd7a3) ||
    (cp >= 0xf900 && cp <= 0xfaff) ||
    (cp >= 0xfe10 && cp <= 0xfe19) ||
    (cp >= 0xfe30 && cp <= 0xfe6f) ||
    (cp >= 0xff00 && cp <= 0xff60) ||
    (cp >= 0xffe0 && cp <= 0xffe6) ||
    (cp >= 0x1f300 && cp <= 0x1faff) ||
    (cp >= 0x20000 && cp <= 0x3fffd)
  ) {
    return 2;
  }

  return 1;
}

/** Column width of a whole string, in monospace cells. */
export function displayWidth(text: string): number {
  let width = 0;
  for (const ch of text) width += charDisplayWidth(ch);
  return width;
}

/** Flatten to one line: line breaks and tabs become spaces, other C0 controls and DEL are dropped. */
export function toSingleLine(text: string): string {
  return text.replace(/\r\n|[\r\n\t]/g, ' ').replace(/[\u0000-\u001f\u007f]/g, '');
}
