/**
 * The line under construction: bounded content, caret byte offset and the
 * caret's pixel X derived from text metrics.
 */

import type { FontStyle, TextInputTarget, TextMetrics } from './types.js';
import { BufferOverflowError } from './errors.js';
import { incConsoleMetric } from './diagnostics.js';
import {
  clamp,
  codePointLength,
  snapToCodePointBoundary,
  stepCodePoints,
  toSingleLine,
  truncateToBytes,
  utf8ByteLength,
} from './text-utils.js';

export const DEFAULT_INPUT_CAPACITY = 256;

export type OverflowMode = 'truncate' | 'reject';

export type EditStateOptions = {
  metrics: TextMetrics;
  font: FontStyle;
  capacity?: number;
  /** Called after every caret move; the console uses it to restart the blink cycle. */
  onCaretMove?: () => void;
};

export class EditState implements TextInputTarget {
  readonly capacity: number;
  private text = '';
  private offset = 0;
  private pixelX = 0;
  private metrics: TextMetrics;
  private font: FontStyle;
  private onCaretMove?: () => void;

  constructor(options: EditStateOptions) {
    this.capacity = clamp(options.capacity ?? DEFAULT_INPUT_CAPACITY, 1, Number.MAX_SAFE_INTEGER);
    this.metrics = options.metrics;
    this.font = options.font;
    this.onCaretMove = options.onCaretMove;
  }

  setContent(raw: string, mode: OverflowMode = 'truncate'): void {
    const text = toSingleLine(raw);
    const size = utf8ByteLength(text);
    if (size > this.capacity) {
      if (mode === 'reject') {
        throw new BufferOverflowError(size, this.capacity);
      }
      incConsoleMetric('edit_truncated');
      this.text = truncateToBytes(text, this.capacity);
    } else {
      this.text = text;
    }
    this.moveCaretTo(this.offset);
  }

  clear(): void {
    this.text = '';
    this.offset = 0;
    this.pixelX = 0;
  }

  moveCaretTo(offset: number): void {
    const bounded = clamp(offset, 0, this.byteLength);
    this.offset = snapToCodePointBoundary(this.text, bounded);
    this.pixelX = this.metrics.measureWidth(truncateToBytes(this.text, this.offset), this.font);
    this.onCaretMove?.();
  }

  moveCaretToEnd(): void {
    this.moveCaretTo(this.byteLength);
  }

  /** Move the caret by whole code points; negative moves left. */
  moveCaretBy(delta: number): void {
    this.moveCaretTo(stepCodePoints(this.text, this.offset, delta));
  }

  /** Insert at the caret, dropping whatever does not fit in the remaining capacity. */
  insert(raw: string): void {
    const text = toSingleLine(raw);
    const room = this.capacity - this.byteLength;
    const accepted = truncateToBytes(text, room);
    if (accepted.length < text.length) incConsoleMetric('edit_truncated');
    if (accepted.length === 0) return;

    const head = truncateToBytes(this.text, this.offset);
    this.text = head + accepted + this.text.slice(head.length);
    this.moveCaretTo(this.offset + utf8ByteLength(accepted));
  }

  /** Delete the code point before the caret. */
  deleteBackward(): void {
    if (this.offset === 0) return;
    const head = truncateToBytes(this.text, this.offset);
    const previous = stepCodePoints(this.text, this.offset, -1);
    const keep = truncateToBytes(this.text, previous);
    this.text = keep + this.text.slice(head.length);
    this.moveCaretTo(previous);
  }

  setFont(font: FontStyle): void {
    this.font = font;
    this.moveCaretTo(this.offset);
  }

  get content(): string {
    return this.text;
  }

  get caretOffset(): number {
    return this.offset;
  }

  get caretX(): number {
    return this.pixelX;
  }

  get byteLength(): number {
    return utf8ByteLength(this.text);
  }

  get codePointLength(): number {
    return codePointLength(this.text);
  }

  get isEmpty(): boolean {
    return this.text.length === 0;
  }
}
