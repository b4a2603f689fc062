/**
 * Scrollback storage for the console overlay.
 *
 * Lines are kept oldest-first. Once the cap is exceeded the oldest lines are
 * dropped from the front; callers re-clamp their scroll offset afterwards.
 */

import type { ConsoleColour, ScrollbackLine } from './types.js';
import { DEFAULT_COLOUR } from './types.js';
import { incConsoleMetric } from './diagnostics.js';

export const DEFAULT_MAX_LINES = 300;

export class LineBuffer {
  private lines: ScrollbackLine[] = [];

  constructor(readonly maxLines: number = DEFAULT_MAX_LINES) {
    if (!Number.isInteger(maxLines) || maxLines <= 0) {
      throw new RangeError(`LineBuffer maxLines must be a positive integer, got ${maxLines}`);
    }
  }

  /**
   * Append one line per `\n`-separated segment of `text`.
   * Returns how many old lines were evicted to stay within the cap.
   */
  write(text: string, colour: ConsoleColour = DEFAULT_COLOUR): number {
    for (const segment of text.split('\n')) {
      this.lines.push(colour === DEFAULT_COLOUR ? { text: segment } : { text: segment, colour });
    }

    if (this.lines.length <= this.maxLines) return 0;
    const evicted = this.lines.length - this.maxLines;
    this.lines.splice(0, evicted);
    incConsoleMetric('scrollback_evicted', undefined, evicted);
    return evicted;
  }

  /** Extend the newest line, e.g. to echo a submitted command after its prompt. */
  appendToLast(text: string): void {
    const last = this.lines[this.lines.length - 1];
    if (!last) return;
    this.lines[this.lines.length - 1] = { ...last, text: last.text + text };
  }

  clear(): void {
    this.lines = [];
  }

  at(index: number): ScrollbackLine | undefined {
    if (index < 0) return undefined;
    return this.lines[index];
  }

  slice(start: number, end?: number): ScrollbackLine[] {
    return this.lines.slice(Math.max(0, start), end);
  }

  toArray(): readonly ScrollbackLine[] {
    return this.lines.slice();
  }

  get length(): number {
    return this.lines.length;
  }
}
