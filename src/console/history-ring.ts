/**
 * Bounded command history with directional recall.
 *
 * The recall cursor ranges over [0, length]; `length` is the fresh-line
 * position, one step past the newest entry.
 */

import { incConsoleMetric } from './diagnostics.js';

export const DEFAULT_HISTORY_SIZE = 64;

export type HistoryRecall =
  | { type: 'entry'; command: string }
  | { type: 'fresh-line' }
  | { type: 'unchanged' };

export class HistoryRing {
  private slots: string[];
  private head = 0;
  private count = 0;
  private index = 0;

  constructor(readonly capacity: number = DEFAULT_HISTORY_SIZE) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`HistoryRing capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<string>(capacity).fill('');
  }

  add(command: string): void {
    if (this.count === this.capacity) {
      this.slots[this.head] = command;
      this.head = (this.head + 1) % this.capacity;
      incConsoleMetric('history_evicted');
    } else {
      this.slots[(this.head + this.count) % this.capacity] = command;
      this.count += 1;
    }
    this.index = this.count;
  }

  recallPrevious(): HistoryRecall {
    if (this.index <= 0) return { type: 'unchanged' };
    this.index -= 1;
    return { type: 'entry', command: this.entryAt(this.index) };
  }

  recallNext(): HistoryRecall {
    if (this.index < this.count - 1) {
      this.index += 1;
      return { type: 'entry', command: this.entryAt(this.index) };
    }
    this.index = this.count;
    return { type: 'fresh-line' };
  }

  /** Move the recall cursor back to the fresh line. */
  rewind(): void {
    this.index = this.count;
  }

  entries(): string[] {
    const result: string[] = [];
    for (let i = 0; i < this.count; i += 1) {
      result.push(this.entryAt(i));
    }
    return result;
  }

  get cursor(): number {
    return this.index;
  }

  get length(): number {
    return this.count;
  }

  private entryAt(logical: number): string {
    return this.slots[(this.head + logical) % this.capacity];
  }
}
