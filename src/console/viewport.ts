/**
 * Console region geometry, scroll position and caret blink phase.
 */

import type { FontStyle, ScreenRect, TextMetrics } from './types.js';
import { clamp } from './text-utils.js';

export const DEFAULT_CONSOLE_HEIGHT = 322;
export const CONSOLE_EDGE_PADDING = 4;
export const CARET_FLASH_CYCLE = 30;
export const CARET_FLASH_THRESHOLD = 15;

// Input line plus separator take two line heights; padding takes the rest.
const FIXED_CHROME = 4;

export class ViewportState {
  private rect: ScreenRect = { topLeft: { x: 0, y: 0 }, bottomRight: { x: 0, y: 0 } };
  private offset = 0;
  private blinkTicks = 0;

  constructor(
    private metrics: TextMetrics,
    private font: FontStyle,
  ) {}

  setBounds(width: number, height: number): void {
    this.rect = {
      topLeft: { x: 0, y: 0 },
      bottomRight: { x: Math.max(0, Math.floor(width)), y: Math.max(0, Math.floor(height)) },
    };
  }

  setFont(font: FontStyle): void {
    this.font = font;
  }

  visibleLineCount(): number {
    const height = this.rect.bottomRight.y - this.rect.topLeft.y;
    if (height <= 0) return 0;
    const lineHeight = this.metrics.lineHeight(this.font);
    if (lineHeight <= 0) return 0;
    const drawable = height - 2 * lineHeight - FIXED_CHROME;
    return Math.max(0, Math.floor(drawable / lineHeight));
  }

  maxScrollOffset(totalLines: number): number {
    return Math.max(0, totalLines - this.visibleLineCount());
  }

  scrollToEnd(totalLines: number): void {
    const visible = this.visibleLineCount();
    this.offset = visible === 0 ? 0 : Math.max(0, totalLines - visible);
  }

  /** Positive `delta` scrolls toward older lines. */
  scrollBy(delta: number, totalLines: number): void {
    this.offset = clamp(this.offset - delta, 0, this.maxScrollOffset(totalLines));
  }

  clampScroll(totalLines: number): void {
    this.offset = clamp(this.offset, 0, this.maxScrollOffset(totalLines));
  }

  tick(): void {
    this.blinkTicks = (this.blinkTicks + 1) % CARET_FLASH_CYCLE;
  }

  resetBlink(): void {
    this.blinkTicks = 0;
  }

  caretVisible(): boolean {
    return this.blinkTicks < CARET_FLASH_THRESHOLD;
  }

  get bounds(): ScreenRect {
    return {
      topLeft: { ...this.rect.topLeft },
      bottomRight: { ...this.rect.bottomRight },
    };
  }

  get scrollOffset(): number {
    return this.offset;
  }

  get blinkPhase(): number {
    return this.blinkTicks;
  }
}
