import type { FontStyle, TextMetrics } from './types.js';
import { displayWidth } from './text-utils.js';

export type MonospaceFont = {
  cellWidth: number;
  lineHeight: number;
};

const DEFAULT_FONTS: Record<FontStyle, MonospaceFont> = {
  small: { cellWidth: 5, lineHeight: 8 },
  medium: { cellWidth: 7, lineHeight: 10 },
};

/**
 * Fixed-pitch metrics. Wide (CJK, emoji) characters take two cells and
 * combining marks take none.
 */
export class MonospaceTextMetrics implements TextMetrics {
  private fonts: Record<FontStyle, MonospaceFont>;

  constructor(fonts?: Partial<Record<FontStyle, MonospaceFont>>) {
    this.fonts = { ...DEFAULT_FONTS, ...fonts };
  }

  measureWidth(text: string, font: FontStyle): number {
    return displayWidth(text) * this.fonts[font].cellWidth;
  }

  lineHeight(font: FontStyle): number {
    return this.fonts[font].lineHeight;
  }
}
