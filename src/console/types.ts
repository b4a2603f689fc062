/**
 * Console overlay types shared across console modules.
 */

export type FontStyle = 'small' | 'medium';

/**
 * Foreground colour tag carried by a scrollback line.
 * `window` is the theme's default text colour and is never stored on a line.
 */
export type ConsoleColour =
  | 'window'
  | 'black'
  | 'grey'
  | 'white'
  | 'red'
  | 'green'
  | 'yellow'
  | 'blue'
  | 'light-blue';

export const DEFAULT_COLOUR: ConsoleColour = 'window';

export type ScrollbackLine = {
  readonly text: string;
  readonly colour?: ConsoleColour;
};

export type ConsoleInput =
  | 'line-clear'
  | 'line-execute'
  | 'history-previous'
  | 'history-next'
  | 'scroll-previous'
  | 'scroll-next';

export type ScreenPoint = {
  x: number;
  y: number;
};

export type ScreenRect = {
  topLeft: ScreenPoint;
  bottomRight: ScreenPoint;
};

export type FilterPalette = 'translucent';

export type InsetStyle = 'outline' | 'inset';

export type TextDrawStyle = {
  colour: string;
  font: FontStyle;
  outline: boolean;
};

export type DrawCommand =
  | { kind: 'invalidate'; rect: ScreenRect }
  | { kind: 'filter'; rect: ScreenRect; palette: FilterPalette }
  | { kind: 'inset'; rect: ScreenRect; colour: string; style: InsetStyle }
  | { kind: 'fill'; rect: ScreenRect; colour: string }
  | { kind: 'text'; at: ScreenPoint; text: string; style: TextDrawStyle };

/** Drawing surface the renderer paints onto. Owned by the host. */
export interface DrawSurface {
  filterRect(rect: ScreenRect, palette: FilterPalette): void;
  fillRect(rect: ScreenRect, colour: string): void;
  fillRectInset(rect: ScreenRect, colour: string, style: InsetStyle): void;
  drawString(at: ScreenPoint, text: string, style: TextDrawStyle): void;
  invalidate(rect: ScreenRect): void;
  invalidateScreen(): void;
}

export interface TextMetrics {
  measureWidth(text: string, font: FontStyle): number;
  lineHeight(font: FontStyle): number;
}

/** Live view of an active keystroke-capture session. */
export interface TextInputSession {
  /** Content length in UTF-8 bytes. */
  readonly size: number;
  /** Content length in code points. */
  readonly length: number;
  selectionStart: number;
}

/**
 * Text input method integration. The host writes captured keystrokes into
 * the target it was given until `stopCapture` is called.
 */
export interface TextInputHost {
  startCapture(target: TextInputTarget, capacity: number): TextInputSession;
  stopCapture(): void;
}

export interface TextInputTarget {
  readonly content: string;
  readonly caretOffset: number;
  insert(text: string): void;
  deleteBackward(): void;
  moveCaretTo(offset: number): void;
}

/** Handle given to commands so they can act on the console that ran them. */
export interface ConsoleOutput {
  writeLine(text: string, colour?: ConsoleColour): void;
  clear(): void;
  clearLine(): void;
  hide(): void;
}

export interface CommandExecutor {
  execute(line: string, output: ConsoleOutput): void;
}

export type HostFrame = {
  width: number;
  height: number;
  /** Pan offset of the main view underneath the console, when there is one. */
  viewOrigin?: ScreenPoint | null;
};

export type ConsoleTheme = {
  background: string;
  text: string;
  borderLight: string;
  borderDark: string;
  caret: string;
  /** Glyph outlines look wrong on TrueType fonts. */
  outlineText: boolean;
};

export type ConsoleSnapshot = {
  isOpen: boolean;
  bounds: ScreenRect;
  font: FontStyle;
  lines: readonly ScrollbackLine[];
  scrollOffset: number;
  visibleLines: number;
  editLine: string;
  caretX: number;
  caretVisible: boolean;
};
