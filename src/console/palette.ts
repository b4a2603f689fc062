import type { ConsoleColour, ConsoleTheme } from './types.js';

export const CONSOLE_COLOURS: Record<ConsoleColour, string> = {
  window: '#d7d7d7',
  black: '#000000',
  grey: '#8f8f8f',
  white: '#ffffff',
  red: '#f14c4c',
  green: '#23d18b',
  yellow: '#f5f543',
  blue: '#2472c8',
  'light-blue': '#3b8eea',
};

export const DEFAULT_THEME: ConsoleTheme = {
  background: '#2b3a4f',
  text: CONSOLE_COLOURS.window,
  borderLight: '#5d7290',
  borderDark: '#141c26',
  caret: '#ffffff',
  outlineText: true,
};

export function isConsoleColour(value: unknown): value is ConsoleColour {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(CONSOLE_COLOURS, value);
}

/**
 * Resolve the colour a scrollback line is drawn in. Untagged lines use the
 * theme text colour.
 */
export function resolveLineColour(theme: ConsoleTheme, colour: ConsoleColour | undefined): string {
  if (!colour || colour === 'window') return theme.text;
  return CONSOLE_COLOURS[colour];
}
