/**
 * Console overlay rendering.
 *
 * `renderConsole` turns a snapshot into an ordered list of draw commands and
 * never touches console state; `paintConsole` replays the commands onto a
 * host surface.
 */

import type {
  ConsoleSnapshot,
  ConsoleTheme,
  DrawCommand,
  DrawSurface,
  ScreenPoint,
  ScreenRect,
  TextMetrics,
} from './types.js';
import { resolveLineColour } from './palette.js';
import { CONSOLE_EDGE_PADDING } from './viewport.js';

export const CARET_WIDTH = 6;

// Height of the input strip above the edit line, measured from the bottom edge.
const INPUT_STRIP_MARGIN = 10;

function offset(point: ScreenPoint, dx: number, dy: number): ScreenPoint {
  return { x: point.x + dx, y: point.y + dy };
}

function horizontalLine(left: number, right: number, y: number): ScreenRect {
  return { topLeft: { x: left, y }, bottomRight: { x: right, y } };
}

export function renderConsole(
  snapshot: ConsoleSnapshot,
  theme: ConsoleTheme,
  metrics: TextMetrics,
): DrawCommand[] {
  if (!snapshot.isOpen) return [];

  const { topLeft, bottomRight } = snapshot.bounds;
  const lineHeight = metrics.lineHeight(snapshot.font);
  const region: ScreenRect = { topLeft, bottomRight };
  const textStyle = { font: snapshot.font, outline: theme.outlineText };
  const commands: DrawCommand[] = [];

  commands.push({ kind: 'invalidate', rect: region });
  commands.push({ kind: 'filter', rect: region, palette: 'translucent' });
  commands.push({
    kind: 'filter',
    rect: {
      topLeft: { x: topLeft.x, y: bottomRight.y - lineHeight - INPUT_STRIP_MARGIN },
      bottomRight: offset(bottomRight, 0, -1),
    },
    palette: 'translucent',
  });
  commands.push({ kind: 'inset', rect: region, colour: theme.background, style: 'outline' });
  commands.push({
    kind: 'inset',
    rect: { topLeft: offset(topLeft, 1, 1), bottomRight: offset(bottomRight, -1, -1) },
    colour: theme.background,
    style: 'inset',
  });

  let cursor = offset(topLeft, CONSOLE_EDGE_PADDING, CONSOLE_EDGE_PADDING);
  const end = Math.min(snapshot.lines.length, snapshot.scrollOffset + snapshot.visibleLines);
  for (let index = snapshot.scrollOffset; index < end; index += 1) {
    const line = snapshot.lines[index];
    commands.push({
      kind: 'text',
      at: cursor,
      text: line.text,
      style: { ...textStyle, colour: resolveLineColour(theme, line.colour) },
    });
    cursor = offset(cursor, 0, lineHeight);
  }

  const editAt: ScreenPoint = {
    x: topLeft.x + CONSOLE_EDGE_PADDING,
    y: bottomRight.y - lineHeight - CONSOLE_EDGE_PADDING - 1,
  };
  commands.push({
    kind: 'text',
    at: editAt,
    text: snapshot.editLine,
    style: { ...textStyle, colour: theme.text },
  });

  if (snapshot.caretVisible) {
    const caret = offset(editAt, snapshot.caretX, lineHeight);
    commands.push({
      kind: 'fill',
      rect: { topLeft: caret, bottomRight: offset(caret, CARET_WIDTH, 1) },
      colour: theme.caret,
    });
  }

  const stripTop = bottomRight.y - lineHeight - INPUT_STRIP_MARGIN;
  commands.push({ kind: 'fill', rect: horizontalLine(topLeft.x, bottomRight.x, stripTop - 1), colour: theme.borderLight });
  commands.push({ kind: 'fill', rect: horizontalLine(topLeft.x, bottomRight.x, stripTop), colour: theme.borderDark });
  commands.push({ kind: 'fill', rect: horizontalLine(topLeft.x, bottomRight.x, bottomRight.y - 1), colour: theme.borderLight });
  commands.push({ kind: 'fill', rect: horizontalLine(topLeft.x, bottomRight.x, bottomRight.y), colour: theme.borderDark });

  return commands;
}

export function paintConsole(surface: DrawSurface, commands: readonly DrawCommand[]): void {
  for (const command of commands) {
    switch (command.kind) {
      case 'invalidate': surface.invalidate(command.rect); break;
      case 'filter': surface.filterRect(command.rect, command.palette); break;
      case 'inset': surface.fillRectInset(command.rect, command.colour, command.style); break;
      case 'fill': surface.fillRect(command.rect, command.colour); break;
      case 'text': surface.drawString(command.at, command.text, command.style); break;
    }
  }
}
