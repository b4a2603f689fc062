/**
 * In-game console overlay.
 *
 * Owns scrollback, history, the edit line and viewport state, and turns
 * input events into transitions between them. The host drives it with one
 * `update` per frame tick and any number of `draw` calls.
 */

import type {
  CommandExecutor,
  ConsoleColour,
  ConsoleInput,
  ConsoleOutput,
  ConsoleSnapshot,
  ConsoleTheme,
  DrawSurface,
  FontStyle,
  HostFrame,
  ScreenPoint,
  TextInputHost,
  TextInputSession,
  TextMetrics,
} from './types.js';
import { DEFAULT_COLOUR } from './types.js';
import { LineBuffer } from './line-buffer.js';
import { HistoryRing } from './history-ring.js';
import { EditState } from './edit-state.js';
import { ViewportState } from './viewport.js';
import { renderConsole, paintConsole } from './renderer.js';
import { DEFAULT_THEME } from './palette.js';
import { incConsoleMetric } from './diagnostics.js';
import { createCommandExecutor, parseCommandLine } from './commands.js';
import { loadConsoleConfig, type ConsoleConfig } from '../config/index.js';
import { logDebug, logError, setDebugLogging, truncateContent } from '../infra/log.js';

export const PROMPT = '> ';

export type DirtyRegionSink = Pick<DrawSurface, 'invalidate' | 'invalidateScreen'>;

export type OverlayConsoleDeps = {
  metrics: TextMetrics;
  textInput: TextInputHost;
  display: DirtyRegionSink;
  /** Defaults to the built-in commands. Pass `createCommandExecutor(host)` to keep them alongside host commands. */
  executor?: CommandExecutor;
  theme?: ConsoleTheme;
  config?: ConsoleConfig;
};

export class OverlayConsole implements ConsoleOutput {
  private readonly config: ConsoleConfig;
  private readonly metrics: TextMetrics;
  private readonly textInput: TextInputHost;
  private readonly display: DirtyRegionSink;
  private readonly theme: ConsoleTheme;
  private readonly executor: CommandExecutor;

  private readonly lines: LineBuffer;
  private readonly historyRing: HistoryRing;
  private readonly editState: EditState;
  private readonly viewportState: ViewportState;

  private opened = false;
  private font: FontStyle;
  private session: TextInputSession | null = null;
  private lastViewOrigin: ScreenPoint | null = null;

  constructor(deps: OverlayConsoleDeps) {
    this.config = deps.config ?? loadConsoleConfig();
    this.metrics = deps.metrics;
    this.textInput = deps.textInput;
    this.display = deps.display;
    this.theme = deps.theme ?? DEFAULT_THEME;
    this.executor = deps.executor ?? createCommandExecutor();
    this.font = this.config.font;
    setDebugLogging(this.config.debug);

    this.lines = new LineBuffer(this.config.maxLines);
    this.historyRing = new HistoryRing(this.config.historySize);
    this.viewportState = new ViewportState(this.metrics, this.font);
    this.editState = new EditState({
      metrics: this.metrics,
      font: this.font,
      capacity: this.config.inputCapacity,
      onCaretMove: () => this.viewportState.resetBlink(),
    });

    this.writeLine(this.config.title);
    this.writeLine("Type 'help' for a list of available commands. Type 'hide' to hide the console.");
    this.writeLine('');
    this.writePrompt();
  }

  // --- output ---

  write(text: string, colour: ConsoleColour = DEFAULT_COLOUR): void {
    const evicted = this.lines.write(text, colour);
    if (evicted > 0) this.viewportState.clampScroll(this.lines.length);
  }

  writeLine(text: string, colour: ConsoleColour = DEFAULT_COLOUR): void {
    this.write(text, colour);
  }

  writePrompt(): void {
    this.writeLine(PROMPT);
  }

  clear(): void {
    this.lines.clear();
    this.scrollToEnd();
  }

  clearLine(): void {
    this.editState.clear();
    this.refreshCaret();
  }

  // --- lifecycle ---

  get isOpen(): boolean {
    return this.opened;
  }

  open(): void {
    if (this.opened) return;
    this.opened = true;
    logDebug('Console opened');
    this.scrollToEnd();
    this.refreshCaret();
    this.startCapture();
  }

  close(): void {
    if (!this.opened) return;
    this.opened = false;
    logDebug('Console closed');
    this.invalidate();
    this.stopCapture();
  }

  hide(): void {
    this.close();
  }

  toggle(): void {
    if (this.opened) {
      this.close();
    } else {
      this.open();
    }
  }

  // --- input ---

  input(event: ConsoleInput): void {
    if (!this.opened) return;

    switch (event) {
      case 'line-clear':
        this.clearInput();
        this.refreshCaret();
        break;
      case 'line-execute':
        this.executeCurrentLine();
        this.scrollToEnd();
        break;
      case 'history-previous': {
        const recall = this.historyRing.recallPrevious();
        if (recall.type === 'entry') this.loadRecalled(recall.command);
        break;
      }
      case 'history-next': {
        const recall = this.historyRing.recallNext();
        if (recall.type === 'entry') {
          this.loadRecalled(recall.command);
        } else if (recall.type === 'fresh-line') {
          this.clearInput();
          this.refreshCaret();
        }
        break;
      }
      case 'scroll-previous':
        this.viewportState.scrollBy(this.viewportState.visibleLineCount() - 1, this.lines.length);
        break;
      case 'scroll-next':
        this.viewportState.scrollBy(-(this.viewportState.visibleLineCount() - 1), this.lines.length);
        break;
      default:
        logDebug(`Ignoring console input: ${String(event)}`);
        break;
    }
  }

  // --- frame cycle ---

  update(frame: HostFrame): void {
    this.viewportState.setBounds(frame.width, Math.min(this.config.consoleHeight, Math.max(0, frame.height)));
    this.viewportState.clampScroll(this.lines.length);

    // Panning the view underneath copies console pixels along with it.
    if (this.opened && frame.viewOrigin) {
      const origin = frame.viewOrigin;
      const last = this.lastViewOrigin;
      if (!last || last.x !== origin.x || last.y !== origin.y) {
        this.lastViewOrigin = { x: origin.x, y: origin.y };
        this.display.invalidateScreen();
        incConsoleMetric('screen_invalidated');
      }
    }

    this.tick();
  }

  /** Advance the caret blink phase. Call exactly once per logical frame. */
  tick(): void {
    this.viewportState.tick();
  }

  draw(surface: DrawSurface): void {
    if (!this.opened) return;
    paintConsole(surface, renderConsole(this.snapshot(), this.theme, this.metrics));
  }

  snapshot(): ConsoleSnapshot {
    return {
      isOpen: this.opened,
      bounds: this.viewportState.bounds,
      font: this.font,
      lines: this.lines.toArray(),
      scrollOffset: this.viewportState.scrollOffset,
      visibleLines: this.viewportState.visibleLineCount(),
      editLine: this.editState.content,
      caretX: this.editState.caretX,
      caretVisible: this.viewportState.caretVisible(),
    };
  }

  setFont(font: FontStyle): void {
    this.font = font;
    this.viewportState.setFont(font);
    this.editState.setFont(font);
    this.viewportState.clampScroll(this.lines.length);
  }

  // --- state access ---

  get scrollback(): LineBuffer {
    return this.lines;
  }

  get history(): HistoryRing {
    return this.historyRing;
  }

  get edit(): EditState {
    return this.editState;
  }

  get viewport(): ViewportState {
    return this.viewportState;
  }

  get captureSession(): TextInputSession | null {
    return this.session;
  }

  // --- internals ---

  private executeCurrentLine(): void {
    const line = this.editState.content;
    if (line.length === 0) return;

    this.historyRing.add(line);
    this.lines.appendToLast(line);
    this.runExecutor(line);
    this.writePrompt();
    this.clearInput();
    this.refreshCaret();
  }

  private runExecutor(line: string): void {
    incConsoleMetric('command_executed');
    logDebug(`Executing console command: ${truncateContent(line)}`);
    try {
      this.executor.execute(line, this);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      incConsoleMetric('command_failed', { command: parseCommandLine(line).name });
      logError(`Console command failed: ${truncateContent(line)}: ${message}`);
      this.writeLine(`Error: ${message}`, 'red');
    }
  }

  private loadRecalled(command: string): void {
    this.editState.setContent(command);
    this.editState.moveCaretToEnd();
    this.syncSession();
  }

  private clearInput(): void {
    this.editState.clear();
    if (this.opened) this.startCapture();
  }

  private refreshCaret(): void {
    this.editState.moveCaretTo(0);
    this.syncSession();
  }

  private scrollToEnd(): void {
    this.viewportState.scrollToEnd(this.lines.length);
  }

  private startCapture(): void {
    if (this.session) this.stopCapture();
    this.session = this.textInput.startCapture(this.editState, this.editState.capacity);
    incConsoleMetric('capture_started');
  }

  private stopCapture(): void {
    this.session = null;
    this.textInput.stopCapture();
    incConsoleMetric('capture_stopped');
  }

  private syncSession(): void {
    if (this.session) this.session.selectionStart = this.editState.caretOffset;
  }

  private invalidate(): void {
    this.display.invalidate(this.viewportState.bounds);
  }
}
