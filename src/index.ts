export { OverlayConsole, PROMPT } from './console/console.js';
export type { OverlayConsoleDeps, DirtyRegionSink } from './console/console.js';
export { LineBuffer, DEFAULT_MAX_LINES } from './console/line-buffer.js';
export { HistoryRing, DEFAULT_HISTORY_SIZE } from './console/history-ring.js';
export type { HistoryRecall } from './console/history-ring.js';
export { EditState, DEFAULT_INPUT_CAPACITY } from './console/edit-state.js';
export type { EditStateOptions, OverflowMode } from './console/edit-state.js';
export {
  ViewportState,
  DEFAULT_CONSOLE_HEIGHT,
  CARET_FLASH_CYCLE,
  CARET_FLASH_THRESHOLD,
  CONSOLE_EDGE_PADDING,
} from './console/viewport.js';
export { renderConsole, paintConsole, CARET_WIDTH } from './console/renderer.js';
export { createCommandExecutor, parseCommandLine, BUILTIN_COMMANDS } from './console/commands.js';
export type { ParsedCommandLine } from './console/commands.js';
export { KeyboardTextInput } from './console/text-input.js';
export { MonospaceTextMetrics } from './console/text-metrics.js';
export type { MonospaceFont } from './console/text-metrics.js';
export { CONSOLE_COLOURS, DEFAULT_THEME, isConsoleColour, resolveLineColour } from './console/palette.js';
export { BufferOverflowError } from './console/errors.js';
export {
  incConsoleMetric,
  getConsoleMetric,
  getConsoleMetricSnapshot,
  resetConsoleMetrics,
} from './console/diagnostics.js';
export { loadConsoleConfig, CONSOLE_NAME, CONSOLE_VERSION } from './config/index.js';
export type { ConsoleConfig } from './config/index.js';
export type * from './console/types.js';
export { DEFAULT_COLOUR } from './console/types.js';
