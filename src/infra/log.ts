/**
 * Console logging with log sanitization.
 *
 * Keeps home directory paths and raw control characters out of the host's
 * terminal output.
 */

import { homedir } from 'os';
import chalk from 'chalk';

const homeDir = homedir();

let debugEnabled = false;

export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

/**
 * Truncate a command or message string for safe logging.
 * Returns the first `maxLen` characters followed by "..." if truncated.
 */
export function truncateContent(text: string, maxLen = 50): string {
  if (text.length <= maxLen) return text;
  return text.substring(0, maxLen) + '...';
}

export function sanitizePath(text: string): string {
  if (!homeDir) return text;
  return text.replaceAll(homeDir, '~');
}

/** Render C0 control characters and DEL as \xNN escapes. */
export function escapeControlChars(text: string): string {
  return text.replace(/[\u0000-\u001f\u007f]/g, (ch) => `\\x${ch.charCodeAt(0).toString(16).padStart(2, '0')}`);
}

export function sanitizeForLog(message: string): string {
  return escapeControlChars(sanitizePath(message));
}

export function logWarn(message: string): void {
  console.warn(chalk.yellow(sanitizeForLog(message)));
}

export function logError(message: string): void {
  console.error(chalk.red(sanitizeForLog(message)));
}

export function logDebug(message: string): void {
  if (!debugEnabled) return;
  console.log(chalk.dim(sanitizeForLog(message)));
}
