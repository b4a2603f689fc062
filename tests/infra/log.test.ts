import { homedir } from 'os';
import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  escapeControlChars,
  logDebug,
  logWarn,
  sanitizeForLog,
  sanitizePath,
  setDebugLogging,
  truncateContent,
} from '../../src/infra/log.js';

describe('log', () => {
  afterEach(() => {
    setDebugLogging(false);
    vi.restoreAllMocks();
  });

  it('truncates long content', () => {
    expect(truncateContent('short')).toBe('short');
    expect(truncateContent('abcdefghij', 4)).toBe('abcd...');
  });

  it('replaces the home directory with ~', () => {
    expect(sanitizePath(`${homedir()}/saves/park.sv6`)).toBe('~/saves/park.sv6');
  });

  it('escapes control characters', () => {
    expect(escapeControlChars('a\nb\x1b[31m')).toBe('a\\x0ab\\x1b[31m');
    expect(sanitizeForLog('plain')).toBe('plain');
  });

  it('writes warnings through console.warn', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    logWarn('careful\n');
    expect(warn).toHaveBeenCalledWith(expect.stringContaining('careful\\x0a'));
  });

  it('only writes debug output when enabled', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    logDebug('hidden');
    expect(log).not.toHaveBeenCalled();

    setDebugLogging(true);
    logDebug('shown');
    expect(log).toHaveBeenCalledWith(expect.stringContaining('shown'));
  });
});
