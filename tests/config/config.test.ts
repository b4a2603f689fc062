import { describe, expect, it } from 'vitest';
import { loadConsoleConfig } from '../../src/config/index.js';

describe('loadConsoleConfig', () => {
  it('uses defaults with an empty environment', () => {
    expect(loadConsoleConfig({})).toEqual({
      title: 'overlay-console 0.1.0',
      font: 'medium',
      maxLines: 300,
      historySize: 64,
      inputCapacity: 256,
      consoleHeight: 322,
      debug: false,
    });
  });

  it('reads values from the environment', () => {
    const config = loadConsoleConfig({
      OVERLAY_CONSOLE_SMALL_FONT: 'on',
      OVERLAY_CONSOLE_MAX_LINES: '500',
      OVERLAY_CONSOLE_HISTORY_SIZE: '8',
      OVERLAY_CONSOLE_INPUT_CAPACITY: '128',
      OVERLAY_CONSOLE_HEIGHT: '200',
      OVERLAY_CONSOLE_DEBUG: 'true',
    });

    expect(config.font).toBe('small');
    expect(config.maxLines).toBe(500);
    expect(config.historySize).toBe(8);
    expect(config.inputCapacity).toBe(128);
    expect(config.consoleHeight).toBe(200);
    expect(config.debug).toBe(true);
  });

  it('clamps out-of-range values and ignores garbage', () => {
    const config = loadConsoleConfig({
      OVERLAY_CONSOLE_MAX_LINES: '5',
      OVERLAY_CONSOLE_HISTORY_SIZE: 'lots',
      OVERLAY_CONSOLE_INPUT_CAPACITY: '99999',
      OVERLAY_CONSOLE_SMALL_FONT: 'nope',
    });

    expect(config.maxLines).toBe(10);
    expect(config.historySize).toBe(64);
    expect(config.inputCapacity).toBe(4096);
    expect(config.font).toBe('medium');
  });

  it('lets explicit overrides win', () => {
    const config = loadConsoleConfig({ OVERLAY_CONSOLE_MAX_LINES: '500' }, { maxLines: 20, title: 'test' });
    expect(config.maxLines).toBe(20);
    expect(config.title).toBe('test');
  });

  it('clamps numeric overrides to the env ranges', () => {
    const config = loadConsoleConfig({}, { maxLines: 0, historySize: 5000, inputCapacity: 8, consoleHeight: -1 });
    expect(config.maxLines).toBe(10);
    expect(config.historySize).toBe(1024);
    expect(config.inputCapacity).toBe(16);
    expect(config.consoleHeight).toBe(0);
  });

  it('keeps env values for undefined overrides', () => {
    const config = loadConsoleConfig(
      { OVERLAY_CONSOLE_HISTORY_SIZE: '8', OVERLAY_CONSOLE_DEBUG: '1' },
      { historySize: undefined, debug: undefined, title: undefined },
    );
    expect(config.historySize).toBe(8);
    expect(config.debug).toBe(true);
    expect(config.title).toBe('overlay-console 0.1.0');
  });
});
