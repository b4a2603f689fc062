import { beforeEach, describe, expect, it } from 'vitest';
import {
  getConsoleMetric,
  getConsoleMetricSnapshot,
  incConsoleMetric,
  resetConsoleMetrics,
} from '../../src/console/diagnostics.js';

describe('console diagnostics', () => {
  beforeEach(() => {
    resetConsoleMetrics();
  });

  it('keys counters by name and sorted tags', () => {
    incConsoleMetric('command_failed', { b: 2, a: 'x' });
    incConsoleMetric('command_failed', { a: 'x', b: 2 });
    incConsoleMetric('scrollback_evicted', undefined, 3);

    expect(getConsoleMetricSnapshot()).toEqual({
      'command_failed|a=x,b=2': 2,
      scrollback_evicted: 3,
    });
  });

  it('ignores non-positive amounts and undefined tags', () => {
    incConsoleMetric('edit_truncated', undefined, 0);
    incConsoleMetric('edit_truncated', undefined, -2);
    incConsoleMetric('command_failed', { command: undefined });

    expect(getConsoleMetric('edit_truncated')).toBe(0);
    expect(getConsoleMetric('command_failed')).toBe(1);
  });

  it('clears every counter on reset', () => {
    incConsoleMetric('capture_started');
    resetConsoleMetrics();
    expect(getConsoleMetricSnapshot()).toEqual({});
  });
});
