import type { FontStyle } from '../console/types.js';
import { DEFAULT_MAX_LINES } from '../console/line-buffer.js';
import { DEFAULT_HISTORY_SIZE } from '../console/history-ring.js';
import { DEFAULT_INPUT_CAPACITY } from '../console/edit-state.js';
import { DEFAULT_CONSOLE_HEIGHT } from '../console/viewport.js';
import { clamp } from '../console/text-utils.js';

export const CONSOLE_NAME = 'overlay-console';
export const CONSOLE_VERSION = '0.1.0';

export type ConsoleConfig = {
  title: string;
  font: FontStyle;
  maxLines: number;
  historySize: number;
  inputCapacity: number;
  consoleHeight: number;
  debug: boolean;
};

type Env = Record<string, string | undefined>;

type NumericKey = 'maxLines' | 'historySize' | 'inputCapacity' | 'consoleHeight';

const LIMITS: Record<NumericKey, { env: string; fallback: number; min: number; max: number }> = {
  maxLines: { env: 'OVERLAY_CONSOLE_MAX_LINES', fallback: DEFAULT_MAX_LINES, min: 10, max: 10_000 },
  historySize: { env: 'OVERLAY_CONSOLE_HISTORY_SIZE', fallback: DEFAULT_HISTORY_SIZE, min: 1, max: 1024 },
  inputCapacity: { env: 'OVERLAY_CONSOLE_INPUT_CAPACITY', fallback: DEFAULT_INPUT_CAPACITY, min: 16, max: 4096 },
  consoleHeight: { env: 'OVERLAY_CONSOLE_HEIGHT', fallback: DEFAULT_CONSOLE_HEIGHT, min: 0, max: 4096 },
};

function getEnvInt(env: Env, name: string, defaultValue: number, min: number, max: number): number {
  const raw = env[name];
  if (!raw) return defaultValue;
  const n = Number(raw);
  if (!Number.isFinite(n)) return defaultValue;
  return clamp(n, min, max);
}

function getEnvFlag(env: Env, name: string): boolean {
  const lowered = (env[name] || '').trim().toLowerCase();
  return lowered === '1' || lowered === 'true' || lowered === 'on' || lowered === 'yes';
}

function resolveInt(env: Env, key: NumericKey, override: number | undefined): number {
  const { env: name, fallback, min, max } = LIMITS[key];
  const base = getEnvInt(env, name, fallback, min, max);
  if (override === undefined || !Number.isFinite(override)) return base;
  return clamp(override, min, max);
}

/**
 * Env values first, explicit overrides on top. Numeric overrides are held to
 * the same ranges as their env variables; `undefined` keeps the env value.
 */
export function loadConsoleConfig(env: Env = process.env, overrides: Partial<ConsoleConfig> = {}): ConsoleConfig {
  return {
    title: overrides.title ?? `${CONSOLE_NAME} ${CONSOLE_VERSION}`,
    font: overrides.font ?? (getEnvFlag(env, 'OVERLAY_CONSOLE_SMALL_FONT') ? 'small' : 'medium'),
    maxLines: resolveInt(env, 'maxLines', overrides.maxLines),
    historySize: resolveInt(env, 'historySize', overrides.historySize),
    inputCapacity: resolveInt(env, 'inputCapacity', overrides.inputCapacity),
    consoleHeight: resolveInt(env, 'consoleHeight', overrides.consoleHeight),
    debug: overrides.debug ?? getEnvFlag(env, 'OVERLAY_CONSOLE_DEBUG'),
  };
}
