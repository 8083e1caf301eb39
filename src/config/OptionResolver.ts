import type { ChartModelLogger, ChartModelOptions } from './types';
import { defaultOptions, defaultPalette } from './defaults';

export interface ResolvedChartModelOptions {
  readonly colors: ReadonlyArray<string>;
  readonly disabledAnimationsDelayMs: number;
  readonly logger: ChartModelLogger;
}

export const sanitizePalette = (palette: unknown): string[] => {
  if (!Array.isArray(palette)) return [];
  return palette
    .filter((c): c is string => typeof c === 'string')
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
};

const isLogger = (value: unknown): value is ChartModelLogger => {
  if (value === null || typeof value !== 'object') return false;
  return (
    'warn' in value &&
    typeof value.warn === 'function' &&
    'error' in value &&
    typeof value.error === 'function'
  );
};

const resolveDelay = (delay: unknown): number => {
  if (typeof delay !== 'number' || !Number.isFinite(delay) || delay < 0) {
    return defaultOptions.disabledAnimationsDelayMs;
  }
  return delay;
};

export function resolveModelOptions(userOptions: ChartModelOptions = {}): ResolvedChartModelOptions {
  const colors = sanitizePalette(userOptions.colors);

  return {
    colors: colors.length > 0 ? colors : Array.from(defaultPalette),
    disabledAnimationsDelayMs: resolveDelay(userOptions.disabledAnimationsDelayMs),
    // JS callers may hand in partial loggers; fall back rather than fail at report time.
    logger: isLogger(userOptions.logger) ? userOptions.logger : console,
  };
}
