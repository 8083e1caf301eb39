import type { ChartModelOptions } from './types';

export const defaultPalette = [
  '#5470C6',
  '#91CC75',
  '#FAC858',
  '#EE6666',
  '#73C0DE',
  '#3BA272',
  '#FC8452',
  '#9A60B4',
  '#EA7CCC',
] as const;

/**
 * Debounce (ms) applied to invalidations while the view has animations disabled.
 */
export const DISABLED_ANIMATIONS_DELAY_MS = 10;

export const defaultOptions = {
  colors: defaultPalette,
  disabledAnimationsDelayMs: DISABLED_ANIMATIONS_DELAY_MS,
} as const satisfies Omit<ChartModelOptions, 'logger'>;
