/**
 * UpdateScheduler - debounced redraw scheduling
 *
 * Coalesces invalidation requests into one deferred update. While a debounce is
 * pending, further requests are no-ops; the first request after the timer fires
 * starts a new window.
 */

import type { ChartModelLogger } from '../config/types';

/**
 * `pending`: a debounce timer is armed. `updating`: an update is running.
 * A request made during an update arms a new timer, so `pending` takes precedence.
 */
export type UpdateSchedulerStatus = 'idle' | 'pending' | 'updating';

export interface UpdateSchedulerConfig {
  /** Debounce for the next window in ms, read when the window starts. */
  readonly getDelay: () => number;
  /** Runs when a debounce window elapses. */
  readonly onUpdate: () => void;
  readonly logger: ChartModelLogger;
}

export interface UpdateScheduler {
  /**
   * Arms the debounce timer unless one is already pending. Fire-and-forget: the
   * caller never observes the update's outcome.
   */
  requestInvalidate(): void;
  /**
   * Runs `work` as the current update. Returns false without running it when an
   * update is already in progress, so updates never nest.
   */
  runExclusive(work: () => void): boolean;
  getState(): UpdateSchedulerStatus;
  /** Cancels any pending window. Later requests are ignored. */
  dispose(): void;
}

const sanitizeDelay = (delay: number): number => (Number.isFinite(delay) && delay > 0 ? delay : 0);

export function createUpdateScheduler(config: UpdateSchedulerConfig): UpdateScheduler {
  const { getDelay, onUpdate, logger } = config;

  let timer: ReturnType<typeof setTimeout> | null = null;
  let updating = false;
  let disposed = false;

  const onElapsed = (): void => {
    timer = null;
    if (disposed) return;
    try {
      onUpdate();
    } catch (error) {
      // Nothing awaits a scheduled update; report instead of throwing into the host timer.
      logger.error('UpdateScheduler: scheduled update failed:', error);
    }
  };

  function requestInvalidate(): void {
    if (disposed) return;
    if (timer !== null) return;
    timer = setTimeout(onElapsed, sanitizeDelay(getDelay()));
  }

  function runExclusive(work: () => void): boolean {
    if (updating) return false;
    updating = true;
    try {
      work();
    } finally {
      updating = false;
    }
    return true;
  }

  function getState(): UpdateSchedulerStatus {
    if (timer !== null) return 'pending';
    return updating ? 'updating' : 'idle';
  }

  function dispose(): void {
    if (disposed) return;
    disposed = true;
    if (timer !== null) {
      clearTimeout(timer);
      timer = null;
    }
  }

  return {
    requestInvalidate,
    runExclusive,
    getState,
    dispose,
  };
}
