import type {
  ChartModelOptions,
  ChartView,
  Disposable,
  Plane,
  PropertyInstanceChangedPayload,
  Size,
} from './config/types';
import { resolveModelOptions, sanitizePalette } from './config/OptionResolver';
import { defaultPalette } from './config/defaults';
import { computeRangeMatrix } from './data/computeRangeMatrix';
import type { DataRangeMatrix } from './data/computeRangeMatrix';
import { createPropertyChangeTracker } from './core/PropertyChangeTracker';
import { createGenerationToken, createResourceLedger } from './core/ResourceLedger';
import type { GenerationToken, ResourceHandle } from './core/ResourceLedger';
import { createUpdateScheduler } from './core/UpdateScheduler';
import type { UpdateSchedulerStatus } from './core/UpdateScheduler';
import { getNextPaletteColor } from './core/paletteRotation';
import { scaleToPixel } from './utils/scaleToPixel';

export type ChartModelUpdatePayload = Readonly<{
  readonly generation: GenerationToken;
  readonly restart: boolean;
  /** Number of visible series fetched during the cycle. */
  readonly seriesCount: number;
}>;

export type ChartModelCollectPayload = Readonly<{
  readonly generation: GenerationToken;
  readonly released: number;
}>;

export interface ChartModelEventMap {
  update: ChartModelUpdatePayload;
  collect: ChartModelCollectPayload;
  dispose: void;
}

export type ChartModelEventName = keyof ChartModelEventMap;

export type ChartModelEventCallback<K extends ChartModelEventName> = (payload: ChartModelEventMap[K]) => void;

export interface ChartModel {
  /** The view this model serves. Not owned: `dispose()` leaves it untouched. */
  readonly view: ChartView;
  readonly isViewInitialized: boolean;
  readonly disposed: boolean;
  /** Token of the current update cycle. */
  readonly updateId: GenerationToken;
  /** Ranges computed by the last completed update, `[dimension][axisIndex]`. */
  readonly dataRangeMatrix: DataRangeMatrix;
  drawAreaSize: Size;
  colors: ReadonlyArray<string>;
  /**
   * Queues a debounced update. Requests made while one is pending are coalesced.
   */
  invalidate(): void;
  /**
   * Runs an update cycle now.
   *
   * @param restart - When true, every tracked resource is disposed first
   * @throws {ResourceDisposalError} If a restart dispose fails
   */
  update(restart: boolean): void;
  /**
   * Scales a value to a pixel coordinate on `plane`, against `size` or the
   * current draw area when omitted.
   */
  scaleTo(value: number, plane: Plane, size?: Size): number;
  /** Next color of the process-wide palette rotation. */
  getNextColor(): string;
  registerResource(resource: Disposable): ResourceHandle;
  /**
   * Disposes resources not registered during the current cycle. Call once all
   * registrations for the cycle are done.
   *
   * @returns Number of resources released
   * @throws {ResourceDisposalError} If any dispose fails; the rest are still released
   */
  collectResources(): number;
  getSchedulerState(): UpdateSchedulerStatus;
  on<K extends ChartModelEventName>(eventName: K, callback: ChartModelEventCallback<K>): void;
  off<K extends ChartModelEventName>(eventName: K, callback: ChartModelEventCallback<K>): void;
  /**
   * Emits `dispose`, then unsubscribes from the view and every bound collection, cancels pending
   * updates and releases all tracked resources. Idempotent.
   *
   * @throws {ResourceDisposalError} If releasing resources fails
   */
  dispose(): void;
}

type ListenerRegistry = { readonly [K in ChartModelEventName]: Set<ChartModelEventCallback<K>> };

/**
 * Creates the update coordinator for a chart view.
 *
 * Nothing is computed until the view signals `initialized`; from then on bound
 * collection mutations, frequency changes and resizes all funnel into the
 * debounced `invalidate()`.
 */
export function createChartModel(view: ChartView, options: ChartModelOptions = {}): ChartModel {
  const resolvedOptions = resolveModelOptions(options);
  const { logger } = resolvedOptions;

  let disposed = false;
  let isViewInitialized = false;
  let updateId: GenerationToken = createGenerationToken();
  let drawAreaSize: Size = view.drawAreaSize;
  let dataRangeMatrix: DataRangeMatrix = [];
  let colors: ReadonlyArray<string> = resolvedOptions.colors;
  // A restart requested while it could not run is carried into the next cycle.
  let pendingRestart = false;

  const listeners: ListenerRegistry = {
    update: new Set<ChartModelEventCallback<'update'>>(),
    collect: new Set<ChartModelEventCallback<'collect'>>(),
    dispose: new Set<ChartModelEventCallback<'dispose'>>(),
  };

  const emit = <K extends ChartModelEventName>(eventName: K, payload: ChartModelEventMap[K]): void => {
    const set: Set<ChartModelEventCallback<K>> = listeners[eventName];
    for (const callback of Array.from(set)) {
      try {
        callback(payload);
      } catch (error) {
        logger.error(`ChartModel: Error in ${eventName} event handler:`, error);
      }
    }
  };

  const getGeneration = (): GenerationToken => updateId;

  const ledger = createResourceLedger({ getGeneration });

  const assertNotDisposed = (): void => {
    if (disposed) {
      throw new Error('ChartModel is disposed.');
    }
  };

  const getDelay = (): number =>
    view.disableAnimations ? resolvedOptions.disabledAnimationsDelayMs : view.animationsSpeed;

  function invalidate(): void {
    if (disposed) return;
    scheduler.requestInvalidate();
  }

  const scheduler = createUpdateScheduler({
    getDelay,
    onUpdate: () => update(false),
    logger,
  });

  const tracker = createPropertyChangeTracker({
    onChange: () => invalidate(),
  });

  const runUpdate = (restart: boolean): void => {
    // Mint first so anything registered below belongs to this cycle.
    updateId = createGenerationToken();

    if (!isViewInitialized) {
      if (restart) pendingRestart = true;
      invalidate();
      return;
    }

    if (restart) {
      pendingRestart = false;
      ledger.clear();
    }

    drawAreaSize = view.drawAreaSize;
    dataRangeMatrix = computeRangeMatrix(view.axisArrayByDimension);

    let seriesCount = 0;
    for (const series of view.series) {
      if (!series.isVisible) continue;
      series.fetchData(model);
      ledger.register(series);
      seriesCount++;
    }

    emit('update', { generation: updateId, restart, seriesCount });
  };

  function update(restart: boolean): void {
    assertNotDisposed();
    // A series asking for an update from inside fetchData gets the next window instead.
    const effectiveRestart = restart || pendingRestart;
    if (!scheduler.runExclusive(() => runUpdate(effectiveRestart))) {
      if (restart) pendingRestart = true;
      invalidate();
    }
  }

  function registerResource(resource: Disposable): ResourceHandle {
    assertNotDisposed();
    return ledger.register(resource);
  }

  function collectResources(): number {
    const generation = updateId;
    const released = ledger.collect();
    emit('collect', { generation, released });
    return released;
  }

  function scaleTo(value: number, plane: Plane, size?: Size): number {
    return scaleToPixel(value, plane, size ?? drawAreaSize);
  }

  function getNextColor(): string {
    return getNextPaletteColor(colors);
  }

  const onViewInitialized = (): void => {
    isViewInitialized = true;
    try {
      update(false);
    } catch (error) {
      // Reported like a scheduled update; nothing in the view's emitter handles it.
      logger.error('ChartModel: initial update failed:', error);
    }
  };

  const onUpdaterFrequencyChanged = (): void => {
    invalidate();
  };

  const onPropertyInstanceChanged = (payload: PropertyInstanceChangedPayload): void => {
    tracker.onBoundPropertyChanged(payload.propertyName, payload.instance);
  };

  const onResized = (size: Size): void => {
    drawAreaSize = size;
    invalidate();
  };

  view.on('initialized', onViewInitialized);
  view.on('updaterFrequencyChanged', onUpdaterFrequencyChanged);
  view.on('propertyInstanceChanged', onPropertyInstanceChanged);
  view.on('resized', onResized);

  function dispose(): void {
    if (disposed) return;
    disposed = true;

    view.off('initialized', onViewInitialized);
    view.off('updaterFrequencyChanged', onUpdaterFrequencyChanged);
    view.off('propertyInstanceChanged', onPropertyInstanceChanged);
    view.off('resized', onResized);

    tracker.dispose();
    scheduler.dispose();
    emit('dispose', undefined);
    listeners.update.clear();
    listeners.collect.clear();
    listeners.dispose.clear();

    ledger.clear();
  }

  const model: ChartModel = {
    view,
    get isViewInitialized() {
      return isViewInitialized;
    },
    get disposed() {
      return disposed;
    },
    get updateId() {
      return updateId;
    },
    get dataRangeMatrix() {
      return dataRangeMatrix;
    },
    get drawAreaSize() {
      return drawAreaSize;
    },
    set drawAreaSize(size: Size) {
      drawAreaSize = size;
    },
    get colors() {
      return colors;
    },
    set colors(value: ReadonlyArray<string>) {
      const sanitized = sanitizePalette(value);
      if (sanitized.length === 0) {
        logger.warn('ChartModel: palette has no usable colors, using the default palette.');
        colors = Array.from(defaultPalette);
        return;
      }
      colors = sanitized;
    },
    invalidate,
    update,
    scaleTo,
    getNextColor,
    registerResource,
    collectResources,
    getSchedulerState: () => scheduler.getState(),
    on<K extends ChartModelEventName>(eventName: K, callback: ChartModelEventCallback<K>): void {
      const set: Set<ChartModelEventCallback<K>> = listeners[eventName];
      set.add(callback);
    },
    off<K extends ChartModelEventName>(eventName: K, callback: ChartModelEventCallback<K>): void {
      const set: Set<ChartModelEventCallback<K>> = listeners[eventName];
      set.delete(callback);
    },
    dispose,
  };

  return model;
}
