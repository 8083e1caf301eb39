import type { ChartModel } from '../ChartModel';

/**
 * Pixel extent of a draw area (CSS pixels).
 */
export interface Size {
  readonly width: number;
  readonly height: number;
}

/**
 * Plane classes a chart lays data on. Only `x` selects the horizontal extent;
 * every other plane scales against the draw-area height.
 */
export type PlaneType = 'x' | 'y' | 'z' | 'w';

/**
 * An axis as seen by renderers once its range is known.
 */
export interface Plane {
  readonly type: PlaneType;
  readonly actualMinValue: number;
  readonly actualMaxValue: number;
}

/**
 * An axis as reported by the view. `NaN` means "not set by the user".
 */
export interface AxisDescriptor {
  readonly minValue: number;
  readonly maxValue: number;
}

export interface Disposable {
  dispose(): void;
}

/**
 * A series the view hosts. Series compute their own data and range contribution
 * in `fetchData`; the model tracks them as disposable resources of the cycle.
 */
export interface ChartSeries extends Disposable {
  readonly isVisible: boolean;
  fetchData(model: ChartModel): void;
}

export type CollectionChangeAction = 'add' | 'remove' | 'replace' | 'reset';

export interface CollectionChange<T = unknown> {
  readonly action: CollectionChangeAction;
  /** Position of the first affected item, or -1 for `reset`. */
  readonly index: number;
  readonly newItems: ReadonlyArray<T>;
  readonly oldItems: ReadonlyArray<T>;
}

export type CollectionChangeListener<T = unknown> = (change: CollectionChange<T>) => void;

export type Unsubscribe = () => void;

/**
 * A bindable collection that reports its own mutations.
 */
export interface NotifyingCollection<T = unknown> {
  subscribe(listener: CollectionChangeListener<T>): Unsubscribe;
}

export type PropertyInstanceChangedPayload = Readonly<{
  readonly propertyName: string;
  readonly instance: unknown;
}>;

export interface ChartViewEventMap {
  initialized: void;
  /** New animation/update duration in milliseconds. */
  updaterFrequencyChanged: number;
  propertyInstanceChanged: PropertyInstanceChangedPayload;
  resized: Size;
}

export type ChartViewEventName = keyof ChartViewEventMap;

export type ChartViewEventCallback<K extends ChartViewEventName> = (payload: ChartViewEventMap[K]) => void;

/**
 * Capabilities the model consumes from the platform view. The model never owns
 * the view; it only subscribes to it and reads its current state.
 */
export interface ChartView {
  readonly disableAnimations: boolean;
  /** Animation duration in milliseconds; doubles as the invalidation debounce. */
  readonly animationsSpeed: number;
  readonly drawAreaSize: Size;
  /** `[dimension][axisIndex]`, e.g. `[[x1, x2], [y1]]`. */
  readonly axisArrayByDimension: ReadonlyArray<ReadonlyArray<AxisDescriptor>>;
  readonly series: ReadonlyArray<ChartSeries>;
  on<K extends ChartViewEventName>(eventName: K, callback: ChartViewEventCallback<K>): void;
  off<K extends ChartViewEventName>(eventName: K, callback: ChartViewEventCallback<K>): void;
}

export interface ChartModelLogger {
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface ChartModelOptions {
  /**
   * Palette handed out by `getNextColor()`. Blank entries are dropped; an empty
   * result falls back to the default palette.
   */
  readonly colors?: ReadonlyArray<string>;
  /**
   * Debounce used instead of the view's animation speed when the view has
   * animations disabled.
   *
   * @default 10
   */
  readonly disabledAnimationsDelayMs?: number;
  /**
   * Receives scheduled-update and listener failures.
   *
   * @default console
   */
  readonly logger?: ChartModelLogger;
}
