/**
 * chart-update-core - update/invalidation coordination for chart surfaces
 */

export const version = '1.0.0';

export { createChartModel } from './ChartModel';
export type {
  ChartModel,
  ChartModelCollectPayload,
  ChartModelEventCallback,
  ChartModelEventMap,
  ChartModelEventName,
  ChartModelUpdatePayload,
} from './ChartModel';

export type {
  AxisDescriptor,
  ChartModelLogger,
  ChartModelOptions,
  ChartSeries,
  ChartView,
  ChartViewEventCallback,
  ChartViewEventMap,
  ChartViewEventName,
  CollectionChange,
  CollectionChangeAction,
  CollectionChangeListener,
  Disposable,
  NotifyingCollection,
  Plane,
  PlaneType,
  PropertyInstanceChangedPayload,
  Size,
  Unsubscribe,
} from './config/types';
export { defaultPalette, DISABLED_ANIMATIONS_DELAY_MS } from './config/defaults';
export { resolveModelOptions } from './config/OptionResolver';
export type { ResolvedChartModelOptions } from './config/OptionResolver';

// Coordinate mapping
export { scaleToPixel, scaleValueToExtent, getPlaneExtent } from './utils/scaleToPixel';

// Ranges
export {
  createDimensionRange,
  createEmptyRange,
  includeValue,
  isDegenerateRange,
  isEmptyRange,
  mergeRange,
} from './data/dimensionRange';
export type { DimensionRange } from './data/dimensionRange';
export { computeRangeMatrix } from './data/computeRangeMatrix';
export type { DataRangeMatrix } from './data/computeRangeMatrix';
export { createObservableCollection } from './data/createObservableCollection';
export type { ObservableCollection } from './data/createObservableCollection';

// Lifetime & scheduling primitives
export { createResourceLedger, createGenerationToken, ResourceDisposalError } from './core/ResourceLedger';
export type { GenerationToken, ResourceHandle, ResourceLedger, ResourceLedgerConfig } from './core/ResourceLedger';
export { createPropertyChangeTracker, isNotifyingCollection } from './core/PropertyChangeTracker';
export type { PropertyChangeTracker, PropertyChangeTrackerConfig } from './core/PropertyChangeTracker';
export { createUpdateScheduler } from './core/UpdateScheduler';
export type { UpdateScheduler, UpdateSchedulerConfig, UpdateSchedulerStatus } from './core/UpdateScheduler';
export { getNextPaletteColor } from './core/paletteRotation';
