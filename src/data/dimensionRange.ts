/**
 * Min/max range of one axis.
 *
 * The empty range is `(+Infinity, -Infinity)`: any finite value is below the
 * minimum and above the maximum, so merging a value needs no "has data" flag.
 */
export interface DimensionRange {
  minValue: number;
  maxValue: number;
}

export const createDimensionRange = (minValue: number, maxValue: number): DimensionRange => ({ minValue, maxValue });

export const createEmptyRange = (): DimensionRange =>
  createDimensionRange(Number.POSITIVE_INFINITY, Number.NEGATIVE_INFINITY);

/** True while nothing has been merged into the range (min above max). */
export const isEmptyRange = (range: Readonly<DimensionRange>): boolean => range.minValue > range.maxValue;

/**
 * True when the range cannot be scaled against: empty, unbounded, or zero-width.
 */
export const isDegenerateRange = (range: Readonly<DimensionRange>): boolean =>
  isEmptyRange(range) ||
  !Number.isFinite(range.minValue) ||
  !Number.isFinite(range.maxValue) ||
  range.minValue === range.maxValue;

/**
 * Widens `range` in place so it contains `value`. Non-finite values are ignored.
 */
export function includeValue(range: DimensionRange, value: number): DimensionRange {
  if (!Number.isFinite(value)) return range;
  if (value < range.minValue) range.minValue = value;
  if (value > range.maxValue) range.maxValue = value;
  return range;
}

/**
 * Widens `target` in place by `source`. Merging an empty source is a no-op.
 */
export function mergeRange(target: DimensionRange, source: Readonly<DimensionRange>): DimensionRange {
  if (source.minValue < target.minValue) target.minValue = source.minValue;
  if (source.maxValue > target.maxValue) target.maxValue = source.maxValue;
  return target;
}
