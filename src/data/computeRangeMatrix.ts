import type { AxisDescriptor } from '../config/types';
import { createDimensionRange } from './dimensionRange';
import type { DimensionRange } from './dimensionRange';

/**
 * `[dimension][axisIndex]` ranges, e.g. `[[x1, x2], [y1]]`.
 */
export type DataRangeMatrix = ReadonlyArray<ReadonlyArray<DimensionRange>>;

/**
 * Builds a fresh range matrix from the axes the view reports.
 *
 * A bound the user left unset (`NaN`) starts at the identity for merging:
 * `+Infinity` for the minimum, `-Infinity` for the maximum. Series then widen
 * these ranges while they fetch their data.
 */
export function computeRangeMatrix(
  axisArrayByDimension: ReadonlyArray<ReadonlyArray<AxisDescriptor>>
): DimensionRange[][] {
  return axisArrayByDimension.map((axes) =>
    axes.map((axis) =>
      createDimensionRange(
        Number.isNaN(axis.minValue) ? Number.POSITIVE_INFINITY : axis.minValue,
        Number.isNaN(axis.maxValue) ? Number.NEGATIVE_INFINITY : axis.maxValue
      )
    )
  );
}
