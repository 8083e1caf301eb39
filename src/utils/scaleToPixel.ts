/**
 * Coordinate mapping from data space to draw-area pixels.
 *
 * @module scaleToPixel
 */

import type { Plane, Size } from '../config/types';

/**
 * Returns the pixel extent a plane scales against: width for the X plane,
 * height for every other plane.
 */
export const getPlaneExtent = (plane: Pick<Plane, 'type'>, size: Size): number =>
  plane.type === 'x' ? size.width : size.height;

/**
 * Maps `value` onto `[0, extent]` along the line through `(axisMin, extent)` and
 * `(axisMax, 0)`: the axis minimum lands on the far edge, the maximum on the origin.
 *
 * Built from `y = m * (x - x1) + y1` with `(x1, y1) = (axisMax, 0)`, so the slope
 * reduces to `extent / (axisMin - axisMax)`.
 *
 * No validation is done. A degenerate range (`axisMin === axisMax`, or the empty
 * `(+Infinity, -Infinity)` sentinel) yields a non-finite result; check with
 * `isDegenerateRange` before scaling.
 */
export const scaleValueToExtent = (value: number, axisMin: number, axisMax: number, extent: number): number =>
  (extent / (axisMin - axisMax)) * (value - axisMax);

/**
 * Scales a data value to a pixel coordinate on the given plane.
 *
 * @param value - Data-space value
 * @param plane - Axis exposing its actual min/max
 * @param size - Draw area; width is used for the X plane, height otherwise
 */
export function scaleToPixel(value: number, plane: Plane, size: Size): number {
  return scaleValueToExtent(value, plane.actualMinValue, plane.actualMaxValue, getPlaneExtent(plane, size));
}
