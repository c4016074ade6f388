/**
 * Transform configuration types.
 */

/**
 * Axis-aligned rectangle: min x, min y, max x, max y.
 */
export type Rect = readonly [x0: number, y0: number, x1: number, y1: number];

/**
 * Rectangles describing both frames.
 * `canvas` is the destination (y down), `data` the source (y up).
 */
export interface AxisTransformConfig {
  readonly canvas: Rect;
  readonly data: Rect;
}

/**
 * A single value or an ordered sequence of values along one axis.
 */
export type CoordinateInput = number | ReadonlyArray<number>;

export type Point = Readonly<{ x: number; y: number }>;

/**
 * Per-axis scale (`s`) and translation (`t`).
 */
export type AxisMap = Readonly<{ s: number; t: number }>;

export type TransformMap = Readonly<{ x: AxisMap; y: AxisMap }>;
