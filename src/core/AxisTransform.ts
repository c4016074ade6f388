/**
 * AxisTransform - data space to canvas space coordinate mapping
 *
 * Converts points from a cartesian frame with y increasing upward (data space) into a
 * painter's frame with y increasing downward (canvas space). Each axis is scaled
 * independently; the y axis is measured back from the data maximum, which flips it.
 *
 * The per-axis map is derived once at construction. Every mapping call is a pure read.
 */

import type { AxisTransformConfig, CoordinateInput, Point, Rect, TransformMap } from '../config/types';
import type { AxisTransformConfigInput, RectLabel } from '../config/resolveTransformConfig';
import { boundNotSetMessage, resolveAxisTransformConfig } from '../config/resolveTransformConfig';
import { ConfigurationError, InputError } from './errors';
import { applyAxisMap, applyFlippedAxisMap, deriveAxisMap } from '../utils/scales';
import { toCoordinateArray, unwrapSingle } from '../utils/coordinates';

const readBound = (rect: Rect, label: RectLabel, index: 0 | 1 | 2 | 3): number => {
  const value: number | undefined = rect[index];
  if (typeof value !== 'number') {
    throw new ConfigurationError(boundNotSetMessage(label, index));
  }
  return value;
};

export class AxisTransform {
  readonly canvas: Rect;
  readonly data: Rect;
  readonly axisMap: TransformMap;

  /**
   * @throws {ConfigurationError} If `canvas` or `data` is missing or not exactly four values
   */
  constructor(config: AxisTransformConfig | AxisTransformConfigInput) {
    const resolved = resolveAxisTransformConfig(config);
    this.canvas = resolved.canvas;
    this.data = resolved.data;

    this.axisMap = Object.freeze({
      x: deriveAxisMap(this.cx0, this.cx1, this.dx0, this.dx1),
      y: deriveAxisMap(this.cy0, this.cy1, this.dy0, this.dy1),
    });
  }

  /** Canvas min x. */
  get cx0(): number {
    return readBound(this.canvas, 'canvas', 0);
  }

  /** Canvas max x. */
  get cx1(): number {
    return readBound(this.canvas, 'canvas', 2);
  }

  /** Canvas min y. */
  get cy0(): number {
    return readBound(this.canvas, 'canvas', 1);
  }

  /** Canvas max y. */
  get cy1(): number {
    return readBound(this.canvas, 'canvas', 3);
  }

  /** Data min x. */
  get dx0(): number {
    return readBound(this.data, 'data', 0);
  }

  /** Data max x. */
  get dx1(): number {
    return readBound(this.data, 'data', 2);
  }

  /** Data min y. */
  get dy0(): number {
    return readBound(this.data, 'data', 1);
  }

  /** Data max y. */
  get dy1(): number {
    return readBound(this.data, 'data', 3);
  }

  /**
   * Maps data-space x values to canvas-space x values.
   *
   * A one-element result is returned as a plain number, whether the input was a number
   * or a one-element array. Longer inputs return an array in input order.
   *
   * @throws {InputError} If `x` is null or undefined
   */
  mapX(x: number): number;
  mapX(x: ReadonlyArray<number>): number | number[];
  mapX(x: CoordinateInput): number | number[];
  mapX(x: CoordinateInput | null | undefined): number | number[] {
    const xs = toCoordinateArray(x, 'x is undefined');
    return unwrapSingle(this.projectX(xs));
  }

  /**
   * Maps data-space y values to canvas-space y values, flipping the axis.
   * Same return shape as {@link AxisTransform.mapX}.
   *
   * @throws {InputError} If `y` is null or undefined
   */
  mapY(y: number): number;
  mapY(y: ReadonlyArray<number>): number | number[];
  mapY(y: CoordinateInput): number | number[];
  mapY(y: CoordinateInput | null | undefined): number | number[] {
    const ys = toCoordinateArray(y, 'y is undefined');
    return unwrapSingle(this.projectY(ys));
  }

  /**
   * Maps parallel x and y coordinates. Always returns a pair of arrays, even for
   * scalar input.
   *
   * @throws {InputError} If either argument is null or undefined, or if their lengths differ
   */
  map(x: CoordinateInput, y: CoordinateInput): [xs: number[], ys: number[]] {
    const xs = toCoordinateArray(x, 'map error: x is undefined');
    const ys = toCoordinateArray(y, 'map error: y is undefined');
    if (xs.length !== ys.length) {
      throw new InputError('x and y arrays different lengths');
    }
    return [this.projectX(xs), this.projectY(ys)];
  }

  /**
   * Maps a single `{ x, y }` point.
   *
   * @throws {InputError} If the point or either of its coordinates is missing
   */
  mapPoint(point: Point): Point {
    if (point === null || point === undefined) {
      throw new InputError('point is undefined');
    }
    if (point.x === null || point.x === undefined) {
      throw new InputError('map error: x is undefined');
    }
    if (point.y === null || point.y === undefined) {
      throw new InputError('map error: y is undefined');
    }
    return {
      x: applyAxisMap(this.axisMap.x, this.dx0, point.x),
      y: applyFlippedAxisMap(this.axisMap.y, this.dy1, point.y),
    };
  }

  /**
   * Returns the transform from this transform's canvas rectangle back to its data
   * rectangle (the two rectangles swapped).
   */
  inverse(): AxisTransform {
    return new AxisTransform({ canvas: this.data, data: this.canvas });
  }

  private projectX(xs: ReadonlyArray<number>): number[] {
    const dx0 = this.dx0;
    return xs.map((value) => applyAxisMap(this.axisMap.x, dx0, value));
  }

  private projectY(ys: ReadonlyArray<number>): number[] {
    const dy1 = this.dy1;
    return ys.map((value) => applyFlippedAxisMap(this.axisMap.y, dy1, value));
  }
}

/**
 * Creates an AxisTransform.
 *
 * @throws {ConfigurationError} If `canvas` or `data` is missing or not exactly four values
 */
export function createAxisTransform(config: AxisTransformConfig | AxisTransformConfigInput): AxisTransform {
  return new AxisTransform(config);
}
