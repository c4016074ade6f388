import type { AxisMap } from '../config/types';

/**
 * Derives the scale/translation pair mapping a data interval onto a canvas interval.
 *
 * Notes:
 * - No clamping; values outside the data interval extrapolate.
 * - A zero-span data interval is not rejected: `s` becomes Infinity or NaN and every
 *   mapped value inherits it.
 */
export function deriveAxisMap(canvasMin: number, canvasMax: number, dataMin: number, dataMax: number): AxisMap {
  return Object.freeze({
    s: (canvasMax - canvasMin) / (dataMax - dataMin),
    t: canvasMin,
  });
}

/**
 * Maps a data value measured from the data minimum (x axis, no flip).
 */
export function applyAxisMap(axis: AxisMap, dataMin: number, value: number): number {
  return (value - dataMin) * axis.s + axis.t;
}

/**
 * Maps a data value measured back from the data maximum.
 * Used for y, where data space grows upward and canvas space grows downward.
 */
export function applyFlippedAxisMap(axis: AxisMap, dataMax: number, value: number): number {
  return (dataMax - value) * axis.s + axis.t;
}
